/**
 * Shared test helpers and mock factories for Money Journey engine tests
 */
import type {
  AssetRecord,
  DataTables,
  LifeEventDefinition,
  LivingCostTable,
  PlayerState,
} from '../types';
import type { EngineContext } from '../simulation';
import { resolveSimulationConfig, type SimulationConfig } from '../../data/gameConfig';
import { PATHS } from '../../data/paths';
import { CAREERS, PART_TIME_JOBS, VEHICLES } from '../../data/catalog';
import { LIFE_GOALS } from '../../data/progress';
import { calculateNetWorth } from '../ledger';

export const TEST_SEED = 42;

export function flatLivingCosts(monthly: number): LivingCostTable {
  const bracket = () => [{ maxAge: Number.POSITIVE_INFINITY, monthly }];
  return {
    four_year_college: bracket(),
    community_college: bracket(),
    trade_school: bracket(),
    military: bracket(),
    workforce: bracket(),
    entrepreneur: bracket(),
  };
}

/**
 * Catalog with a flat $1,800 living cost, no random events and no achievements,
 * so a test only sees the mechanics it sets up.
 */
export function createMockTables(overrides: Partial<DataTables> = {}): DataTables {
  return {
    paths: structuredClone(PATHS),
    livingCosts: flatLivingCosts(1800),
    careers: structuredClone(CAREERS),
    vehicles: structuredClone(VEHICLES),
    partTimeJobs: structuredClone(PART_TIME_JOBS),
    events: [],
    achievements: [],
    lifeGoals: structuredClone(LIFE_GOALS),
    ...overrides,
  };
}

/** Default tuning with randomness and savings interest switched off */
export function createTestConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return resolveSimulationConfig({ eventChance: 0, savingsMonthlyRate: 0, ...overrides });
}

export function createMockContext(
  tables: Partial<DataTables> = {},
  config: Partial<SimulationConfig> = {}
): EngineContext {
  return { tables: createMockTables(tables), config: createTestConfig(config) };
}

/** A workforce player at month 0 earning $2,000 a month; netWorth is recomputed */
export function createMockPlayerState(overrides: Partial<PlayerState> = {}): PlayerState {
  const state: PlayerState = {
    version: 2,
    seed: TEST_SEED,
    profile: { name: 'Test Player', age: 18, pathId: 'workforce' },
    month: 0,
    cash: 1000,
    debt: 0,
    savings: 0,
    creditScore: 650,
    wellbeing: 50,
    netWorth: 0,
    goals: [],
    goalsCompleted: [],
    achievementsUnlocked: [],
    activeAssets: {},
    employment: {
      kind: 'job',
      title: 'Entry-level associate',
      incomePerMonth: 2000,
      skillTags: [],
      startedMonth: 0,
    },
    sideJob: null,
    academics: null,
    budget: null,
    missedPayments: 0,
    lastMissedPaymentMonth: null,
    eventCooldowns: {},
    queuedEvents: [],
    pendingDecision: null,
    resumeMonths: 0,
    ...overrides,
  };
  return { ...state, netWorth: calculateNetWorth(state) };
}

/** A four-year college student in month 0 of a 48-month program */
export function createMockStudentState(overrides: Partial<PlayerState> = {}): PlayerState {
  return createMockPlayerState({
    profile: { name: 'Test Student', age: 18, pathId: 'four_year_college' },
    employment: {
      kind: 'education',
      title: 'University student',
      incomePerMonth: 0,
      skillTags: [],
      startedMonth: 0,
      endsMonth: 48,
    },
    academics: { gpa: 3.0 },
    ...overrides,
  });
}

export function createMockVehicle(overrides: Partial<AssetRecord> = {}): AssetRecord {
  return {
    catalogId: 'used_sedan',
    kind: 'vehicle',
    condition: 100,
    purchasePrice: 6000,
    monthlyCost: 250,
    acquiredMonth: 0,
    ...overrides,
  };
}

export function createMockEvent(overrides: Partial<LifeEventDefinition> = {}): LifeEventDefinition {
  return {
    id: 'test_event',
    title: 'Test event',
    description: 'Something happened.',
    priority: 5,
    trigger: [],
    effects: {},
    requiresInput: false,
    ...overrides,
  };
}
