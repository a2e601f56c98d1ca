// Character creation: profile, life goals and the chosen path's starting position

import type { DataTables, PathId, PlayerState } from './types';
import type { SimulationConfig } from '../data/gameConfig';
import { MAX_LIFE_GOALS, SNAPSHOT_VERSION } from '../data/gameConfig';
import { addDebt, calculateNetWorth, debit } from './ledger';
import { assertInvariants } from './invariants';
import { generateRandomSeed } from './rng';
import { roundCents } from './utils';
import { InvalidCharacterError, UnknownCatalogEntryError } from './errors';

export const MAX_NAME_LENGTH = 40;

export interface CharacterInput {
  name: string;
  goals: string[];
  seed?: number;
}

export function validateCharacterInput(input: CharacterInput, tables: DataTables): void {
  const name = input.name.trim();
  if (name.length === 0) throw new InvalidCharacterError('Name cannot be empty');
  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidCharacterError(`Name cannot be longer than ${MAX_NAME_LENGTH} characters`);
  }
  if (input.goals.length > MAX_LIFE_GOALS) {
    throw new InvalidCharacterError(`Choose at most ${MAX_LIFE_GOALS} life goals`);
  }
  if (new Set(input.goals).size !== input.goals.length) {
    throw new InvalidCharacterError('Life goals must be unique');
  }
  for (const goal of input.goals) {
    if (!tables.lifeGoals.some(g => g.id === goal)) {
      throw new InvalidCharacterError(`Unknown life goal "${goal}"`);
    }
  }
  if (input.seed !== undefined && !Number.isInteger(input.seed)) {
    throw new InvalidCharacterError('Seed must be an integer');
  }
}

/**
 * Build a new player at month 0 on the chosen path. Education paths take on their
 * tuition as debt and pay the first costs up front; entrepreneurs pay their startup
 * cost even into overdraft.
 */
export function createCharacter(
  input: CharacterInput,
  pathId: PathId,
  tables: DataTables,
  config: SimulationConfig
): PlayerState {
  validateCharacterInput(input, tables);
  const path = tables.paths[pathId];
  if (!path) throw new UnknownCatalogEntryError('paths', pathId);

  const base: PlayerState = {
    version: SNAPSHOT_VERSION,
    seed: input.seed ?? generateRandomSeed(),
    profile: { name: input.name.trim(), age: config.startingAge, pathId },
    month: 0,
    cash: roundCents(config.startingCash),
    debt: 0,
    savings: 0,
    creditScore: config.startingCreditScore,
    wellbeing: config.startingWellbeing,
    netWorth: 0,
    goals: [...input.goals],
    goalsCompleted: [],
    achievementsUnlocked: [],
    activeAssets: {},
    employment: null,
    sideJob: null,
    academics: null,
    budget: null,
    missedPayments: 0,
    lastMissedPaymentMonth: null,
    eventCooldowns: {},
    queuedEvents: [],
    pendingDecision: null,
    resumeMonths: 0,
  };
  let state: PlayerState = { ...base, netWorth: calculateNetWorth(base) };

  if (path.durationMonths > 0) {
    if (path.tuitionDebt > 0) state = addDebt(state, path.tuitionDebt);
    const initialCosts = roundCents(Math.min(
      config.initialEducationCostCap,
      Math.max(0, state.cash) * config.initialEducationCostPct,
    ));
    if (initialCosts > 0) state = debit(state, initialCosts, { overdraftFloor: config.overdraftFloor });
    state = {
      ...state,
      employment: {
        kind: 'education',
        title: path.employmentTitle,
        incomePerMonth: path.immediateIncome,
        skillTags: [],
        startedMonth: 0,
        endsMonth: path.durationMonths,
      },
      academics: { gpa: config.startingGpa },
    };
  } else if (path.immediateIncome > 0) {
    state = {
      ...state,
      employment: {
        kind: 'job',
        title: path.employmentTitle,
        incomePerMonth: path.immediateIncome,
        skillTags: [],
        startedMonth: 0,
        ...(path.serviceMonths > 0 ? { endsMonth: path.serviceMonths } : {}),
      },
    };
  }

  if (path.startupCost > 0) {
    state = debit(state, path.startupCost, { allowOverdraft: true });
  }

  assertInvariants(state);
  return state;
}
