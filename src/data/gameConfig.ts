import type { Range } from '../engine/types';
import { ConfigError } from '../engine/errors';

export const SNAPSHOT_VERSION = 2;

export const ALLOWED_ADVANCE_MONTHS = [1, 3, 6] as const;
export type AdvanceMonths = typeof ALLOWED_ADVANCE_MONTHS[number];

export const CREDIT_SCORE_RANGE: Range = [300, 850];
export const WELLBEING_RANGE: Range = [0, 100];
export const MAX_LIFE_GOALS = 3;
export const MONTHS_PER_YEAR = 12;
export const WEEKS_PER_MONTH = 4;

export interface SimulationConfig {
  // Starting values
  startingCash: number;
  startingCreditScore: number;
  startingWellbeing: number;
  startingAge: number;
  startingGpa: number;
  initialEducationCostCap: number;   // up-front costs on an education path: min(cap, cash × pct)
  initialEducationCostPct: number;

  // Ledger
  overdraftFloor: number;            // explicit debits may not take cash below this

  // Income step
  studentWorkWellbeingCost: number;  // per month while working during education
  gpaSafeHoursPerWeek: number;
  gpaPenaltyPerHour: number;         // GPA lost per month per weekly hour above the safe limit
  careerTransitionAge: number;       // players without a career are asked to pick one from this age

  // Expense step
  negativeCashCreditPenalty: number;
  negativeCashWellbeingPenalty: number;
  wantsWellbeingBonus: number;

  // Debt service
  debtMonthlyRate: number;
  minimumPaymentRate: number;
  minimumPaymentFloor: number;
  missedPaymentCreditPenalty: number;
  onTimePaymentCreditBonus: number;
  savingsMonthlyRate: number;

  // Assets
  repairThreshold: number;
  repairCostRange: Range;
  tradeInRate: number;
  minimumSaleValue: number;
  deferRepairWellbeingPenalty: number;

  // Events
  eventChance: number;               // probability per month that a random event is drawn

  // Drift
  surplusWellbeingGain: number;
  deficitWellbeingLoss: number;
}

export const DEFAULT_SIMULATION_CONFIG: Readonly<SimulationConfig> = {
  startingCash: 1000,
  startingCreditScore: 650,
  startingWellbeing: 50,
  startingAge: 18,
  startingGpa: 3.0,
  initialEducationCostCap: 2000,
  initialEducationCostPct: 0.2,

  overdraftFloor: 0,

  studentWorkWellbeingCost: 2,
  gpaSafeHoursPerWeek: 15,
  gpaPenaltyPerHour: 0.01,
  careerTransitionAge: 22,

  negativeCashCreditPenalty: 10,
  negativeCashWellbeingPenalty: 5,
  wantsWellbeingBonus: 2,

  debtMonthlyRate: 0.004,            // 4.8% APR student loan
  minimumPaymentRate: 0.01,
  minimumPaymentFloor: 25,
  missedPaymentCreditPenalty: 25,
  onTimePaymentCreditBonus: 1,
  savingsMonthlyRate: 0.002,

  repairThreshold: 50,
  repairCostRange: [300, 800],
  tradeInRate: 0.8,
  minimumSaleValue: 500,
  deferRepairWellbeingPenalty: 3,

  eventChance: 0.10,

  surplusWellbeingGain: 1,
  deficitWellbeingLoss: 2,
};

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Merge overrides onto the defaults and reject values the engine cannot run with.
 */
export function resolveSimulationConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = { ...DEFAULT_SIMULATION_CONFIG, ...overrides };
  const problems: string[] = [];

  const nonNegativeKeys: (keyof SimulationConfig)[] = [
    'startingAge', 'startingGpa', 'initialEducationCostCap', 'initialEducationCostPct',
    'studentWorkWellbeingCost', 'gpaSafeHoursPerWeek', 'gpaPenaltyPerHour', 'careerTransitionAge',
    'negativeCashCreditPenalty', 'negativeCashWellbeingPenalty', 'wantsWellbeingBonus',
    'debtMonthlyRate', 'minimumPaymentRate', 'minimumPaymentFloor',
    'missedPaymentCreditPenalty', 'onTimePaymentCreditBonus', 'savingsMonthlyRate',
    'repairThreshold', 'tradeInRate', 'minimumSaleValue', 'deferRepairWellbeingPenalty',
    'surplusWellbeingGain', 'deficitWellbeingLoss',
  ];
  for (const key of nonNegativeKeys) {
    const value = config[key];
    if (typeof value !== 'number' || !isNonNegative(value)) problems.push(`${key} must be a non-negative number`);
  }

  if (!Number.isFinite(config.startingCash)) problems.push('startingCash must be finite');
  if (!Number.isFinite(config.overdraftFloor) || config.overdraftFloor > 0) {
    problems.push('overdraftFloor must be zero or negative');
  }
  if (!Number.isInteger(config.startingCreditScore)
    || config.startingCreditScore < CREDIT_SCORE_RANGE[0]
    || config.startingCreditScore > CREDIT_SCORE_RANGE[1]) {
    problems.push('startingCreditScore must be an integer in [300, 850]');
  }
  if (!Number.isInteger(config.startingWellbeing)
    || config.startingWellbeing < WELLBEING_RANGE[0]
    || config.startingWellbeing > WELLBEING_RANGE[1]) {
    problems.push('startingWellbeing must be an integer in [0, 100]');
  }
  if (!(config.eventChance >= 0 && config.eventChance <= 1)) problems.push('eventChance must be within [0, 1]');
  if (config.repairThreshold > 100) problems.push('repairThreshold must be at most 100');
  if (config.startingGpa > 4) problems.push('startingGpa must be at most 4');
  const [repairMin, repairMax] = config.repairCostRange;
  if (!isNonNegative(repairMin) || !isNonNegative(repairMax) || repairMin > repairMax) {
    problems.push('repairCostRange must be an ordered pair of non-negative numbers');
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid simulation config: ${problems.join('; ')}`);
  }
  return config;
}
