// Declarative state predicates shared by event triggers, achievements and life goals.
// Pure functions, no side effects.

import type { ComparisonOperator, PlayerState, StateCondition, StateFlag, StateMetric } from './types';
import { ownedVehicleIds, totalMonthlyIncome } from './helpers';

export function readMetric(state: PlayerState, metric: StateMetric): number {
  switch (metric) {
    case 'cash': return state.cash;
    case 'debt': return state.debt;
    case 'savings': return state.savings;
    case 'creditScore': return state.creditScore;
    case 'wellbeing': return state.wellbeing;
    case 'netWorth': return state.netWorth;
    case 'month': return state.month;
    case 'age': return state.profile.age;
    case 'income': return totalMonthlyIncome(state);
    case 'vehicleCount': return ownedVehicleIds(state).length;
    case 'monthsSinceMissedPayment':
      return state.lastMissedPaymentMonth === null
        ? state.month
        : state.month - state.lastMissedPaymentMonth;
  }
}

export function readFlag(state: PlayerState, flag: StateFlag): boolean {
  switch (flag) {
    case 'has_income': return totalMonthlyIncome(state) > 0;
    case 'owns_vehicle': return ownedVehicleIds(state).length > 0;
    case 'is_student': return state.employment?.kind === 'education';
    case 'has_side_job': return state.sideJob !== null;
    case 'has_career': return state.employment?.kind === 'career';
    case 'has_debt': return state.debt > 0;
    case 'has_degree': return state.academics !== null && state.employment?.kind !== 'education';
  }
}

export function compare(current: number, operator: ComparisonOperator, value: number): boolean {
  switch (operator) {
    case '<': return current < value;
    case '<=': return current <= value;
    case '>': return current > value;
    case '>=': return current >= value;
    case '==': return current === value;
  }
}

export function matchesCondition(state: PlayerState, condition: StateCondition): boolean {
  if ('flag' in condition) {
    return readFlag(state, condition.flag) === condition.is;
  }
  return compare(readMetric(state, condition.metric), condition.operator, condition.value);
}

/** All conditions must hold; an empty list always matches */
export function matchesAll(state: PlayerState, conditions: StateCondition[]): boolean {
  return conditions.every(c => matchesCondition(state, c));
}
