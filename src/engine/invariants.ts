import type { PlayerState } from './types';
import { CREDIT_SCORE_RANGE, MAX_LIFE_GOALS, WELLBEING_RANGE } from '../data/gameConfig';
import { calculateNetWorth } from './ledger';
import { InvariantViolationError } from './errors';

/**
 * List every invariant the state breaks. When `previous` is given, also checks
 * that month and the unlocked achievements only grew.
 */
export function checkInvariants(state: PlayerState, previous?: PlayerState): string[] {
  const violations: string[] = [];

  for (const key of ['cash', 'debt', 'savings', 'netWorth'] as const) {
    if (!Number.isFinite(state[key])) violations.push(`${key} is not finite`);
  }
  if (state.debt < 0) violations.push(`debt is negative (${state.debt})`);
  if (state.savings < 0) violations.push(`savings is negative (${state.savings})`);
  if (!Number.isInteger(state.creditScore)
    || state.creditScore < CREDIT_SCORE_RANGE[0]
    || state.creditScore > CREDIT_SCORE_RANGE[1]) {
    violations.push(`creditScore out of range (${state.creditScore})`);
  }
  if (!Number.isInteger(state.wellbeing)
    || state.wellbeing < WELLBEING_RANGE[0]
    || state.wellbeing > WELLBEING_RANGE[1]) {
    violations.push(`wellbeing out of range (${state.wellbeing})`);
  }
  if (state.netWorth !== calculateNetWorth(state)) {
    violations.push(`netWorth drifted (${state.netWorth} vs ${calculateNetWorth(state)})`);
  }
  if (state.goals.length > MAX_LIFE_GOALS) violations.push(`more than ${MAX_LIFE_GOALS} goals`);
  if (!Number.isInteger(state.month) || state.month < 0) violations.push(`month is invalid (${state.month})`);
  if (new Set(state.achievementsUnlocked).size !== state.achievementsUnlocked.length) {
    violations.push('duplicate achievements');
  }
  for (const [id, asset] of Object.entries(state.activeAssets)) {
    if (!(asset.condition >= 0 && asset.condition <= 100)) violations.push(`asset ${id} condition out of range`);
  }

  if (previous) {
    if (state.month < previous.month) violations.push('month went backwards');
    const current = new Set(state.achievementsUnlocked);
    const lost = previous.achievementsUnlocked.filter(id => !current.has(id));
    if (lost.length > 0) violations.push(`achievements lost: ${lost.join(', ')}`);
  }

  return violations;
}

export function assertInvariants(state: PlayerState, previous?: PlayerState): void {
  const violations = checkInvariants(state, previous);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations);
  }
}
