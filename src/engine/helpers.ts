// Shared engine helper functions and constants

import type { Amount, PlayerState } from './types';
import type { SeededRng } from './rng';
import { CREDIT_SCORE_RANGE, WELLBEING_RANGE } from '../data/gameConfig';

// --- Clamps ---

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp and round to the valid [300, 850] range */
export function clampCreditScore(score: number): number {
  return Math.round(clamp(score, CREDIT_SCORE_RANGE[0], CREDIT_SCORE_RANGE[1]));
}

/** Clamp and round to the valid [0, 100] range */
export function clampWellbeing(score: number): number {
  return Math.round(clamp(score, WELLBEING_RANGE[0], WELLBEING_RANGE[1]));
}

// --- Amount rolls ---

/**
 * Resolve a catalog amount. Fixed numbers pass through; [min, max] ranges roll an
 * integer when both bounds are integers, otherwise a float in [min, max).
 */
export function rollAmount(amount: Amount | undefined, rng: SeededRng): number {
  if (amount === undefined) return 0;
  if (typeof amount === 'number') return amount;
  const lo = Math.min(amount[0], amount[1]);
  const hi = Math.max(amount[0], amount[1]);
  if (Number.isInteger(lo) && Number.isInteger(hi)) return rng.nextInt(lo, hi);
  return lo + rng.next() * (hi - lo);
}

// --- State helpers ---

export function totalMonthlyIncome(state: PlayerState): number {
  return (state.employment?.incomePerMonth ?? 0) + (state.sideJob?.incomePerMonth ?? 0);
}

export function ownedVehicleIds(state: PlayerState): string[] {
  return Object.keys(state.activeAssets).filter(id => state.activeAssets[id].kind === 'vehicle');
}

/** Append ids not yet present, preserving order */
export function appendUnique(list: string[], ids: string[]): string[] {
  const seen = new Set(list);
  const next = [...list];
  for (const id of ids) {
    if (!seen.has(id)) {
      seen.add(id);
      next.push(id);
    }
  }
  return next;
}
