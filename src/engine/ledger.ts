// Financial state store. Atomic, pure mutators over PlayerState.
// Each returns a new state with netWorth recomputed; none mutates its input.

import type { AssetRecord, PlayerState } from './types';
import { roundCents } from './utils';
import { clampCreditScore, clampWellbeing } from './helpers';
import { InsufficientFundsError, InvalidAmountError } from './errors';

export interface DebitOptions {
  allowOverdraft?: boolean;
  overdraftFloor?: number; // lowest cash balance an explicit debit may leave (≤ 0)
}

function requireAmount(operation: string, amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidAmountError(operation, amount);
  }
}

export function calculateNetWorth(state: Pick<PlayerState, 'cash' | 'savings' | 'debt'>): number {
  return roundCents(state.cash + state.savings - state.debt);
}

export function recomputeNetWorth(state: PlayerState): PlayerState {
  return { ...state, netWorth: calculateNetWorth(state) };
}

// --- Cash ---

export function credit(state: PlayerState, amount: number): PlayerState {
  requireAmount('credit', amount);
  return recomputeNetWorth({ ...state, cash: roundCents(state.cash + amount) });
}

export function debit(state: PlayerState, amount: number, options: DebitOptions = {}): PlayerState {
  requireAmount('debit', amount);
  const cash = roundCents(state.cash - amount);
  const floor = options.overdraftFloor ?? 0;
  if (!options.allowOverdraft && cash < floor) {
    throw new InsufficientFundsError(amount, roundCents(state.cash - floor));
  }
  return recomputeNetWorth({ ...state, cash });
}

// --- Debt ---

export function accrueInterest(state: PlayerState, rate: number): PlayerState {
  requireAmount('accrueInterest', rate);
  if (state.debt <= 0) return state;
  return recomputeNetWorth({ ...state, debt: roundCents(state.debt * (1 + rate)) });
}

export function addDebt(state: PlayerState, amount: number): PlayerState {
  requireAmount('addDebt', amount);
  return recomputeNetWorth({ ...state, debt: roundCents(state.debt + amount) });
}

/** Reduce principal without touching cash. Never takes debt below zero. */
export function payDownDebt(state: PlayerState, amount: number): PlayerState {
  requireAmount('payDownDebt', amount);
  return recomputeNetWorth({ ...state, debt: Math.max(0, roundCents(state.debt - amount)) });
}

// --- Savings ---

export function depositSavings(state: PlayerState, amount: number): PlayerState {
  requireAmount('depositSavings', amount);
  return recomputeNetWorth({ ...state, savings: roundCents(state.savings + amount) });
}

export function withdrawSavings(state: PlayerState, amount: number): PlayerState {
  requireAmount('withdrawSavings', amount);
  const savings = roundCents(state.savings - amount);
  if (savings < 0) {
    throw new InsufficientFundsError(amount, state.savings, 'savings');
  }
  return recomputeNetWorth({ ...state, savings });
}

// --- Scores ---

export function adjustCreditScore(state: PlayerState, delta: number): PlayerState {
  if (!Number.isFinite(delta)) throw new InvalidAmountError('adjustCreditScore', delta);
  return recomputeNetWorth({ ...state, creditScore: clampCreditScore(state.creditScore + delta) });
}

export function adjustWellbeing(state: PlayerState, delta: number): PlayerState {
  if (!Number.isFinite(delta)) throw new InvalidAmountError('adjustWellbeing', delta);
  return recomputeNetWorth({ ...state, wellbeing: clampWellbeing(state.wellbeing + delta) });
}

// --- Assets ---

export function addAsset(state: PlayerState, assetId: string, record: AssetRecord): PlayerState {
  return recomputeNetWorth({
    ...state,
    activeAssets: { ...state.activeAssets, [assetId]: { ...record } },
  });
}

export function removeAsset(state: PlayerState, assetId: string): PlayerState {
  if (!(assetId in state.activeAssets)) return recomputeNetWorth(state);
  const activeAssets = Object.fromEntries(
    Object.entries(state.activeAssets).filter(([id]) => id !== assetId),
  );
  return recomputeNetWorth({
    ...state,
    activeAssets,
    queuedEvents: state.queuedEvents.filter(e => e.assetId !== assetId),
  });
}

// --- Achievements ---

/** Idempotent: re-unlocking a held achievement returns an equal state */
export function unlockAchievement(state: PlayerState, achievementId: string): PlayerState {
  if (state.achievementsUnlocked.includes(achievementId)) return recomputeNetWorth(state);
  return recomputeNetWorth({
    ...state,
    achievementsUnlocked: [...state.achievementsUnlocked, achievementId],
  });
}
