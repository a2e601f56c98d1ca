import { describe, it, expect } from 'vitest';
import {
  accrueInterest,
  addAsset,
  addDebt,
  adjustCreditScore,
  adjustWellbeing,
  calculateNetWorth,
  credit,
  debit,
  depositSavings,
  payDownDebt,
  removeAsset,
  unlockAchievement,
  withdrawSavings,
} from '../ledger';
import { InsufficientFundsError, InvalidAmountError } from '../errors';
import { createMockPlayerState, createMockVehicle } from './helpers';

describe('cash', () => {
  it('credit adds to cash and recomputes net worth', () => {
    const state = credit(createMockPlayerState(), 250.5);
    expect(state.cash).toBe(1250.5);
    expect(state.netWorth).toBe(1250.5);
  });

  it('rounds to cents', () => {
    const state = credit(credit(createMockPlayerState(), 0.1), 0.2);
    expect(state.cash).toBe(1000.3);
  });

  it('debit refuses to go below zero without overdraft', () => {
    const state = createMockPlayerState();
    expect(() => debit(state, 1500)).toThrow(InsufficientFundsError);
    expect(state.cash).toBe(1000);
  });

  it('debit may overdraw when allowed', () => {
    const state = debit(createMockPlayerState(), 1500, { allowOverdraft: true });
    expect(state.cash).toBe(-500);
    expect(state.netWorth).toBe(-500);
  });

  it('respects a configured overdraft floor', () => {
    const state = createMockPlayerState();
    expect(debit(state, 1400, { overdraftFloor: -500 }).cash).toBe(-400);
    expect(() => debit(state, 1600, { overdraftFloor: -500 })).toThrow(InsufficientFundsError);
  });

  it('rejects negative and non-finite amounts', () => {
    const state = createMockPlayerState();
    expect(() => credit(state, -5)).toThrow(InvalidAmountError);
    expect(() => debit(state, Number.NaN)).toThrow(InvalidAmountError);
    expect(() => addDebt(state, Number.POSITIVE_INFINITY)).toThrow(InvalidAmountError);
  });

  it('never mutates its input', () => {
    const state = createMockPlayerState();
    const next = credit(state, 100);
    expect(next).not.toBe(state);
    expect(state.cash).toBe(1000);
  });
});

describe('debt', () => {
  it('accrues interest on the balance', () => {
    const state = accrueInterest(createMockPlayerState({ debt: 5000 }), 0.01);
    expect(state.debt).toBe(5050);
    expect(state.netWorth).toBe(1000 - 5050);
  });

  it('accrues nothing without debt', () => {
    const state = createMockPlayerState();
    expect(accrueInterest(state, 0.01)).toBe(state);
  });

  it('pays down without going below zero', () => {
    const state = payDownDebt(createMockPlayerState({ debt: 5000 }), 6000);
    expect(state.debt).toBe(0);
    expect(state.cash).toBe(1000);
  });
});

describe('savings', () => {
  it('deposit and withdraw move the savings balance only', () => {
    let state = depositSavings(createMockPlayerState(), 500);
    expect(state.savings).toBe(500);
    state = withdrawSavings(state, 200);
    expect(state.savings).toBe(300);
    expect(state.cash).toBe(1000);
  });

  it('cannot withdraw more than is saved', () => {
    const state = createMockPlayerState({ savings: 100 });
    expect(() => withdrawSavings(state, 150)).toThrow(InsufficientFundsError);
  });

  it('net worth is cash + savings - debt', () => {
    const state = addDebt(depositSavings(createMockPlayerState(), 500), 300);
    expect(state.netWorth).toBe(1200);
    expect(calculateNetWorth(state)).toBe(1200);
  });
});

describe('scores', () => {
  it('clamps credit score to [300, 850]', () => {
    expect(adjustCreditScore(createMockPlayerState({ creditScore: 840 }), 50).creditScore).toBe(850);
    expect(adjustCreditScore(createMockPlayerState({ creditScore: 310 }), -50).creditScore).toBe(300);
  });

  it('clamps well-being to [0, 100]', () => {
    expect(adjustWellbeing(createMockPlayerState({ wellbeing: 98 }), 5).wellbeing).toBe(100);
    expect(adjustWellbeing(createMockPlayerState({ wellbeing: 2 }), -5).wellbeing).toBe(0);
  });
});

describe('assets', () => {
  it('removing an asset drops its queued repair notice', () => {
    let state = addAsset(createMockPlayerState(), 'car-1', createMockVehicle());
    state = { ...state, queuedEvents: [{ kind: 'asset_repair', assetId: 'car-1', queuedMonth: 0 }] };
    const next = removeAsset(state, 'car-1');
    expect(next.activeAssets).toEqual({});
    expect(next.queuedEvents).toEqual([]);
  });

  it('removing an unknown asset changes nothing', () => {
    const state = createMockPlayerState();
    expect(removeAsset(state, 'missing')).toEqual(state);
  });
});

describe('unlockAchievement', () => {
  it('is idempotent', () => {
    const once = unlockAchievement(createMockPlayerState(), 'first_paycheck');
    const twice = unlockAchievement(once, 'first_paycheck');
    expect(twice).toEqual(once);
    expect(twice.achievementsUnlocked).toEqual(['first_paycheck']);
  });
});
