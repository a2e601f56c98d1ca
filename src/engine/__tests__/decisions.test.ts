import { describe, it, expect } from 'vitest';
import { getAvailableDecisions, resolveDecision, validateAllocation } from '../decisions';
import type { AssetRepairDecision, CareerChoiceDecision, EventResponseDecision } from '../types';
import {
  DecisionNotAvailableError,
  InvalidAllocationError,
  UnknownCatalogEntryError,
} from '../errors';
import { ACHIEVEMENTS } from '../../data/progress';
import {
  createMockContext,
  createMockEvent,
  createMockPlayerState,
  createMockStudentState,
  createMockVehicle,
} from './helpers';

const ctx = createMockContext();

describe('budget allocation', () => {
  it('rejects shares that do not sum to 100 and leaves state untouched', () => {
    const state = createMockPlayerState();
    const before = structuredClone(state);
    expect(() => resolveDecision(
      state,
      { kind: 'budget_allocation' },
      { kind: 'budget_allocation', allocation: { needs: 50, wants: 30, savings: 15 } },
      ctx
    )).toThrow(InvalidAllocationError);
    expect(state).toEqual(before);
  });

  it('rejects negative shares', () => {
    expect(() => validateAllocation({ needs: -10, wants: 60, savings: 50 })).toThrow(InvalidAllocationError);
  });

  it('accepts sums within floating-point tolerance', () => {
    expect(() => validateAllocation({ needs: 33.3333333333, wants: 33.3333333333, savings: 33.3333333334 })).not.toThrow();
  });

  it('stores a valid allocation', () => {
    const result = resolveDecision(
      createMockPlayerState(),
      { kind: 'budget_allocation' },
      { kind: 'budget_allocation', allocation: { needs: 50, wants: 30, savings: 20 } },
      ctx
    );
    expect(result.state.budget).toEqual({ needs: 50, wants: 30, savings: 20 });
    expect(result.resolvedPending).toBe(false);
    expect(result.resumeMonths).toBe(0);
  });
});

describe('vehicle', () => {
  it('finances the part of the price cash does not cover', () => {
    const result = resolveDecision(
      createMockPlayerState(),
      { kind: 'vehicle' },
      { kind: 'vehicle', action: 'purchase', vehicleId: 'used_sedan' },
      ctx
    );
    expect(result.state.cash).toBe(0);
    expect(result.state.debt).toBe(5000);
    expect(Object.keys(result.state.activeAssets)).toEqual(['used_sedan-m0']);
    expect(result.state.activeAssets['used_sedan-m0'].condition).toBe(100);
    expect(result.effects.cash).toBe(-1000);
    expect(result.effects.debt).toBe(5000);
  });

  it('draws cash down to the configured overdraft floor before financing', () => {
    const overdraftCtx = createMockContext({}, { overdraftFloor: -2000 });
    const result = resolveDecision(
      createMockPlayerState(),
      { kind: 'vehicle' },
      { kind: 'vehicle', action: 'purchase', vehicleId: 'used_sedan' },
      overdraftCtx
    );
    expect(result.state.cash).toBe(-2000);
    expect(result.state.debt).toBe(3000);
    expect(result.effects.cash).toBe(-3000);
  });

  it('trades in the current vehicle at its depreciated value', () => {
    const start = createMockPlayerState({ activeAssets: { old: createMockVehicle({ condition: 50 }) } });
    const result = resolveDecision(start, { kind: 'vehicle' }, { kind: 'vehicle', action: 'purchase', vehicleId: 'scooter' }, ctx);
    expect(result.state.cash).toBe(1900);
    expect(result.state.debt).toBe(0);
    expect(Object.keys(result.state.activeAssets)).toEqual(['scooter-m0']);
  });

  it('sells an owned vehicle', () => {
    const start = createMockPlayerState({ activeAssets: { car: createMockVehicle() } });
    const result = resolveDecision(start, { kind: 'vehicle' }, { kind: 'vehicle', action: 'sell', assetId: 'car' }, ctx);
    expect(result.state.cash).toBe(5800);
    expect(result.state.activeAssets).toEqual({});
  });

  it('rejects unknown vehicles and assets', () => {
    const state = createMockPlayerState();
    expect(() => resolveDecision(state, { kind: 'vehicle' }, { kind: 'vehicle', action: 'purchase', vehicleId: 'yacht' }, ctx))
      .toThrow(UnknownCatalogEntryError);
    expect(() => resolveDecision(state, { kind: 'vehicle' }, { kind: 'vehicle', action: 'sell', assetId: 'car' }, ctx))
      .toThrow(DecisionNotAvailableError);
  });

  it('choosing no vehicle changes nothing', () => {
    const state = createMockPlayerState();
    const result = resolveDecision(state, { kind: 'vehicle' }, { kind: 'vehicle', action: 'none' }, ctx);
    expect(result.state).toEqual(state);
  });

  it('re-evaluates achievements after the purchase', () => {
    const withAchievements = createMockContext({ achievements: ACHIEVEMENTS });
    const result = resolveDecision(
      createMockPlayerState(),
      { kind: 'vehicle' },
      { kind: 'vehicle', action: 'purchase', vehicleId: 'used_sedan' },
      withAchievements
    );
    expect(result.achievementsUnlocked).toEqual(['first_paycheck', 'car_owner']);
  });
});

describe('part-time job', () => {
  it('students can take a compatible job', () => {
    const result = resolveDecision(
      createMockStudentState(),
      { kind: 'part_time_job' },
      { kind: 'part_time_job', action: 'take', jobId: 'campus_library' },
      ctx
    );
    expect(result.state.sideJob).toEqual({
      jobId: 'campus_library',
      title: 'Campus library assistant',
      incomePerMonth: 480,
      hoursPerWeek: 10,
    });
    expect(result.effects.income).toBe(480);
  });

  it('is only available in education and on compatible paths', () => {
    const take = (jobId: string) => ({ kind: 'part_time_job' as const, action: 'take' as const, jobId });
    expect(() => resolveDecision(createMockPlayerState(), { kind: 'part_time_job' }, take('barista'), ctx))
      .toThrow(DecisionNotAvailableError);
    expect(() => resolveDecision(createMockStudentState(), { kind: 'part_time_job' }, take('shop_apprentice'), ctx))
      .toThrow(DecisionNotAvailableError);
  });

  it('quits the current job', () => {
    const start = createMockStudentState({
      sideJob: { jobId: 'barista', title: 'Barista', incomePerMonth: 780, hoursPerWeek: 15 },
    });
    const result = resolveDecision(start, { kind: 'part_time_job' }, { kind: 'part_time_job', action: 'quit' }, ctx);
    expect(result.state.sideJob).toBeNull();
    expect(() => resolveDecision(result.state, { kind: 'part_time_job' }, { kind: 'part_time_job', action: 'quit' }, ctx))
      .toThrow(DecisionNotAvailableError);
  });
});

describe('asset repair', () => {
  const pending: AssetRepairDecision = {
    kind: 'asset_repair',
    assetId: 'car',
    condition: 40,
    repairCost: 500,
    saleValue: 1920,
    options: [
      { id: 'repair', label: 'Repair it' },
      { id: 'sell', label: 'Sell it' },
      { id: 'defer', label: 'Put it off' },
    ],
    raisedMonth: 3,
  };
  const start = createMockPlayerState({
    month: 3,
    activeAssets: { car: createMockVehicle({ condition: 40 }) },
    pendingDecision: pending,
    resumeMonths: 2,
  });

  it('repair pays the quoted cost and restores condition', () => {
    const result = resolveDecision(start, pending, { kind: 'asset_repair', optionId: 'repair' }, ctx);
    expect(result.state.cash).toBe(500);
    expect(result.state.activeAssets.car.condition).toBe(100);
    expect(result.state.pendingDecision).toBeNull();
    expect(result.resolvedPending).toBe(true);
    expect(result.resumeMonths).toBe(2);
    expect(result.state.resumeMonths).toBe(2);
  });

  it('sell credits the depreciated value', () => {
    const result = resolveDecision(start, pending, { kind: 'asset_repair', optionId: 'sell' }, ctx);
    expect(result.state.cash).toBe(2920);
    expect(result.state.activeAssets).toEqual({});
  });

  it('defer costs well-being', () => {
    const result = resolveDecision(start, pending, { kind: 'asset_repair', optionId: 'defer' }, ctx);
    expect(result.state.wellbeing).toBe(47);
    expect(result.state.activeAssets.car.condition).toBe(40);
  });

  it('player-initiated decisions leave the pending decision in place', () => {
    const result = resolveDecision(
      start,
      { kind: 'budget_allocation' },
      { kind: 'budget_allocation', allocation: { needs: 100, wants: 0, savings: 0 } },
      ctx
    );
    expect(result.state.pendingDecision).toEqual(pending);
    expect(result.resumeMonths).toBe(0);
    expect(getAvailableDecisions(result.state)[0]).toEqual(pending);
  });
});

describe('career choice', () => {
  const pending: CareerChoiceDecision = {
    kind: 'career_choice',
    track: 'bachelor_degree',
    options: [
      { id: 'software_developer', label: 'Software Developer' },
      { id: 'teacher', label: 'Teacher' },
    ],
    raisedMonth: 48,
  };
  const start = createMockStudentState({
    month: 48,
    employment: null,
    sideJob: { jobId: 'barista', title: 'Barista', incomePerMonth: 780, hoursPerWeek: 15 },
    pendingDecision: pending,
  });

  it('starts the chosen career and drops the side job', () => {
    const result = resolveDecision(start, pending, { kind: 'career_choice', optionId: 'software_developer' }, ctx);
    expect(result.state.employment).toEqual({
      kind: 'career',
      title: 'Software Developer',
      incomePerMonth: 6000,
      skillTags: ['programming', 'problem_solving'],
      startedMonth: 48,
    });
    expect(result.state.sideJob).toBeNull();
  });

  it('rejects careers that were not offered', () => {
    expect(() => resolveDecision(start, pending, { kind: 'career_choice', optionId: 'electrician' }, ctx))
      .toThrow(DecisionNotAvailableError);
  });
});

describe('event response', () => {
  const event = createMockEvent({
    id: 'friend_loan',
    requiresInput: true,
    choices: [
      { id: 'lend', label: 'Lend the money', effects: { cash: -300, wellbeing: 4 } },
      { id: 'decline', label: 'Say no', effects: { wellbeing: -2 } },
    ],
  });
  const pending: EventResponseDecision = {
    kind: 'event_response',
    eventId: 'friend_loan',
    title: event.title,
    description: event.description,
    options: [{ id: 'lend', label: 'Lend the money' }, { id: 'decline', label: 'Say no' }],
    raisedMonth: 1,
  };

  it('applies the chosen effects', () => {
    const eventCtx = createMockContext({ events: [event] });
    const start = createMockPlayerState({ month: 1, pendingDecision: pending });
    const result = resolveDecision(start, pending, { kind: 'event_response', optionId: 'lend' }, eventCtx);
    expect(result.state.cash).toBe(700);
    expect(result.state.wellbeing).toBe(54);
    expect(result.effects.cash).toBe(-300);
    expect(result.effects.wellbeing).toBe(4);
  });

  it('needs a matching pending decision', () => {
    const eventCtx = createMockContext({ events: [event] });
    expect(() => resolveDecision(createMockPlayerState(), pending, { kind: 'event_response', optionId: 'lend' }, eventCtx))
      .toThrow(DecisionNotAvailableError);
  });

  it('rejects a choice of a different kind', () => {
    expect(() => resolveDecision(createMockPlayerState(), pending, { kind: 'vehicle', action: 'none' }, ctx))
      .toThrow(DecisionNotAvailableError);
  });
});
