// Life events: eligibility, tie-break and effect application

import type {
  AppliedEffects,
  EffectDeltas,
  LifeEventDefinition,
  PlayerState,
} from './types';
import type { SeededRng } from './rng';
import { matchesAll } from './conditions';
import { rollAmount } from './helpers';
import {
  addDebt,
  adjustCreditScore,
  adjustWellbeing,
  credit,
  debit,
  depositSavings,
  payDownDebt,
  withdrawSavings,
} from './ledger';
import { roundCents } from './utils';

const NO_EFFECTS: AppliedEffects = {
  cash: 0,
  debt: 0,
  savings: 0,
  creditScore: 0,
  wellbeing: 0,
  income: 0,
};

export function isOnCooldown(state: PlayerState, event: LifeEventDefinition): boolean {
  const lastFired = state.eventCooldowns[event.id];
  if (lastFired === undefined || !event.cooldownMonths) return false;
  return state.month - lastFired < event.cooldownMonths;
}

/**
 * Events whose trigger matches the current state and that are off cooldown,
 * ordered by priority (lower first) with table order breaking ties.
 */
export function getEligibleEvents(state: PlayerState, events: LifeEventDefinition[]): LifeEventDefinition[] {
  return events
    .map((event, index) => ({ event, index }))
    .filter(({ event }) => !isOnCooldown(state, event) && matchesAll(state, event.trigger))
    .sort((a, b) => a.event.priority - b.event.priority || a.index - b.index)
    .map(({ event }) => event);
}

/**
 * Draw zero or one event for the month. One roll decides whether anything happens;
 * if so, the first eligible event by priority fires.
 */
export function drawEvent(
  state: PlayerState,
  events: LifeEventDefinition[],
  eventChance: number,
  rng: SeededRng
): LifeEventDefinition | null {
  const roll = rng.next();
  if (roll >= eventChance) return null;
  return getEligibleEvents(state, events)[0] ?? null;
}

export function markFired(state: PlayerState, eventId: string): PlayerState {
  return { ...state, eventCooldowns: { ...state.eventCooldowns, [eventId]: state.month } };
}

/**
 * Roll and apply effect deltas. Cash may go negative (an event is never refused);
 * debt and savings never drop below zero, scores clamp.
 */
export function applyEffects(
  state: PlayerState,
  deltas: EffectDeltas | undefined,
  rng: SeededRng
): { state: PlayerState; effects: AppliedEffects } {
  if (!deltas) return { state, effects: { ...NO_EFFECTS } };
  let next = state;
  const effects: AppliedEffects = { ...NO_EFFECTS };

  const cash = roundCents(rollAmount(deltas.cash, rng));
  if (cash > 0) next = credit(next, cash);
  else if (cash < 0) next = debit(next, -cash, { allowOverdraft: true });
  effects.cash = cash;

  const debt = roundCents(rollAmount(deltas.debt, rng));
  if (debt > 0) {
    next = addDebt(next, debt);
    effects.debt = debt;
  } else if (debt < 0) {
    const before = next.debt;
    next = payDownDebt(next, -debt);
    effects.debt = roundCents(next.debt - before);
  }

  const savings = roundCents(rollAmount(deltas.savings, rng));
  if (savings > 0) {
    next = depositSavings(next, savings);
    effects.savings = savings;
  } else if (savings < 0) {
    const taken = Math.min(-savings, next.savings);
    if (taken > 0) next = withdrawSavings(next, taken);
    effects.savings = -taken;
  }

  const creditScore = Math.round(rollAmount(deltas.creditScore, rng));
  if (creditScore !== 0) {
    const before = next.creditScore;
    next = adjustCreditScore(next, creditScore);
    effects.creditScore = next.creditScore - before;
  }

  const wellbeing = Math.round(rollAmount(deltas.wellbeing, rng));
  if (wellbeing !== 0) {
    const before = next.wellbeing;
    next = adjustWellbeing(next, wellbeing);
    effects.wellbeing = next.wellbeing - before;
  }

  const incomePct = rollAmount(deltas.incomePct, rng);
  if (incomePct !== 0 && next.employment && next.employment.incomePerMonth > 0) {
    const before = next.employment.incomePerMonth;
    const after = Math.max(0, roundCents(before * (1 + incomePct)));
    next = { ...next, employment: { ...next.employment, incomePerMonth: after } };
    effects.income = roundCents(after - before);
  }

  return { state: next, effects };
}
