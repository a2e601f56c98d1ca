import type {
  AdvanceReport,
  AssetRepairDecision,
  CareerChoiceDecision,
  DataTables,
  EventResponseDecision,
  LifeEventDefinition,
  MonthSummary,
  PathId,
  PendingDecision,
  PlayerState,
  QueuedEvent,
  ResolvedEvent,
} from './types';
import type { SimulationConfig } from '../data/gameConfig';
import { ALLOWED_ADVANCE_MONTHS, MONTHS_PER_YEAR } from '../data/gameConfig';
import { createRngStreams, type RngStreams } from './rng';
import {
  accrueInterest,
  adjustCreditScore,
  adjustWellbeing,
  credit,
  debit,
  depositSavings,
  payDownDebt,
  recomputeNetWorth,
} from './ledger';
import { applyEffects, drawEvent, markFired } from './events';
import { evaluateProgress } from './achievements';
import { assertInvariants } from './invariants';
import { rollAmount } from './helpers';
import { roundCents } from './utils';
import {
  InvalidDurationError,
  PendingDecisionError,
  UnknownCatalogEntryError,
} from './errors';

export interface EngineContext {
  tables: DataTables;
  config: SimulationConfig;
}

// ── Lookups ──

export function getLivingCost(tables: DataTables, pathId: PathId, age: number): number {
  const brackets = [...(tables.livingCosts[pathId] ?? [])].sort((a, b) => a.maxAge - b.maxAge);
  if (brackets.length === 0) throw new UnknownCatalogEntryError('livingCosts', pathId);
  const bracket = brackets.find(b => age <= b.maxAge) ?? brackets[brackets.length - 1];
  return bracket.monthly;
}

export function getMonthlyAssetCosts(state: PlayerState): number {
  return roundCents(Object.values(state.activeAssets).reduce((sum, a) => sum + a.monthlyCost, 0));
}

/** Depreciated resale value of an owned asset */
export function getAssetSaleValue(state: PlayerState, assetId: string, config: SimulationConfig): number {
  const asset = state.activeAssets[assetId];
  if (!asset) return 0;
  return roundCents(Math.max(
    config.minimumSaleValue,
    asset.purchasePrice * (asset.condition / 100) * config.tradeInRate,
  ));
}

/** Minimum payment due on the current balance */
export function getMinimumPayment(debt: number, config: SimulationConfig): number {
  if (debt <= 0) return 0;
  return roundCents(Math.min(debt, Math.max(config.minimumPaymentFloor, debt * config.minimumPaymentRate)));
}

// ── Step 0: calendar ──

function startMonth(state: PlayerState): PlayerState {
  const month = state.month + 1;
  const age = month % MONTHS_PER_YEAR === 0 ? state.profile.age + 1 : state.profile.age;
  return { ...state, month, profile: { ...state.profile, age } };
}

// ── Step 1: income ──

export function applyIncome(state: PlayerState, ctx: EngineContext): { state: PlayerState; income: number } {
  const { config } = ctx;
  let next = state;
  let income = 0;

  const salary = next.employment?.incomePerMonth ?? 0;
  if (salary > 0) {
    next = credit(next, salary);
    income += salary;
  }

  const sideJob = next.sideJob;
  if (sideJob) {
    if (sideJob.incomePerMonth > 0) {
      next = credit(next, sideJob.incomePerMonth);
      income += sideJob.incomePerMonth;
    }
    // Working through school costs free time and, past a safe load, grades
    if (next.employment?.kind === 'education') {
      next = adjustWellbeing(next, -config.studentWorkWellbeingCost);
      if (next.academics) {
        const excessHours = Math.max(0, sideJob.hoursPerWeek - config.gpaSafeHoursPerWeek);
        const gpa = Math.max(0, roundCents(next.academics.gpa - excessHours * config.gpaPenaltyPerHour));
        next = { ...next, academics: { gpa } };
      }
    }
  }

  // Career transitions: graduation, the end of a service term, or reaching career age
  const employment = next.employment;
  const termEnded = employment?.endsMonth !== undefined && next.month >= employment.endsMonth;
  const milestone: QueuedEvent = { kind: 'career_milestone', queuedMonth: next.month };
  if (employment?.kind === 'education') {
    if (termEnded) next = { ...next, employment: null, queuedEvents: [...next.queuedEvents, milestone] };
  } else if (
    employment?.kind !== 'career'
    && (termEnded || next.profile.age >= config.careerTransitionAge)
    && !next.queuedEvents.some(e => e.kind === 'career_milestone')
  ) {
    next = { ...next, queuedEvents: [...next.queuedEvents, milestone] };
  }

  return { state: next, income: roundCents(income) };
}

// ── Step 2: expenses ──

export interface ExpenseOutcome {
  state: PlayerState;
  expenses: number;
  wantsSpending: number;
  savingsTransfer: number;
  negativeCash: boolean;
}

export function applyExpenses(state: PlayerState, ctx: EngineContext, income: number): ExpenseOutcome {
  const { config, tables } = ctx;
  const expenses = roundCents(getLivingCost(tables, state.profile.pathId, state.profile.age) + getMonthlyAssetCosts(state));
  let next = expenses > 0 ? debit(state, expenses, { allowOverdraft: true }) : state;

  let wantsSpending = 0;
  let savingsTransfer = 0;
  const surplus = roundCents(income - expenses);
  const budget = next.budget;
  if (budget && surplus > 0) {
    wantsSpending = roundCents(surplus * budget.wants / 100);
    if (wantsSpending > 0) {
      next = debit(next, wantsSpending, { allowOverdraft: true });
      next = adjustWellbeing(next, config.wantsWellbeingBonus);
    }
    const savingsTarget = roundCents(surplus * budget.savings / 100);
    savingsTransfer = roundCents(Math.min(savingsTarget, Math.max(0, next.cash)));
    if (savingsTransfer > 0) {
      next = depositSavings(debit(next, savingsTransfer, { overdraftFloor: config.overdraftFloor }), savingsTransfer);
    }
  }

  const negativeCash = next.cash < 0;
  if (negativeCash) {
    next = adjustCreditScore(next, -config.negativeCashCreditPenalty);
    next = adjustWellbeing(next, -config.negativeCashWellbeingPenalty);
  }

  return { state: next, expenses, wantsSpending, savingsTransfer, negativeCash };
}

// ── Step 3: debt service ──

export interface DebtServiceOutcome {
  state: PlayerState;
  interestAccrued: number;
  debtPayment: number;
  missedPayment: boolean;
}

export function applyDebtService(state: PlayerState, ctx: EngineContext): DebtServiceOutcome {
  const { config } = ctx;
  let next = state;
  let interestAccrued = 0;
  let debtPayment = 0;
  let missedPayment = false;

  if (next.debt > 0) {
    const before = next.debt;
    next = accrueInterest(next, config.debtMonthlyRate);
    interestAccrued = roundCents(next.debt - before);

    const due = getMinimumPayment(next.debt, config);
    if (next.cash >= due) {
      next = payDownDebt(debit(next, due), due);
      next = adjustCreditScore(next, config.onTimePaymentCreditBonus);
      debtPayment = due;
    } else {
      missedPayment = true;
      next = {
        ...next,
        missedPayments: next.missedPayments + 1,
        lastMissedPaymentMonth: next.month,
      };
      next = adjustCreditScore(next, -config.missedPaymentCreditPenalty);
    }
  }

  if (next.savings > 0 && config.savingsMonthlyRate > 0) {
    const interest = roundCents(next.savings * config.savingsMonthlyRate);
    if (interest > 0) next = depositSavings(next, interest);
  }

  return { state: next, interestAccrued, debtPayment, missedPayment };
}

// ── Step 4: asset depreciation ──

export function applyAssetDepreciation(state: PlayerState, ctx: EngineContext): PlayerState {
  const { config, tables } = ctx;
  const ids = Object.keys(state.activeAssets);
  if (ids.length === 0) return state;

  const activeAssets = { ...state.activeAssets };
  const queuedEvents = [...state.queuedEvents];
  for (const id of ids) {
    const asset = activeAssets[id];
    const vehicle = tables.vehicles.find(v => v.id === asset.catalogId);
    if (!vehicle) throw new UnknownCatalogEntryError('vehicles', asset.catalogId);
    const condition = Math.max(0, asset.condition - vehicle.monthlyDecay);
    activeAssets[id] = { ...asset, condition };
    const crossed = asset.condition >= config.repairThreshold && condition < config.repairThreshold;
    if (crossed && !queuedEvents.some(e => e.kind === 'asset_repair' && e.assetId === id)) {
      queuedEvents.push({ kind: 'asset_repair', assetId: id, queuedMonth: state.month });
    }
  }
  return recomputeNetWorth({ ...state, activeAssets, queuedEvents });
}

// ── Step 5: events ──

function buildRepairDecision(
  state: PlayerState,
  assetId: string,
  ctx: EngineContext,
  streams: RngStreams
): AssetRepairDecision | null {
  const asset = state.activeAssets[assetId];
  if (!asset) return null;
  return {
    kind: 'asset_repair',
    assetId,
    condition: asset.condition,
    repairCost: roundCents(rollAmount(ctx.config.repairCostRange, streams.assets)),
    saleValue: getAssetSaleValue(state, assetId, ctx.config),
    options: [
      { id: 'repair', label: 'Repair it' },
      { id: 'sell', label: 'Sell it' },
      { id: 'defer', label: 'Put it off' },
    ],
    raisedMonth: state.month,
  };
}

function buildCareerDecision(state: PlayerState, ctx: EngineContext): CareerChoiceDecision | null {
  const path = ctx.tables.paths[state.profile.pathId];
  const careers = ctx.tables.careers.filter(c => c.track === path.careerTrack);
  if (careers.length === 0) return null;
  return {
    kind: 'career_choice',
    track: path.careerTrack,
    options: careers.map(c => ({ id: c.id, label: `${c.title} (${c.startingSalary}/yr)` })),
    raisedMonth: state.month,
  };
}

export function buildEventDecision(state: PlayerState, event: LifeEventDefinition): EventResponseDecision {
  return {
    kind: 'event_response',
    eventId: event.id,
    title: event.title,
    description: event.description,
    options: (event.choices ?? []).map(c => ({ id: c.id, label: c.label })),
    raisedMonth: state.month,
  };
}

export interface EventStepOutcome {
  state: PlayerState;
  resolved: ResolvedEvent[];
  pending: PendingDecision | null;
}

export function applyEventStep(state: PlayerState, ctx: EngineContext, streams: RngStreams): EventStepOutcome {
  let next = state;

  // Queued notices come first; one that no longer applies is dropped
  while (next.queuedEvents.length > 0) {
    const [queued, ...rest] = next.queuedEvents;
    next = { ...next, queuedEvents: rest };
    const pending = queued.kind === 'asset_repair'
      ? (queued.assetId ? buildRepairDecision(next, queued.assetId, ctx, streams) : null)
      : buildCareerDecision(next, ctx);
    if (pending) return { state: next, resolved: [], pending };
  }

  const event = drawEvent(next, ctx.tables.events, ctx.config.eventChance, streams.events);
  if (!event) return { state: next, resolved: [], pending: null };

  next = markFired(next, event.id);
  if (event.requiresInput && event.choices && event.choices.length > 0) {
    return { state: next, resolved: [], pending: buildEventDecision(next, event) };
  }

  const applied = applyEffects(next, event.effects, streams.effects);
  return {
    state: applied.state,
    resolved: [{ eventId: event.id, title: event.title, month: next.month, effects: applied.effects }],
    pending: null,
  };
}

// ── Step 6: drift ──

export function applyDrift(state: PlayerState, ctx: EngineContext, cashAtMonthStart: number): PlayerState {
  const netCashFlow = state.cash - cashAtMonthStart;
  return netCashFlow >= 0
    ? adjustWellbeing(state, ctx.config.surplusWellbeingGain)
    : adjustWellbeing(state, -ctx.config.deficitWellbeingLoss);
}

// ── One month ──

export interface MonthOutcome {
  state: PlayerState;
  summary: MonthSummary;
  pending: PendingDecision | null;
}

export function simulateMonth(state: PlayerState, ctx: EngineContext): MonthOutcome {
  const cashAtMonthStart = state.cash;
  let next = startMonth(state);
  const streams = createRngStreams(next.seed, next.month);

  const income = applyIncome(next, ctx);
  const expenses = applyExpenses(income.state, ctx, income.income);
  const debt = applyDebtService(expenses.state, ctx);
  next = applyAssetDepreciation(debt.state, ctx);
  const events = applyEventStep(next, ctx, streams);
  next = applyDrift(events.state, ctx, cashAtMonthStart);
  const progress = evaluateProgress(next, ctx.tables.achievements, ctx.tables.lifeGoals);
  next = recomputeNetWorth(progress.state);

  assertInvariants(next, state);

  return {
    state: next,
    pending: events.pending,
    summary: {
      month: next.month,
      income: income.income,
      expenses: expenses.expenses,
      wantsSpending: expenses.wantsSpending,
      savingsTransfer: expenses.savingsTransfer,
      interestAccrued: debt.interestAccrued,
      debtPayment: debt.debtPayment,
      missedPayment: debt.missedPayment,
      negativeCash: expenses.negativeCash,
      eventsResolved: events.resolved,
      achievementsUnlocked: progress.achievementsUnlocked,
      goalsCompleted: progress.goalsCompleted,
    },
  };
}

// ── Batches ──

function runMonths(state: PlayerState, months: number, monthsRequested: number, ctx: EngineContext): AdvanceReport {
  let current: PlayerState = { ...state, resumeMonths: 0 };
  const summaries: MonthSummary[] = [];
  let pendingDecision: PendingDecision | null = null;

  for (let i = 0; i < months; i++) {
    const outcome = simulateMonth(current, ctx);
    current = outcome.state;
    summaries.push(outcome.summary);
    if (outcome.pending) {
      // Halt at this month boundary; the months already applied stay applied
      pendingDecision = outcome.pending;
      current = { ...current, pendingDecision, resumeMonths: months - (i + 1) };
      break;
    }
  }

  return {
    monthsRequested,
    monthsCompleted: summaries.length,
    months: summaries,
    eventsResolved: summaries.flatMap(s => s.eventsResolved),
    achievementsUnlocked: summaries.flatMap(s => s.achievementsUnlocked),
    goalsCompleted: summaries.flatMap(s => s.goalsCompleted),
    pendingDecision,
    state: current,
  };
}

export function isAllowedDuration(months: number): boolean {
  return (ALLOWED_ADVANCE_MONTHS as readonly number[]).includes(months);
}

/**
 * Advance the player by 1, 3 or 6 months. Stops early, after the month in which a
 * decision becomes pending; `resumeMonths` on the returned state holds the rest.
 */
export function advance(state: PlayerState, monthsRequested: number, ctx: EngineContext): AdvanceReport {
  if (!isAllowedDuration(monthsRequested)) {
    throw new InvalidDurationError(monthsRequested, ALLOWED_ADVANCE_MONTHS);
  }
  if (state.pendingDecision) {
    throw new PendingDecisionError(state.pendingDecision.kind);
  }
  return runMonths(state, monthsRequested, monthsRequested, ctx);
}

/** Apply the months a halted batch left over once its decision is resolved */
export function resume(state: PlayerState, ctx: EngineContext): AdvanceReport {
  if (state.pendingDecision) {
    throw new PendingDecisionError(state.pendingDecision.kind);
  }
  return runMonths(state, Math.max(0, state.resumeMonths), state.resumeMonths, ctx);
}
