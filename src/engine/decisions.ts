// Decision resolution. Player-initiated choices (budget, vehicle, part-time job)
// and the pending decisions raised by the monthly loop.

import type {
  AppliedEffects,
  AssetRepairDecision,
  BudgetAllocation,
  CareerChoiceDecision,
  Decision,
  DecisionChoice,
  EventResponseDecision,
  PendingDecision,
  PlayerState,
  ResolvedEvent,
  ResolutionResult,
} from './types';
import type { EngineContext } from './simulation';
import { getAssetSaleValue } from './simulation';
import { WEEKS_PER_MONTH } from '../data/gameConfig';
import {
  addAsset,
  addDebt,
  adjustWellbeing,
  credit,
  debit,
  recomputeNetWorth,
  removeAsset,
} from './ledger';
import { applyEffects } from './events';
import { evaluateProgress } from './achievements';
import { assertInvariants } from './invariants';
import { createRngStreams } from './rng';
import { ownedVehicleIds, totalMonthlyIncome } from './helpers';
import { roundCents } from './utils';
import {
  DecisionNotAvailableError,
  InvalidAllocationError,
  UnknownCatalogEntryError,
} from './errors';

const ALLOCATION_TOLERANCE = 1e-9;

export function diffEffects(before: PlayerState, after: PlayerState): AppliedEffects {
  return {
    cash: roundCents(after.cash - before.cash),
    debt: roundCents(after.debt - before.debt),
    savings: roundCents(after.savings - before.savings),
    creditScore: after.creditScore - before.creditScore,
    wellbeing: after.wellbeing - before.wellbeing,
    income: roundCents(totalMonthlyIncome(after) - totalMonthlyIncome(before)),
  };
}

// ── Validation ──

export function validateAllocation(allocation: BudgetAllocation): void {
  const shares = [allocation.needs, allocation.wants, allocation.savings];
  if (shares.some(s => typeof s !== 'number' || !Number.isFinite(s))) {
    throw new InvalidAllocationError('Allocation shares must be finite numbers');
  }
  if (shares.some(s => s < 0)) {
    throw new InvalidAllocationError('Allocation shares cannot be negative');
  }
  const total = shares.reduce((sum, s) => sum + s, 0);
  if (Math.abs(total - 100) > ALLOCATION_TOLERANCE) {
    throw new InvalidAllocationError(`Allocation must sum to 100 (got ${total})`);
  }
}

function requirePending<K extends PendingDecision['kind']>(
  state: PlayerState,
  kind: K
): Extract<PendingDecision, { kind: K }> {
  const pending = state.pendingDecision;
  const matches = (p: PendingDecision): p is Extract<PendingDecision, { kind: K }> => p.kind === kind;
  if (!pending || !matches(pending)) {
    throw new DecisionNotAvailableError(`No pending ${kind} decision to resolve`);
  }
  return pending;
}

function requireOption(decision: PendingDecision, optionId: string): void {
  if (!decision.options.some(o => o.id === optionId)) {
    throw new DecisionNotAvailableError(`"${optionId}" is not an option for the pending ${decision.kind} decision`);
  }
}

// ── Availability ──

/** Decisions the player can make right now. A pending decision comes first. */
export function getAvailableDecisions(state: PlayerState): Decision[] {
  const decisions: Decision[] = [];
  if (state.pendingDecision) decisions.push(state.pendingDecision);
  decisions.push({ kind: 'budget_allocation' }, { kind: 'vehicle' });
  if (state.employment?.kind === 'education' || state.sideJob) {
    decisions.push({ kind: 'part_time_job' });
  }
  return decisions;
}

// ── Player-initiated ──

function applyBudget(state: PlayerState, allocation: BudgetAllocation): PlayerState {
  validateAllocation(allocation);
  return { ...state, budget: { ...allocation } };
}

function nextAssetId(state: PlayerState, catalogId: string): string {
  const base = `${catalogId}-m${state.month}`;
  let id = base;
  let n = 2;
  while (id in state.activeAssets) id = `${base}-${n++}`;
  return id;
}

function purchaseVehicle(state: PlayerState, vehicleId: string, ctx: EngineContext): PlayerState {
  const vehicle = ctx.tables.vehicles.find(v => v.id === vehicleId);
  if (!vehicle) throw new UnknownCatalogEntryError('vehicles', vehicleId);
  const pending = state.pendingDecision;
  if (pending?.kind === 'asset_repair') {
    throw new DecisionNotAvailableError('Resolve the pending repair before replacing the vehicle');
  }

  // Trade in the current vehicle
  let next = state;
  for (const assetId of ownedVehicleIds(next)) {
    const tradeIn = getAssetSaleValue(next, assetId, ctx.config);
    next = credit(removeAsset(next, assetId), tradeIn);
  }

  // Pay what cash covers down to the overdraft floor; the shortfall is financed
  const price = vehicle.purchaseCost;
  const { overdraftFloor } = ctx.config;
  const fromCash = roundCents(Math.min(price, Math.max(0, next.cash - overdraftFloor)));
  const financed = roundCents(price - fromCash);
  if (fromCash > 0) next = debit(next, fromCash, { overdraftFloor });
  if (financed > 0) next = addDebt(next, financed);

  return addAsset(next, nextAssetId(next, vehicle.id), {
    catalogId: vehicle.id,
    kind: 'vehicle',
    condition: 100,
    purchasePrice: price,
    monthlyCost: vehicle.monthlyCost,
    acquiredMonth: next.month,
  });
}

function sellAsset(state: PlayerState, assetId: string, ctx: EngineContext): PlayerState {
  if (!(assetId in state.activeAssets)) {
    throw new DecisionNotAvailableError(`No owned asset "${assetId}"`);
  }
  const saleValue = getAssetSaleValue(state, assetId, ctx.config);
  return credit(removeAsset(state, assetId), saleValue);
}

function takePartTimeJob(state: PlayerState, jobId: string, ctx: EngineContext): PlayerState {
  const job = ctx.tables.partTimeJobs.find(j => j.id === jobId);
  if (!job) throw new UnknownCatalogEntryError('partTimeJobs', jobId);
  if (state.employment?.kind !== 'education') {
    throw new DecisionNotAvailableError('Part-time jobs are only available while in education');
  }
  if (state.sideJob) {
    throw new DecisionNotAvailableError(`Already working as ${state.sideJob.title}`);
  }
  if (job.compatiblePaths.length > 0 && !job.compatiblePaths.includes(state.profile.pathId)) {
    throw new DecisionNotAvailableError(`${job.title} is not available on this path`);
  }
  return {
    ...state,
    sideJob: {
      jobId: job.id,
      title: job.title,
      incomePerMonth: roundCents(job.hourlyWage * job.hoursPerWeek * WEEKS_PER_MONTH),
      hoursPerWeek: job.hoursPerWeek,
    },
  };
}

function quitPartTimeJob(state: PlayerState): PlayerState {
  if (!state.sideJob) throw new DecisionNotAvailableError('No part-time job to quit');
  return { ...state, sideJob: null };
}

// ── Pending ──

function resolveEventResponse(
  state: PlayerState,
  pending: EventResponseDecision,
  optionId: string,
  ctx: EngineContext
): { state: PlayerState; event: ResolvedEvent } {
  requireOption(pending, optionId);
  const event = ctx.tables.events.find(e => e.id === pending.eventId);
  if (!event) throw new UnknownCatalogEntryError('events', pending.eventId);
  const choice = (event.choices ?? []).find(c => c.id === optionId);
  if (!choice) throw new DecisionNotAvailableError(`Event ${event.id} has no choice "${optionId}"`);

  // The month's effects stream is unused when the event waited for input
  const streams = createRngStreams(state.seed, pending.raisedMonth);
  const applied = applyEffects(state, choice.effects, streams.effects);
  return {
    state: applied.state,
    event: { eventId: event.id, title: event.title, month: state.month, choiceId: optionId, effects: applied.effects },
  };
}

function resolveAssetRepair(
  state: PlayerState,
  pending: AssetRepairDecision,
  optionId: 'repair' | 'sell' | 'defer',
  ctx: EngineContext
): PlayerState {
  requireOption(pending, optionId);
  const asset = state.activeAssets[pending.assetId];
  if (!asset) throw new DecisionNotAvailableError(`Asset ${pending.assetId} is no longer owned`);

  switch (optionId) {
    case 'repair': {
      const repaired = debit(state, pending.repairCost, { allowOverdraft: true });
      return recomputeNetWorth({
        ...repaired,
        activeAssets: { ...repaired.activeAssets, [pending.assetId]: { ...asset, condition: 100 } },
      });
    }
    case 'sell':
      return sellAsset(state, pending.assetId, ctx);
    case 'defer':
      return adjustWellbeing(state, -ctx.config.deferRepairWellbeingPenalty);
  }
}

function resolveCareerChoice(
  state: PlayerState,
  pending: CareerChoiceDecision,
  optionId: string,
  ctx: EngineContext
): PlayerState {
  requireOption(pending, optionId);
  const career = ctx.tables.careers.find(c => c.id === optionId);
  if (!career) throw new UnknownCatalogEntryError('careers', optionId);
  return {
    ...state,
    sideJob: null,
    employment: {
      kind: 'career',
      title: career.title,
      incomePerMonth: roundCents(career.startingSalary / 12),
      skillTags: [...career.skillTags],
      startedMonth: state.month,
    },
  };
}

// ── Entry point ──

/**
 * Apply a player's choice for a decision. Resolving the pending decision clears it
 * and reports the months its halted batch still owes; other decisions leave it alone.
 */
export function resolveDecision(
  state: PlayerState,
  decision: Decision,
  choice: DecisionChoice,
  ctx: EngineContext
): ResolutionResult {
  if (decision.kind !== choice.kind) {
    throw new DecisionNotAvailableError(`A ${choice.kind} choice cannot resolve a ${decision.kind} decision`);
  }

  let next: PlayerState;
  let resolvedPending = false;
  const events: ResolvedEvent[] = [];

  switch (choice.kind) {
    case 'budget_allocation':
      next = applyBudget(state, choice.allocation);
      break;
    case 'vehicle':
      if (choice.action === 'purchase') next = purchaseVehicle(state, choice.vehicleId, ctx);
      else if (choice.action === 'sell') {
        const pending = state.pendingDecision;
        if (pending?.kind === 'asset_repair' && pending.assetId === choice.assetId) {
          throw new DecisionNotAvailableError('Resolve the pending repair to sell this vehicle');
        }
        next = sellAsset(state, choice.assetId, ctx);
      } else next = state;
      break;
    case 'part_time_job':
      next = choice.action === 'take'
        ? takePartTimeJob(state, choice.jobId, ctx)
        : quitPartTimeJob(state);
      break;
    case 'event_response': {
      const outcome = resolveEventResponse(state, requirePending(state, 'event_response'), choice.optionId, ctx);
      next = outcome.state;
      events.push(outcome.event);
      resolvedPending = true;
      break;
    }
    case 'asset_repair':
      next = resolveAssetRepair(state, requirePending(state, 'asset_repair'), choice.optionId, ctx);
      resolvedPending = true;
      break;
    case 'career_choice':
      next = resolveCareerChoice(state, requirePending(state, 'career_choice'), choice.optionId, ctx);
      resolvedPending = true;
      break;
  }

  const resumeMonths = resolvedPending ? state.resumeMonths : 0;
  if (resolvedPending) {
    next = { ...next, pendingDecision: null, resumeMonths };
  }

  const progress = evaluateProgress(next, ctx.tables.achievements, ctx.tables.lifeGoals);
  next = recomputeNetWorth(progress.state);
  assertInvariants(next, state);

  return {
    decision,
    choice,
    effects: events[0]?.effects ?? diffEffects(state, next),
    resolvedPending,
    resumeMonths,
    achievementsUnlocked: progress.achievementsUnlocked,
    goalsCompleted: progress.goalsCompleted,
    state: next,
  };
}
