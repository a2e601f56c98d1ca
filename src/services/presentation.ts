import { createStore, type StoreApi } from 'zustand/vanilla';
import type { AdvanceReport, PendingDecision, ResolutionResult } from '../engine/types';
import { formatMoney } from '../engine/utils';

/** Receives engine output. The engine itself never formats text. */
export interface Presenter {
  presentAdvance(report: AdvanceReport): void;
  presentResolution(result: ResolutionResult): void;
}

// ── Text ──

function describePending(pending: PendingDecision): string {
  switch (pending.kind) {
    case 'event_response':
      return `${pending.title}: ${pending.description}`;
    case 'asset_repair':
      return `Vehicle needs repair (condition ${pending.condition}%): repair for ${formatMoney(pending.repairCost)} or sell for ${formatMoney(pending.saleValue)}`;
    case 'career_choice':
      return `Time to choose a career (${pending.options.length} options)`;
  }
}

export function formatAdvanceReport(report: AdvanceReport): string[] {
  const { state } = report;
  const lines: string[] = [];
  lines.push(`Advanced ${report.monthsCompleted} of ${report.monthsRequested} month(s), now month ${state.month} (age ${state.profile.age})`);
  for (const m of report.months) {
    let line = `  Month ${m.month}: income ${formatMoney(m.income)}, expenses ${formatMoney(m.expenses)}`;
    if (m.debtPayment > 0) line += `, debt payment ${formatMoney(m.debtPayment)}`;
    if (m.missedPayment) line += ', MISSED PAYMENT';
    lines.push(line);
    for (const e of m.eventsResolved) lines.push(`    Event: ${e.title}`);
  }
  for (const id of report.achievementsUnlocked) lines.push(`  Achievement unlocked: ${id}`);
  for (const id of report.goalsCompleted) lines.push(`  Goal completed: ${id}`);
  lines.push(`  Cash ${formatMoney(state.cash)} | Savings ${formatMoney(state.savings)} | Debt ${formatMoney(state.debt)} | Net worth ${formatMoney(state.netWorth)}`);
  lines.push(`  Credit ${state.creditScore} | Well-being ${state.wellbeing}`);
  if (report.pendingDecision) lines.push(`  Decision needed: ${describePending(report.pendingDecision)}`);
  return lines;
}

export function formatResolution(result: ResolutionResult): string[] {
  const lines = [`Resolved ${result.decision.kind}`];
  const { effects } = result;
  if (effects.cash !== 0) lines.push(`  Cash ${effects.cash > 0 ? '+' : '-'}${formatMoney(Math.abs(effects.cash))}`);
  if (effects.debt !== 0) lines.push(`  Debt ${effects.debt > 0 ? '+' : '-'}${formatMoney(Math.abs(effects.debt))}`);
  if (effects.wellbeing !== 0) lines.push(`  Well-being ${effects.wellbeing > 0 ? '+' : ''}${effects.wellbeing}`);
  for (const id of result.achievementsUnlocked) lines.push(`  Achievement unlocked: ${id}`);
  return lines;
}

// ── Variants ──

export class ConsolePresenter implements Presenter {
  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  presentAdvance(report: AdvanceReport): void {
    for (const line of formatAdvanceReport(report)) this.write(line);
  }

  presentResolution(result: ResolutionResult): void {
    for (const line of formatResolution(result)) this.write(line);
  }
}

/** Records everything in memory; for tests and batch runs */
export class HeadlessPresenter implements Presenter {
  readonly reports: AdvanceReport[] = [];
  readonly resolutions: ResolutionResult[] = [];

  presentAdvance(report: AdvanceReport): void {
    this.reports.push(report);
  }

  presentResolution(result: ResolutionResult): void {
    this.resolutions.push(result);
  }
}

export type PresentedEntry =
  | { type: 'advance'; report: AdvanceReport }
  | { type: 'resolution'; result: ResolutionResult };

export interface PresentationState {
  latestReport: AdvanceReport | null;
  latestResolution: ResolutionResult | null;
  history: PresentedEntry[];
}

/** Publishes output to a zustand store a UI can subscribe to */
export class StorePresenter implements Presenter {
  readonly store: StoreApi<PresentationState>;

  constructor(store?: StoreApi<PresentationState>) {
    this.store = store ?? createStore<PresentationState>()(() => ({
      latestReport: null,
      latestResolution: null,
      history: [],
    }));
  }

  presentAdvance(report: AdvanceReport): void {
    this.store.setState(s => ({
      latestReport: report,
      history: [...s.history, { type: 'advance', report }],
    }));
  }

  presentResolution(result: ResolutionResult): void {
    this.store.setState(s => ({
      latestResolution: result,
      history: [...s.history, { type: 'resolution', result }],
    }));
  }
}
