import type { AdvanceReport, MonthSummary, PlayerState, ResolutionResult } from '../engine/types';
import type { GameEngine } from '../engine/engine';
import type { DecisionProvider } from './decisionProviders';
import type { Presenter } from './presentation';

export interface TurnResult {
  state: PlayerState;
  reports: AdvanceReport[];
  resolutions: ResolutionResult[];
  months: MonthSummary[];
}

/**
 * Advance a full request of months, asking the provider whenever the engine halts
 * on a decision, then resuming the rest of the batch. Provider errors propagate.
 */
export function playTurn(
  engine: GameEngine,
  state: PlayerState,
  months: number,
  provider: DecisionProvider,
  presenter?: Presenter
): TurnResult {
  const reports: AdvanceReport[] = [];
  const resolutions: ResolutionResult[] = [];

  let report = engine.advance(state, months);
  reports.push(report);
  presenter?.presentAdvance(report);

  while (report.pendingDecision) {
    const decision = report.pendingDecision;
    const choice = provider.choose(decision);
    const resolution = engine.resolveDecision(report.state, decision, choice);
    resolutions.push(resolution);
    presenter?.presentResolution(resolution);

    if (resolution.resumeMonths === 0) {
      return finish(resolution.state, reports, resolutions);
    }
    report = engine.resume(resolution.state);
    reports.push(report);
    presenter?.presentAdvance(report);
  }

  return finish(report.state, reports, resolutions);
}

function finish(state: PlayerState, reports: AdvanceReport[], resolutions: ResolutionResult[]): TurnResult {
  return { state, reports, resolutions, months: reports.flatMap(r => r.months) };
}
