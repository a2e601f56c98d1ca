import type {
  AssetRepairDecision,
  CareerChoiceDecision,
  Decision,
  DecisionChoice,
  EventResponseDecision,
} from '../engine/types';
import { NoChoiceProvidedError } from '../engine/errors';

/** Source of player choices: a UI, a script, or an automatic policy */
export interface DecisionProvider {
  choose(decision: Decision): DecisionChoice;
}

/** Replays a fixed list of choices in order. Runs dry with NoChoiceProvidedError. */
export class ScriptedDecisionProvider implements DecisionProvider {
  private readonly queue: DecisionChoice[];
  readonly asked: Decision[] = [];

  constructor(choices: DecisionChoice[]) {
    this.queue = [...choices];
  }

  get remaining(): number {
    return this.queue.length;
  }

  choose(decision: Decision): DecisionChoice {
    this.asked.push(decision);
    const next = this.queue.shift();
    if (!next) throw new NoChoiceProvidedError(decision.kind);
    return next;
  }
}

function firstOption(decision: EventResponseDecision | CareerChoiceDecision): string {
  const first = decision.options[0];
  if (!first) throw new NoChoiceProvidedError(decision.kind);
  return first.id;
}

type RepairOptionId = 'repair' | 'sell' | 'defer';

function isRepairOption(id: string): id is RepairOptionId {
  return id === 'repair' || id === 'sell' || id === 'defer';
}

/** Defer when that is offered, otherwise the first listed option */
function repairOption(decision: AssetRepairDecision): RepairOptionId {
  const offered = decision.options.map(o => o.id).filter(isRepairOption);
  if (offered.includes('defer')) return 'defer';
  const first = offered[0];
  if (!first) throw new NoChoiceProvidedError(decision.kind);
  return first;
}

/**
 * Conservative defaults: a 50/30/20 budget, no vehicle purchase, quitting any side job,
 * the first listed option on events, and deferring repairs where that is allowed.
 */
export class DefaultDecisionProvider implements DecisionProvider {
  choose(decision: Decision): DecisionChoice {
    switch (decision.kind) {
      case 'budget_allocation':
        return { kind: 'budget_allocation', allocation: { needs: 50, wants: 30, savings: 20 } };
      case 'vehicle':
        return { kind: 'vehicle', action: 'none' };
      case 'part_time_job':
        return { kind: 'part_time_job', action: 'quit' };
      case 'asset_repair':
        return { kind: 'asset_repair', optionId: repairOption(decision) };
      case 'event_response':
        return { kind: 'event_response', optionId: firstOption(decision) };
      case 'career_choice':
        return { kind: 'career_choice', optionId: firstOption(decision) };
    }
  }
}
