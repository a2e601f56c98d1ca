import type {
  AdvanceReport,
  DataTables,
  Decision,
  DecisionChoice,
  PathId,
  PlayerState,
  ResolutionResult,
} from './types';
import type { SimulationConfig } from '../data/gameConfig';
import { resolveSimulationConfig } from '../data/gameConfig';
import { createDataTables, deepFreeze } from '../data/tables';
import { advance, resume, type EngineContext } from './simulation';
import { getAvailableDecisions, resolveDecision } from './decisions';
import { createCharacter, type CharacterInput } from './character';

export interface GameEngineOptions {
  tables?: DataTables;
  config?: Partial<SimulationConfig>;
}

/** Engine bound to one set of tables and tuning values. Every call is pure. */
export interface GameEngine {
  readonly tables: DataTables;
  readonly config: SimulationConfig;
  createCharacter(input: CharacterInput, pathId: PathId): PlayerState;
  advance(state: PlayerState, months: number): AdvanceReport;
  resume(state: PlayerState): AdvanceReport;
  resolveDecision(state: PlayerState, decision: Decision, choice: DecisionChoice): ResolutionResult;
  availableDecisions(state: PlayerState): Decision[];
}

export function createGameEngine(options: GameEngineOptions = {}): GameEngine {
  const ctx: EngineContext = {
    tables: options.tables ? deepFreeze(structuredClone(options.tables)) : createDataTables(),
    config: Object.freeze(resolveSimulationConfig(options.config)),
  };

  return {
    tables: ctx.tables,
    config: ctx.config,
    createCharacter: (input, pathId) => createCharacter(input, pathId, ctx.tables, ctx.config),
    advance: (state, months) => advance(state, months, ctx),
    resume: state => resume(state, ctx),
    resolveDecision: (state, decision, choice) => resolveDecision(state, decision, choice, ctx),
    availableDecisions: state => getAvailableDecisions(state),
  };
}
