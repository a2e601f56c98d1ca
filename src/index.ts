export * from './engine/types';
export * from './engine/errors';
export { createGameEngine } from './engine/engine';
export type { GameEngine, GameEngineOptions } from './engine/engine';
export type { CharacterInput } from './engine/character';
export * as ledger from './engine/ledger';
export { checkInvariants, assertInvariants } from './engine/invariants';
export { findNewAchievements, evaluateProgress } from './engine/achievements';
export { SeededRng, createRngStreams, generateRandomSeed } from './engine/rng';
export {
  ALLOWED_ADVANCE_MONTHS,
  DEFAULT_SIMULATION_CONFIG,
  SNAPSHOT_VERSION,
  resolveSimulationConfig,
} from './data/gameConfig';
export type { AdvanceMonths, SimulationConfig } from './data/gameConfig';
export { createDataTables } from './data/tables';
export { saveSnapshot, loadSnapshot } from './store/snapshot';
export type { SnapshotEnvelope } from './store/snapshot';
export { migrateSnapshot } from './store/migrations';
export { createGameStore, createMemoryStorage } from './store/gameStore';
export type { GameStore, GameStoreState, GameStoreOptions } from './store/gameStore';
export { playTurn } from './services/session';
export type { TurnResult } from './services/session';
export {
  ScriptedDecisionProvider,
  DefaultDecisionProvider,
} from './services/decisionProviders';
export type { DecisionProvider } from './services/decisionProviders';
export {
  ConsolePresenter,
  HeadlessPresenter,
  StorePresenter,
  formatAdvanceReport,
  formatResolution,
} from './services/presentation';
export type { Presenter, PresentationState } from './services/presentation';
