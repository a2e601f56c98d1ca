import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type {
  AdvanceReport,
  Decision,
  DecisionChoice,
  PathId,
  PlayerState,
  ResolutionResult,
} from '../engine/types';
import type { GameEngine } from '../engine/engine';
import type { CharacterInput } from '../engine/character';
import { SNAPSHOT_VERSION } from '../data/gameConfig';
import { DecisionNotAvailableError } from '../engine/errors';
import { migrateSnapshot } from './migrations';
import { restoreState } from './snapshot';
import { isRecord } from './validation';

export const GAME_STORE_NAME = 'money-journey-save';

export interface GameStoreState {
  player: PlayerState | null;
  lastReport: AdvanceReport | null;
  lastResolution: ResolutionResult | null;

  newGame: (input: CharacterInput, pathId: PathId) => PlayerState;
  advance: (months: number) => AdvanceReport;
  resume: () => AdvanceReport;
  resolve: (decision: Decision, choice: DecisionChoice) => ResolutionResult;
  reset: () => void;
}

type PersistedGame = Pick<GameStoreState, 'player'>;

export interface GameStoreOptions {
  engine: GameEngine;
  storage?: StateStorage;
  name?: string;
}

/** Synchronous in-process storage for hosts without localStorage */
export function createMemoryStorage(initial: Record<string, string> = {}): StateStorage {
  const items = new Map(Object.entries(initial));
  return {
    getItem: key => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
    removeItem: key => {
      items.delete(key);
    },
  };
}

function readPersistedPlayer(persisted: unknown): unknown {
  return isRecord(persisted) ? persisted.player ?? null : null;
}

export function createGameStore({ engine, storage = createMemoryStorage(), name = GAME_STORE_NAME }: GameStoreOptions) {
  const requirePlayer = (player: PlayerState | null): PlayerState => {
    if (!player) throw new DecisionNotAvailableError('No game in progress');
    return player;
  };

  return createStore<GameStoreState>()(
    persist(
      (set, get) => ({
        player: null,
        lastReport: null,
        lastResolution: null,

        newGame: (input, pathId) => {
          const player = engine.createCharacter(input, pathId);
          set({ player, lastReport: null, lastResolution: null });
          return player;
        },

        advance: months => {
          const report = engine.advance(requirePlayer(get().player), months);
          set({ player: report.state, lastReport: report });
          return report;
        },

        resume: () => {
          const report = engine.resume(requirePlayer(get().player));
          set({ player: report.state, lastReport: report });
          return report;
        },

        resolve: (decision, choice) => {
          const result = engine.resolveDecision(requirePlayer(get().player), decision, choice);
          set({ player: result.state, lastResolution: result });
          return result;
        },

        reset: () => set({ player: null, lastReport: null, lastResolution: null }),
      }),
      {
        name,
        version: SNAPSHOT_VERSION,
        storage: createJSONStorage<PersistedGame>(() => storage),
        partialize: (state): PersistedGame => ({ player: state.player }),
        migrate: (persisted, version): PersistedGame => {
          const raw = readPersistedPlayer(persisted);
          if (raw === null) return { player: null };
          return { player: restoreState(migrateSnapshot(raw, version, engine.tables)) };
        },
        merge: (persisted, current) => {
          const raw = readPersistedPlayer(persisted);
          return { ...current, player: raw === null ? null : restoreState(raw) };
        },
        onRehydrateStorage: () => (_state, error) => {
          if (error) console.error('Failed to restore saved game:', error);
        },
      }
    )
  );
}

export type GameStore = ReturnType<typeof createGameStore>;
