import type { DataTables, PlayerState } from '../engine/types';
import { SNAPSHOT_VERSION } from '../data/gameConfig';
import { createDataTables } from '../data/tables';
import { checkInvariants } from '../engine/invariants';
import { SnapshotError } from '../engine/errors';
import { detectStateVersion, migrateSnapshot } from './migrations';
import { parsePlayerState, readRecord, readString } from './validation';

export interface SnapshotEnvelope {
  version: number;
  savedAt: string; // ISO timestamp
  state: PlayerState;
}

/** Serialize a player into an opaque save token */
export function saveSnapshot(state: PlayerState, savedAt: Date = new Date()): string {
  const violations = checkInvariants(state);
  if (violations.length > 0) {
    throw new SnapshotError(`Refusing to save an invalid state: ${violations.join('; ')}`);
  }
  const envelope: SnapshotEnvelope = {
    version: SNAPSHOT_VERSION,
    savedAt: savedAt.toISOString(),
    state,
  };
  return JSON.stringify(envelope);
}

/**
 * Restore a player from a save token. Older versions are migrated; the result is
 * validated field by field and against the state invariants.
 */
export function loadSnapshot(token: string, tables: DataTables = createDataTables()): PlayerState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(token);
  } catch (e) {
    throw new SnapshotError(`Snapshot is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const envelope = readRecord(parsed, 'snapshot');
  const rawVersion = envelope.version;
  const version = typeof rawVersion === 'number' ? rawVersion : detectStateVersion(envelope.state);
  readString(envelope, 'savedAt', 'snapshot');

  const migrated = migrateSnapshot(envelope.state, version, tables);
  return restoreState(migrated);
}

/** Validate an already-parsed state of the current version */
export function restoreState(raw: unknown): PlayerState {
  const state = parsePlayerState(raw);
  if (state.version !== SNAPSHOT_VERSION) {
    throw new SnapshotError(`Expected snapshot version ${SNAPSHOT_VERSION}, got ${state.version}`);
  }
  const violations = checkInvariants(state);
  if (violations.length > 0) {
    throw new SnapshotError(`Snapshot breaks state invariants: ${violations.join('; ')}`);
  }
  return state;
}
