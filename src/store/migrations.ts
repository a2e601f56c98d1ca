/**
 * Save-version migrations for Money Journey snapshots.
 *
 * Each step takes the parsed state of one version and returns the next version's
 * shape. Steps run in order until the state reaches SNAPSHOT_VERSION.
 */

import type { DataTables } from '../engine/types';
import { SNAPSHOT_VERSION, WEEKS_PER_MONTH } from '../data/gameConfig';
import { roundCents } from '../engine/utils';
import { SnapshotError } from '../engine/errors';
import { isRecord, readNumber, readRecord, type UnknownRecord } from './validation';

type MigrationStep = (state: UnknownRecord, tables: DataTables) => UnknownRecord;

// --- v1 → v2: single vehicle fields become activeAssets; adds sideJob ---

export function migrateV1ToV2(state: UnknownRecord, tables: DataTables): UnknownRecord {
  const { vehicle, vehicleCondition, partTimeJob, ...rest } = state;
  const activeAssets: UnknownRecord = {};

  if (typeof vehicle === 'string' && vehicle.length > 0) {
    const def = tables.vehicles.find(v => v.id === vehicle);
    if (!def) throw new SnapshotError(`Cannot migrate v1 snapshot: unknown vehicle "${vehicle}"`);
    activeAssets[`${def.id}-m0`] = {
      catalogId: def.id,
      kind: 'vehicle',
      condition: typeof vehicleCondition === 'number' ? Math.max(0, Math.min(100, vehicleCondition)) : 100,
      purchasePrice: def.purchaseCost,
      monthlyCost: def.monthlyCost,
      acquiredMonth: 0,
    };
  }

  let sideJob: UnknownRecord | null = null;
  if (typeof partTimeJob === 'string' && partTimeJob.length > 0) {
    const job = tables.partTimeJobs.find(j => j.id === partTimeJob);
    if (job) {
      sideJob = {
        jobId: job.id,
        title: job.title,
        incomePerMonth: roundCents(job.hourlyWage * job.hoursPerWeek * WEEKS_PER_MONTH),
        hoursPerWeek: job.hoursPerWeek,
      };
    } else {
      console.warn(`v1→v2 migration: dropping unknown part-time job "${partTimeJob}"`);
    }
  }

  return {
    ...rest,
    version: 2,
    activeAssets,
    sideJob,
    queuedEvents: Array.isArray(rest.queuedEvents) ? rest.queuedEvents : [],
    resumeMonths: typeof rest.resumeMonths === 'number' ? rest.resumeMonths : 0,
  };
}

const MIGRATIONS: Record<number, MigrationStep> = {
  1: migrateV1ToV2,
};

/** Upgrade a parsed state of any supported version to SNAPSHOT_VERSION */
export function migrateSnapshot(raw: unknown, fromVersion: number, tables: DataTables): UnknownRecord {
  if (!Number.isInteger(fromVersion) || fromVersion < 1) {
    throw new SnapshotError(`Unsupported snapshot version ${fromVersion}`);
  }
  if (fromVersion > SNAPSHOT_VERSION) {
    throw new SnapshotError(`Snapshot version ${fromVersion} is newer than supported version ${SNAPSHOT_VERSION}`);
  }

  let state = readRecord(raw, 'state');
  for (let version = fromVersion; version < SNAPSHOT_VERSION; version++) {
    const step = MIGRATIONS[version];
    if (!step) throw new SnapshotError(`No migration from snapshot version ${version}`);
    state = step(state, tables);
    console.warn(`Migrated snapshot from v${version} to v${version + 1}`);
  }
  return { ...state, version: SNAPSHOT_VERSION };
}

/** Version a raw state claims, defaulting to 1 for saves that predate the field */
export function detectStateVersion(raw: unknown): number {
  if (!isRecord(raw) || raw.version === undefined) return 1;
  return readNumber(raw, 'version', 'state');
}
