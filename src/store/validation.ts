// Structural checks for persisted player state. Every reader throws SnapshotError
// with the path of the first field that does not fit.

import type {
  Academics,
  AssetRecord,
  BudgetAllocation,
  CareerTrack,
  ChoiceOption,
  Employment,
  EmploymentKind,
  PathId,
  PendingDecision,
  PlayerProfile,
  PlayerState,
  QueuedEvent,
  SideJob,
} from '../engine/types';
import { SnapshotError } from '../engine/errors';

export type UnknownRecord = Record<string, unknown>;

const PATH_IDS: readonly PathId[] = [
  'four_year_college', 'community_college', 'trade_school', 'military', 'workforce', 'entrepreneur',
];
const CAREER_TRACKS: readonly CareerTrack[] = [
  'high_school_entry', 'associate_degree', 'trade_school', 'bachelor_degree', 'military', 'business',
];
const EMPLOYMENT_KINDS: readonly EmploymentKind[] = ['education', 'job', 'career'];
const REPAIR_OPTIONS = ['repair', 'sell', 'defer'] as const;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string): never {
  throw new SnapshotError(`Invalid snapshot: ${path} must be ${expected}`);
}

export function readRecord(value: unknown, path: string): UnknownRecord {
  if (!isRecord(value)) fail(path, 'an object');
  return value;
}

export function readNumber(obj: UnknownRecord, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) fail(`${path}.${key}`, 'a finite number');
  return value;
}

function readInteger(obj: UnknownRecord, key: string, path: string): number {
  const value = readNumber(obj, key, path);
  if (!Number.isInteger(value)) fail(`${path}.${key}`, 'an integer');
  return value;
}

export function readString(obj: UnknownRecord, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') fail(`${path}.${key}`, 'a string');
  return value;
}

function readStringArray(obj: UnknownRecord, key: string, path: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value)) fail(`${path}.${key}`, 'an array of strings');
  return value.map((item, i) => {
    if (typeof item !== 'string') fail(`${path}.${key}[${i}]`, 'a string');
    return item;
  });
}

function readNullable<T>(obj: UnknownRecord, key: string, read: (value: unknown) => T): T | null {
  const value = obj[key];
  return value === null || value === undefined ? null : read(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, path: string): T {
  const match = allowed.find(a => a === value);
  if (match === undefined) fail(path, `one of ${allowed.join(', ')}`);
  return match;
}

// ── Nested records ──

function readProfile(value: unknown): PlayerProfile {
  const obj = readRecord(value, 'state.profile');
  return {
    name: readString(obj, 'name', 'state.profile'),
    age: readInteger(obj, 'age', 'state.profile'),
    pathId: oneOf(PATH_IDS, obj.pathId, 'state.profile.pathId'),
  };
}

function readAsset(value: unknown, path: string): AssetRecord {
  const obj = readRecord(value, path);
  return {
    catalogId: readString(obj, 'catalogId', path),
    kind: oneOf(['vehicle'] as const, obj.kind, `${path}.kind`),
    condition: readNumber(obj, 'condition', path),
    purchasePrice: readNumber(obj, 'purchasePrice', path),
    monthlyCost: readNumber(obj, 'monthlyCost', path),
    acquiredMonth: readInteger(obj, 'acquiredMonth', path),
  };
}

function readEmployment(value: unknown): Employment {
  const path = 'state.employment';
  const obj = readRecord(value, path);
  const employment: Employment = {
    kind: oneOf(EMPLOYMENT_KINDS, obj.kind, `${path}.kind`),
    title: readString(obj, 'title', path),
    incomePerMonth: readNumber(obj, 'incomePerMonth', path),
    skillTags: readStringArray(obj, 'skillTags', path),
    startedMonth: readInteger(obj, 'startedMonth', path),
  };
  if (obj.endsMonth !== undefined) employment.endsMonth = readInteger(obj, 'endsMonth', path);
  return employment;
}

function readSideJob(value: unknown): SideJob {
  const path = 'state.sideJob';
  const obj = readRecord(value, path);
  return {
    jobId: readString(obj, 'jobId', path),
    title: readString(obj, 'title', path),
    incomePerMonth: readNumber(obj, 'incomePerMonth', path),
    hoursPerWeek: readNumber(obj, 'hoursPerWeek', path),
  };
}

function readAcademics(value: unknown): Academics {
  return { gpa: readNumber(readRecord(value, 'state.academics'), 'gpa', 'state.academics') };
}

function readBudget(value: unknown): BudgetAllocation {
  const path = 'state.budget';
  const obj = readRecord(value, path);
  return {
    needs: readNumber(obj, 'needs', path),
    wants: readNumber(obj, 'wants', path),
    savings: readNumber(obj, 'savings', path),
  };
}

function readQueuedEvent(value: unknown, path: string): QueuedEvent {
  const obj = readRecord(value, path);
  const queued: QueuedEvent = {
    kind: oneOf(['asset_repair', 'career_milestone'] as const, obj.kind, `${path}.kind`),
    queuedMonth: readInteger(obj, 'queuedMonth', path),
  };
  if (obj.assetId !== undefined) queued.assetId = readString(obj, 'assetId', path);
  return queued;
}

function readOptions(obj: UnknownRecord, path: string): ChoiceOption[] {
  const value = obj.options;
  if (!Array.isArray(value)) fail(`${path}.options`, 'an array');
  return value.map((item, i) => {
    const option = readRecord(item, `${path}.options[${i}]`);
    return {
      id: readString(option, 'id', `${path}.options[${i}]`),
      label: readString(option, 'label', `${path}.options[${i}]`),
    };
  });
}

function readPendingDecision(value: unknown): PendingDecision {
  const path = 'state.pendingDecision';
  const obj = readRecord(value, path);
  const options = readOptions(obj, path);
  const raisedMonth = readInteger(obj, 'raisedMonth', path);
  const kind = oneOf(['event_response', 'asset_repair', 'career_choice'] as const, obj.kind, `${path}.kind`);
  switch (kind) {
    case 'event_response':
      return {
        kind,
        eventId: readString(obj, 'eventId', path),
        title: readString(obj, 'title', path),
        description: readString(obj, 'description', path),
        options,
        raisedMonth,
      };
    case 'asset_repair':
      for (const [i, option] of options.entries()) oneOf(REPAIR_OPTIONS, option.id, `${path}.options[${i}].id`);
      return {
        kind,
        assetId: readString(obj, 'assetId', path),
        condition: readNumber(obj, 'condition', path),
        repairCost: readNumber(obj, 'repairCost', path),
        saleValue: readNumber(obj, 'saleValue', path),
        options,
        raisedMonth,
      };
    case 'career_choice':
      return {
        kind,
        track: oneOf(CAREER_TRACKS, obj.track, `${path}.track`),
        options,
        raisedMonth,
      };
  }
}

function readNumberMap(obj: UnknownRecord, key: string, path: string): Record<string, number> {
  const map = readRecord(obj[key], `${path}.${key}`);
  const result: Record<string, number> = {};
  for (const id of Object.keys(map)) result[id] = readInteger(map, id, `${path}.${key}`);
  return result;
}

// ── Player state ──

/** Rebuild a PlayerState from parsed JSON, field by field */
export function parsePlayerState(value: unknown): PlayerState {
  const path = 'state';
  const obj = readRecord(value, path);

  const assetsRaw = readRecord(obj.activeAssets, 'state.activeAssets');
  const activeAssets: Record<string, AssetRecord> = {};
  for (const [id, asset] of Object.entries(assetsRaw)) {
    activeAssets[id] = readAsset(asset, `state.activeAssets.${id}`);
  }

  const queuedRaw = obj.queuedEvents;
  if (!Array.isArray(queuedRaw)) fail('state.queuedEvents', 'an array');

  return {
    version: readInteger(obj, 'version', path),
    seed: readInteger(obj, 'seed', path),
    profile: readProfile(obj.profile),
    month: readInteger(obj, 'month', path),
    cash: readNumber(obj, 'cash', path),
    debt: readNumber(obj, 'debt', path),
    savings: readNumber(obj, 'savings', path),
    creditScore: readInteger(obj, 'creditScore', path),
    wellbeing: readInteger(obj, 'wellbeing', path),
    netWorth: readNumber(obj, 'netWorth', path),
    goals: readStringArray(obj, 'goals', path),
    goalsCompleted: readStringArray(obj, 'goalsCompleted', path),
    achievementsUnlocked: readStringArray(obj, 'achievementsUnlocked', path),
    activeAssets,
    employment: readNullable(obj, 'employment', readEmployment),
    sideJob: readNullable(obj, 'sideJob', readSideJob),
    academics: readNullable(obj, 'academics', readAcademics),
    budget: readNullable(obj, 'budget', readBudget),
    missedPayments: readInteger(obj, 'missedPayments', path),
    lastMissedPaymentMonth: readNullable(obj, 'lastMissedPaymentMonth', v => {
      if (typeof v !== 'number' || !Number.isInteger(v)) fail('state.lastMissedPaymentMonth', 'an integer or null');
      return v;
    }),
    eventCooldowns: readNumberMap(obj, 'eventCooldowns', path),
    queuedEvents: queuedRaw.map((q, i) => readQueuedEvent(q, `state.queuedEvents[${i}]`)),
    pendingDecision: readNullable(obj, 'pendingDecision', readPendingDecision),
    resumeMonths: readInteger(obj, 'resumeMonths', path),
  };
}
