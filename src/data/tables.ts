import type { DataTables } from '../engine/types';
import { LIVING_COSTS, PATHS } from './paths';
import { CAREERS, PART_TIME_JOBS, VEHICLES } from './catalog';
import { LIFE_EVENTS } from './events';
import { ACHIEVEMENTS, LIFE_GOALS } from './progress';

/** Recursively freeze a value; returns the same reference */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** The default catalog, copied and frozen so callers cannot alter the shared constants */
export function createDataTables(): DataTables {
  return deepFreeze(structuredClone({
    paths: PATHS,
    livingCosts: LIVING_COSTS,
    careers: CAREERS,
    vehicles: VEHICLES,
    partTimeJobs: PART_TIME_JOBS,
    events: LIFE_EVENTS,
    achievements: ACHIEVEMENTS,
    lifeGoals: LIFE_GOALS,
  }));
}
