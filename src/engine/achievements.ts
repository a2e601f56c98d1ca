// Achievement and life-goal evaluation

import type { AchievementDefinition, LifeGoalDefinition, PlayerState } from './types';
import { matchesAll } from './conditions';
import { adjustWellbeing, unlockAchievement } from './ledger';
import { appendUnique } from './helpers';

/**
 * Ids of achievements whose predicate holds and that are not yet unlocked, in table order.
 * Every predicate sees the same state; rewards from one unlock never feed another.
 */
export function findNewAchievements(state: PlayerState, achievements: AchievementDefinition[]): string[] {
  const held = new Set(state.achievementsUnlocked);
  return achievements
    .filter(a => !held.has(a.id) && matchesAll(state, a.conditions))
    .map(a => a.id);
}

export function applyAchievements(
  state: PlayerState,
  achievements: AchievementDefinition[]
): { state: PlayerState; unlocked: string[] } {
  const unlocked = findNewAchievements(state, achievements);
  let next = state;
  for (const id of unlocked) {
    const def = achievements.find(a => a.id === id);
    next = unlockAchievement(next, id);
    if (def && def.rewardWellbeing !== 0) {
      next = adjustWellbeing(next, def.rewardWellbeing);
    }
  }
  return { state: next, unlocked };
}

/** Selected goals whose conditions now hold. Completed goals stay completed. */
export function findCompletedGoals(state: PlayerState, lifeGoals: LifeGoalDefinition[]): string[] {
  const done = new Set(state.goalsCompleted);
  return state.goals.filter(goalId => {
    if (done.has(goalId)) return false;
    const def = lifeGoals.find(g => g.id === goalId);
    return def !== undefined && matchesAll(state, def.conditions);
  });
}

export function applyGoals(
  state: PlayerState,
  lifeGoals: LifeGoalDefinition[]
): { state: PlayerState; completed: string[] } {
  const completed = findCompletedGoals(state, lifeGoals);
  if (completed.length === 0) return { state, completed };
  return {
    state: { ...state, goalsCompleted: appendUnique(state.goalsCompleted, completed) },
    completed,
  };
}

/** Achievements first (their rewards may move well-being), then goals */
export function evaluateProgress(
  state: PlayerState,
  achievements: AchievementDefinition[],
  lifeGoals: LifeGoalDefinition[]
): { state: PlayerState; achievementsUnlocked: string[]; goalsCompleted: string[] } {
  const afterAchievements = applyAchievements(state, achievements);
  const afterGoals = applyGoals(afterAchievements.state, lifeGoals);
  return {
    state: afterGoals.state,
    achievementsUnlocked: afterAchievements.unlocked,
    goalsCompleted: afterGoals.completed,
  };
}
