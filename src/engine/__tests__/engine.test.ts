import { describe, it, expect } from 'vitest';
import { createGameEngine } from '../engine';
import { DEFAULT_SIMULATION_CONFIG, resolveSimulationConfig } from '../../data/gameConfig';
import { ConfigError } from '../errors';
import { createMockTables } from './helpers';

describe('resolveSimulationConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveSimulationConfig()).toEqual(DEFAULT_SIMULATION_CONFIG);
  });

  it('merges overrides', () => {
    expect(resolveSimulationConfig({ eventChance: 0.25 }).eventChance).toBe(0.25);
  });

  it('rejects values the engine cannot run with', () => {
    expect(() => resolveSimulationConfig({ eventChance: 1.5 })).toThrow(ConfigError);
    expect(() => resolveSimulationConfig({ debtMonthlyRate: -0.01 })).toThrow(ConfigError);
    expect(() => resolveSimulationConfig({ overdraftFloor: 100 })).toThrow(ConfigError);
    expect(() => resolveSimulationConfig({ startingCreditScore: 900 })).toThrow(ConfigError);
    expect(() => resolveSimulationConfig({ repairCostRange: [800, 300] })).toThrow(ConfigError);
  });
});

describe('createGameEngine', () => {
  it('uses the default catalog, frozen', () => {
    const engine = createGameEngine();
    expect(engine.tables.vehicles.length).toBeGreaterThan(0);
    expect(Object.isFrozen(engine.tables.events)).toBe(true);
    expect(Object.isFrozen(engine.tables.paths.workforce)).toBe(true);
  });

  it('copies caller tables so later edits do not leak in', () => {
    const tables = createMockTables();
    const engine = createGameEngine({ tables });
    tables.vehicles.length = 0;
    expect(engine.tables.vehicles.length).toBe(4);
  });

  it('validates config at construction', () => {
    expect(() => createGameEngine({ config: { eventChance: -1 } })).toThrow(ConfigError);
  });

  it('applies the configured overdraft floor to purchases', () => {
    const engine = createGameEngine({ config: { eventChance: 0, overdraftFloor: -2000 } });
    const state = engine.createCharacter({ name: 'Sam', goals: [] }, 'workforce');
    const result = engine.resolveDecision(
      state,
      { kind: 'vehicle' },
      { kind: 'vehicle', action: 'purchase', vehicleId: 'used_sedan' }
    );
    expect(result.state.cash).toBe(-2000);
    expect(result.state.debt).toBe(3000);
  });

  it('runs a character through a year', () => {
    const engine = createGameEngine({ config: { eventChance: 0 } });
    let state = engine.createCharacter({ name: 'Sam', goals: ['emergency_fund'], seed: 5 }, 'workforce');
    state = engine.resolveDecision(
      state,
      { kind: 'budget_allocation' },
      { kind: 'budget_allocation', allocation: { needs: 50, wants: 20, savings: 30 } }
    ).state;
    for (let i = 0; i < 2; i++) state = engine.advance(state, 6).state;
    expect(state.month).toBe(12);
    expect(state.profile.age).toBe(19);
    expect(state.savings).toBeGreaterThan(0);
    expect(state.achievementsUnlocked).toContain('first_paycheck');
  });
});
