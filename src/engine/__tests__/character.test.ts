import { describe, it, expect } from 'vitest';
import { createCharacter } from '../character';
import { checkInvariants } from '../invariants';
import { InvalidCharacterError } from '../errors';
import { createMockTables, createTestConfig } from './helpers';

const tables = createMockTables();
const config = createTestConfig();

describe('createCharacter', () => {
  it('starts a four-year student with tuition debt and a first payment', () => {
    const state = createCharacter({ name: '  Alex  ', goals: ['college_degree'], seed: 7 }, 'four_year_college', tables, config);
    expect(state.profile).toEqual({ name: 'Alex', age: 18, pathId: 'four_year_college' });
    expect(state.seed).toBe(7);
    expect(state.month).toBe(0);
    expect(state.cash).toBe(800);
    expect(state.debt).toBe(40000);
    expect(state.netWorth).toBe(-39200);
    expect(state.employment).toEqual({
      kind: 'education',
      title: 'University student',
      incomePerMonth: 0,
      skillTags: [],
      startedMonth: 0,
      endsMonth: 48,
    });
    expect(state.academics).toEqual({ gpa: 3 });
    expect(checkInvariants(state)).toEqual([]);
  });

  it('workforce and military paths start with a paying job', () => {
    const worker = createCharacter({ name: 'Sam', goals: [] }, 'workforce', tables, config);
    expect(worker.employment?.kind).toBe('job');
    expect(worker.employment?.incomePerMonth).toBe(2400);
    expect(worker.cash).toBe(1000);
    expect(worker.debt).toBe(0);
    expect(worker.academics).toBeNull();

    const recruit = createCharacter({ name: 'Sam', goals: [] }, 'military', tables, config);
    expect(recruit.employment?.incomePerMonth).toBe(2200);
    expect(recruit.employment?.endsMonth).toBe(48);
    expect(worker.employment?.endsMonth).toBeUndefined();
  });

  it('entrepreneurs pay their startup cost even into overdraft', () => {
    const founder = createCharacter({ name: 'Sam', goals: ['buy_car'] }, 'entrepreneur', tables, config);
    expect(founder.cash).toBe(-4000);
    expect(founder.employment?.title).toBe('Founder');
    expect(founder.goals).toEqual(['buy_car']);
  });

  it('uses configured starting values', () => {
    const state = createCharacter(
      { name: 'Sam', goals: [] },
      'workforce',
      tables,
      createTestConfig({ startingCash: 2500, startingCreditScore: 700, startingWellbeing: 60 })
    );
    expect(state.cash).toBe(2500);
    expect(state.creditScore).toBe(700);
    expect(state.wellbeing).toBe(60);
  });

  it('rejects bad input', () => {
    const make = (name: string, goals: string[]) => () => createCharacter({ name, goals }, 'workforce', tables, config);
    expect(make('   ', [])).toThrow(InvalidCharacterError);
    expect(make('Sam', ['buy_car', 'buy_house', 'travel_world', 'emergency_fund'])).toThrow(InvalidCharacterError);
    expect(make('Sam', ['buy_car', 'buy_car'])).toThrow(InvalidCharacterError);
    expect(make('Sam', ['win_lottery'])).toThrow(InvalidCharacterError);
  });
});
