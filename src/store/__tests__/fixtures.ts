import type { UnknownRecord } from '../validation';

/** A save from before vehicles became assets: one vehicle field, no side job record */
export function createV1State(overrides: UnknownRecord = {}): UnknownRecord {
  return {
    version: 1,
    seed: 42,
    profile: { name: 'Old Save', age: 19, pathId: 'community_college' },
    month: 14,
    cash: 850,
    debt: 14000,
    savings: 300,
    creditScore: 662,
    wellbeing: 55,
    netWorth: -12850,
    goals: ['buy_car'],
    goalsCompleted: [],
    achievementsUnlocked: ['first_paycheck'],
    vehicle: 'used_sedan',
    vehicleCondition: 70,
    partTimeJob: 'barista',
    employment: {
      kind: 'education',
      title: 'Community college student',
      incomePerMonth: 0,
      skillTags: [],
      startedMonth: 0,
      endsMonth: 24,
    },
    academics: { gpa: 3.2 },
    budget: null,
    missedPayments: 0,
    lastMissedPaymentMonth: null,
    eventCooldowns: {},
    pendingDecision: null,
    ...overrides,
  };
}
