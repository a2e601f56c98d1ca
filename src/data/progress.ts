import type { AchievementDefinition, LifeGoalDefinition } from '../engine/types';

// ── Achievements ──

export const ACHIEVEMENTS: AchievementDefinition[] = [
  {
    id: 'first_paycheck',
    name: 'First Paycheck',
    description: 'Earn your first paycheck',
    conditions: [{ flag: 'has_income', is: true }],
    rewardWellbeing: 5,
  },
  {
    id: 'emergency_cushion',
    name: 'Emergency Cushion',
    description: 'Save $1,000 in an emergency fund',
    conditions: [{ metric: 'savings', operator: '>=', value: 1000 }],
    rewardWellbeing: 10,
  },
  {
    id: 'debt_free',
    name: 'Debt Free',
    description: 'Pay off all your debt',
    conditions: [{ flag: 'has_debt', is: false }, { metric: 'month', operator: '>=', value: 1 }],
    rewardWellbeing: 15,
  },
  {
    id: 'credit_master',
    name: 'Credit Master',
    description: 'Reach a credit score of 750',
    conditions: [{ metric: 'creditScore', operator: '>=', value: 750 }],
    rewardWellbeing: 12,
  },
  {
    id: 'positive_net_worth',
    name: 'Positive Net Worth',
    description: 'Own more than you owe',
    conditions: [{ metric: 'netWorth', operator: '>', value: 0 }],
    rewardWellbeing: 10,
  },
  {
    id: 'car_owner',
    name: 'Wheels',
    description: 'Buy your first vehicle',
    conditions: [{ flag: 'owns_vehicle', is: true }],
    rewardWellbeing: 5,
  },
  {
    id: 'steady_hand',
    name: 'Steady Hand',
    description: 'Go 12 months without a missed payment',
    conditions: [{ metric: 'monthsSinceMissedPayment', operator: '>=', value: 12 }],
    rewardWellbeing: 8,
  },
];

// ── Life goals ──

export const LIFE_GOALS: LifeGoalDefinition[] = [
  { id: 'buy_car', label: 'Buy a car', conditions: [{ flag: 'owns_vehicle', is: true }] },
  { id: 'college_degree', label: 'Get a college degree', conditions: [{ flag: 'has_degree', is: true }] },
  { id: 'buy_house', label: 'Save a house down payment', conditions: [{ metric: 'savings', operator: '>=', value: 20000 }] },
  { id: 'travel_world', label: 'Travel the world', conditions: [{ metric: 'savings', operator: '>=', value: 5000 }] },
  { id: 'emergency_fund', label: 'Build an emergency fund', conditions: [{ metric: 'savings', operator: '>=', value: 3000 }] },
  { id: 'debt_free', label: 'Pay off all debt', conditions: [{ flag: 'has_debt', is: false }, { metric: 'month', operator: '>=', value: 1 }] },
  { id: 'great_credit', label: 'Build great credit', conditions: [{ metric: 'creditScore', operator: '>=', value: 780 }] },
  { id: 'financial_independence', label: 'Reach financial independence', conditions: [{ metric: 'netWorth', operator: '>=', value: 50000 }] },
];
