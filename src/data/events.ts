import type { LifeEventDefinition } from '../engine/types';

// ── Life events ──
// Ranges are rolled per firing. Lower priority fires first when several are eligible.

export const LIFE_EVENTS: LifeEventDefinition[] = [
  {
    id: 'overdraft_fee',
    title: 'Overdraft fee',
    description: 'Your account dipped below zero and the bank charged a fee.',
    priority: 1,
    trigger: [{ metric: 'cash', operator: '<', value: 0 }],
    effects: { cash: -35, creditScore: -5 },
    requiresInput: false,
    cooldownMonths: 3,
  },
  {
    id: 'scholarship',
    title: 'Scholarship award',
    description: 'A local foundation awarded you a scholarship.',
    priority: 2,
    trigger: [{ flag: 'is_student', is: true }],
    effects: { cash: [500, 1500], wellbeing: 5 },
    requiresInput: false,
    cooldownMonths: 24,
  },
  {
    id: 'annual_raise',
    title: 'Annual raise',
    description: 'Your manager approved a raise.',
    priority: 3,
    trigger: [{ flag: 'has_career', is: true }, { metric: 'month', operator: '>=', value: 6 }],
    effects: { incomePct: 0.05, wellbeing: 3 },
    requiresInput: false,
    cooldownMonths: 12,
  },
  {
    id: 'car_breakdown',
    title: 'Car trouble',
    description: 'Your vehicle needed an unexpected repair.',
    priority: 4,
    trigger: [{ flag: 'owns_vehicle', is: true }],
    effects: { cash: [-600, -200], wellbeing: -3 },
    requiresInput: false,
    cooldownMonths: 6,
  },
  {
    id: 'credit_card_offer',
    title: 'Credit card offer',
    description: 'A bank offers you a credit card with a $500 balance transfer.',
    priority: 4,
    trigger: [{ metric: 'creditScore', operator: '>=', value: 600 }],
    requiresInput: true,
    choices: [
      { id: 'accept', label: 'Accept the card', effects: { cash: 500, debt: 500, creditScore: -5 } },
      { id: 'decline', label: 'Decline', effects: {} },
    ],
    cooldownMonths: 12,
  },
  {
    id: 'tax_refund',
    title: 'Tax refund',
    description: 'You received a tax refund.',
    priority: 5,
    trigger: [{ flag: 'has_income', is: true }],
    effects: { cash: [100, 400] },
    requiresInput: false,
    cooldownMonths: 12,
  },
  {
    id: 'medical_bill',
    title: 'Medical bill',
    description: 'An urgent care visit left you with a bill.',
    priority: 5,
    trigger: [],
    effects: { cash: [-900, -200], wellbeing: -3 },
    requiresInput: false,
    cooldownMonths: 6,
  },
  {
    id: 'friend_loan',
    title: 'A friend asks for money',
    description: 'A close friend is short on rent and asks to borrow $300.',
    priority: 5,
    trigger: [{ metric: 'cash', operator: '>=', value: 300 }],
    requiresInput: true,
    choices: [
      { id: 'lend', label: 'Lend the money', effects: { cash: -300, wellbeing: 4 } },
      { id: 'decline', label: 'Say no', effects: { wellbeing: -2 } },
    ],
    cooldownMonths: 12,
  },
  {
    id: 'concert_tickets',
    title: 'Concert tickets',
    description: 'Your favorite band is in town this weekend.',
    priority: 6,
    trigger: [],
    requiresInput: true,
    choices: [
      { id: 'buy', label: 'Buy tickets', effects: { cash: [-200, -80], wellbeing: 5 } },
      { id: 'skip', label: 'Skip it', effects: { wellbeing: -1 } },
    ],
    cooldownMonths: 6,
  },
  {
    id: 'phone_broken',
    title: 'Broken phone',
    description: 'You dropped your phone and the screen shattered.',
    priority: 6,
    trigger: [],
    effects: { cash: [-400, -150] },
    requiresInput: false,
    cooldownMonths: 12,
  },
  {
    id: 'birthday_gift',
    title: 'Birthday gift',
    description: 'Family sent money for your birthday.',
    priority: 7,
    trigger: [],
    effects: { cash: [50, 200], wellbeing: 2 },
    requiresInput: false,
    cooldownMonths: 12,
  },
];
