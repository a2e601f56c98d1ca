import type { LivingCostTable, PathDefinition, PathId } from '../engine/types';

// ── Post-graduation paths ──
// Tuition is added to debt at creation; durationMonths 0 means no education phase

export const PATHS: Record<PathId, PathDefinition> = {
  four_year_college: {
    id: 'four_year_college',
    name: 'Four-year college',
    description: "Bachelor's degree: higher earning potential but significant debt",
    tuitionDebt: 40000,
    startupCost: 0,
    durationMonths: 48,
    immediateIncome: 0,
    employmentTitle: 'University student',
    careerTrack: 'bachelor_degree',
    serviceMonths: 0,
  },
  community_college: {
    id: 'community_college',
    name: 'Community college',
    description: 'Associate degree with lower debt and a faster start',
    tuitionDebt: 15000,
    startupCost: 0,
    durationMonths: 24,
    immediateIncome: 0,
    employmentTitle: 'Community college student',
    careerTrack: 'associate_degree',
    serviceMonths: 0,
  },
  trade_school: {
    id: 'trade_school',
    name: 'Trade school',
    description: 'Practical skills and a certificate in under two years',
    tuitionDebt: 13000,
    startupCost: 0,
    durationMonths: 18,
    immediateIncome: 0,
    employmentTitle: 'Trade school student',
    careerTrack: 'trade_school',
    serviceMonths: 0,
  },
  military: {
    id: 'military',
    name: 'Join the military',
    description: 'Steady pay, housing and benefits',
    tuitionDebt: 0,
    startupCost: 0,
    durationMonths: 0,
    immediateIncome: 2200,
    employmentTitle: 'Enlisted service member',
    careerTrack: 'military',
    serviceMonths: 48,
  },
  workforce: {
    id: 'workforce',
    name: 'Enter the workforce',
    description: 'Start earning right away with no debt but limited growth',
    tuitionDebt: 0,
    startupCost: 0,
    durationMonths: 0,
    immediateIncome: 2400,
    employmentTitle: 'Entry-level associate',
    careerTrack: 'high_school_entry',
    serviceMonths: 0,
  },
  entrepreneur: {
    id: 'entrepreneur',
    name: 'Start a business',
    description: 'High risk, high reward, variable income',
    tuitionDebt: 0,
    startupCost: 5000,
    durationMonths: 0,
    immediateIncome: 1500,
    employmentTitle: 'Founder',
    careerTrack: 'business',
    serviceMonths: 0,
  },
};

// ── Living costs ──
// Housing plus food 300, utilities 120, phone 50, insurance 150, transit 80.
// Costs step up once the player is past 22 and off any family support.

export const LIVING_COSTS: LivingCostTable = {
  four_year_college: [{ maxAge: 22, monthly: 1500 }, { maxAge: Number.POSITIVE_INFINITY, monthly: 1700 }],
  community_college: [{ maxAge: 22, monthly: 1300 }, { maxAge: Number.POSITIVE_INFINITY, monthly: 1500 }],
  trade_school: [{ maxAge: 22, monthly: 1300 }, { maxAge: Number.POSITIVE_INFINITY, monthly: 1500 }],
  military: [{ maxAge: Number.POSITIVE_INFINITY, monthly: 700 }],
  workforce: [{ maxAge: 22, monthly: 1300 }, { maxAge: Number.POSITIVE_INFINITY, monthly: 1500 }],
  entrepreneur: [{ maxAge: 22, monthly: 1700 }, { maxAge: Number.POSITIVE_INFINITY, monthly: 1900 }],
};
