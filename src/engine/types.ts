// Core game types for Money Journey

export type Range = [number, number];

/** A fixed delta or an inclusive [min, max] range rolled per application */
export type Amount = number | Range;

// ── Paths & employment ──

export type PathId =
  | 'four_year_college'
  | 'community_college'
  | 'trade_school'
  | 'military'
  | 'workforce'
  | 'entrepreneur';

export type CareerTrack = 'high_school_entry' | 'associate_degree' | 'trade_school' | 'bachelor_degree' | 'military' | 'business';

export type EmploymentKind = 'education' | 'job' | 'career';

export interface Employment {
  kind: EmploymentKind;
  title: string;
  incomePerMonth: number;
  skillTags: string[];
  startedMonth: number;
  endsMonth?: number; // month a program or service term completes
}

export interface SideJob {
  jobId: string;
  title: string;
  incomePerMonth: number;
  hoursPerWeek: number;
}

export interface Academics {
  gpa: number; // 0-4
}

// ── Assets ──

export type AssetKind = 'vehicle';

export interface AssetRecord {
  catalogId: string;
  kind: AssetKind;
  condition: number; // 0-100
  purchasePrice: number;
  monthlyCost: number;
  acquiredMonth: number;
}

// ── Budget ──

export interface BudgetAllocation {
  needs: number;   // % of monthly surplus kept as cash buffer
  wants: number;   // % spent on lifestyle
  savings: number; // % moved to savings
}

// ── Profile ──

export interface PlayerProfile {
  name: string;
  age: number;
  pathId: PathId;
}

// ── Events ──

export type QueuedEventKind = 'asset_repair' | 'career_milestone';

export interface QueuedEvent {
  kind: QueuedEventKind;
  assetId?: string;
  queuedMonth: number;
}

export interface ChoiceOption {
  id: string;
  label: string;
}

export interface EventResponseDecision {
  kind: 'event_response';
  eventId: string;
  title: string;
  description: string;
  options: ChoiceOption[];
  raisedMonth: number;
}

export interface AssetRepairDecision {
  kind: 'asset_repair';
  assetId: string;
  condition: number;
  repairCost: number;
  saleValue: number;
  options: ChoiceOption[];
  raisedMonth: number;
}

export interface CareerChoiceDecision {
  kind: 'career_choice';
  track: CareerTrack;
  options: ChoiceOption[];
  raisedMonth: number;
}

/** A player-input requirement that halts batch advancement until resolved */
export type PendingDecision = EventResponseDecision | AssetRepairDecision | CareerChoiceDecision;
export type PendingDecisionKind = PendingDecision['kind'];

// ── Player state ──

export interface PlayerState {
  version: number;
  seed: number;
  profile: PlayerProfile;
  month: number;
  cash: number;
  debt: number;
  savings: number;
  creditScore: number;
  wellbeing: number;
  netWorth: number; // always cash + savings - debt, recomputed by every ledger mutation
  goals: string[];
  goalsCompleted: string[];
  achievementsUnlocked: string[];
  activeAssets: Record<string, AssetRecord>;
  employment: Employment | null;
  sideJob: SideJob | null;
  academics: Academics | null;
  budget: BudgetAllocation | null;
  missedPayments: number;
  lastMissedPaymentMonth: number | null;
  eventCooldowns: Record<string, number>;
  queuedEvents: QueuedEvent[];
  pendingDecision: PendingDecision | null;
  resumeMonths: number;
}

// ── Conditions (shared by event triggers, achievements and goals) ──

export type StateMetric =
  | 'cash'
  | 'debt'
  | 'savings'
  | 'creditScore'
  | 'wellbeing'
  | 'netWorth'
  | 'month'
  | 'age'
  | 'income'
  | 'vehicleCount'
  | 'monthsSinceMissedPayment';

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '==';

export interface MetricCondition {
  metric: StateMetric;
  operator: ComparisonOperator;
  value: number;
}

export type StateFlag =
  | 'has_income'
  | 'owns_vehicle'
  | 'is_student'
  | 'has_side_job'
  | 'has_career'
  | 'has_debt'
  | 'has_degree';

export interface FlagCondition {
  flag: StateFlag;
  is: boolean;
}

export type StateCondition = MetricCondition | FlagCondition;

// ── Effects ──

export interface EffectDeltas {
  cash?: Amount;
  debt?: Amount;
  savings?: Amount;
  creditScore?: Amount;
  wellbeing?: Amount;
  incomePct?: Amount; // fractional raise/cut of employment income, e.g. 0.05
}

/** Effects after rolling, as actually applied */
export interface AppliedEffects {
  cash: number;
  debt: number;
  savings: number;
  creditScore: number;
  wellbeing: number;
  income: number;
}

// ── Catalog tables ──

export interface PathDefinition {
  id: PathId;
  name: string;
  description: string;
  tuitionDebt: number;
  startupCost: number;
  durationMonths: number; // 0 = no education phase
  immediateIncome: number; // monthly
  employmentTitle: string;
  careerTrack: CareerTrack;
  serviceMonths: number; // enlistment term for paths that start with a job; 0 = open-ended
}

export interface LivingCostBracket {
  maxAge: number; // inclusive upper bound; Infinity for the last bracket
  monthly: number;
}

export type LivingCostTable = Record<PathId, LivingCostBracket[]>;

export interface CareerDefinition {
  id: string;
  title: string;
  track: CareerTrack;
  startingSalary: number; // annual
  skillTags: string[];
}

export interface VehicleDefinition {
  id: string;
  name: string;
  purchaseCost: number;
  monthlyCost: number;
  monthlyDecay: number; // condition points lost per month
}

export interface PartTimeJobDefinition {
  id: string;
  title: string;
  hourlyWage: number;
  hoursPerWeek: number;
  compatiblePaths: PathId[]; // empty = any education path
}

export interface EventChoiceDefinition {
  id: string;
  label: string;
  effects: EffectDeltas;
}

export interface LifeEventDefinition {
  id: string;
  title: string;
  description: string;
  priority: number; // lower fires first when several are eligible
  trigger: StateCondition[];
  effects?: EffectDeltas;
  requiresInput: boolean;
  choices?: EventChoiceDefinition[];
  cooldownMonths?: number;
}

export interface AchievementDefinition {
  id: string;
  name: string;
  description: string;
  conditions: StateCondition[];
  rewardWellbeing: number;
}

export interface LifeGoalDefinition {
  id: string;
  label: string;
  conditions: StateCondition[];
}

export interface DataTables {
  paths: Record<PathId, PathDefinition>;
  livingCosts: LivingCostTable;
  careers: CareerDefinition[];
  vehicles: VehicleDefinition[];
  partTimeJobs: PartTimeJobDefinition[];
  events: LifeEventDefinition[];
  achievements: AchievementDefinition[];
  lifeGoals: LifeGoalDefinition[];
}

// ── Reports ──

export interface ResolvedEvent {
  eventId: string;
  title: string;
  month: number;
  choiceId?: string;
  effects: AppliedEffects;
}

export interface MonthSummary {
  month: number;
  income: number;
  expenses: number;
  wantsSpending: number;
  savingsTransfer: number;
  interestAccrued: number;
  debtPayment: number;
  missedPayment: boolean;
  negativeCash: boolean;
  eventsResolved: ResolvedEvent[];
  achievementsUnlocked: string[];
  goalsCompleted: string[];
}

export interface AdvanceReport {
  monthsRequested: number;
  monthsCompleted: number;
  months: MonthSummary[];
  eventsResolved: ResolvedEvent[];
  achievementsUnlocked: string[];
  goalsCompleted: string[];
  pendingDecision: PendingDecision | null;
  state: PlayerState;
}

// ── Decisions ──

export type Decision =
  | { kind: 'budget_allocation' }
  | { kind: 'vehicle' }
  | { kind: 'part_time_job' }
  | PendingDecision;

export type DecisionKind = Decision['kind'];

export type DecisionChoice =
  | { kind: 'budget_allocation'; allocation: BudgetAllocation }
  | { kind: 'vehicle'; action: 'purchase'; vehicleId: string }
  | { kind: 'vehicle'; action: 'sell'; assetId: string }
  | { kind: 'vehicle'; action: 'none' }
  | { kind: 'part_time_job'; action: 'take'; jobId: string }
  | { kind: 'part_time_job'; action: 'quit' }
  | { kind: 'event_response'; optionId: string }
  | { kind: 'asset_repair'; optionId: 'repair' | 'sell' | 'defer' }
  | { kind: 'career_choice'; optionId: string };

export interface ResolutionResult {
  decision: Decision;
  choice: DecisionChoice;
  effects: AppliedEffects;
  resolvedPending: boolean;
  resumeMonths: number; // months of a halted batch left to apply; 0 when nothing to resume
  achievementsUnlocked: string[];
  goalsCompleted: string[];
  state: PlayerState;
}

export { formatMoney, formatPercent, roundCents } from './utils';
