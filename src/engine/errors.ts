// Engine error taxonomy. Every public operation validates before it builds a new
// state, so a thrown error always leaves the caller's state as it was.

export type SimulationErrorCode =
  | 'INVALID_DURATION'
  | 'INVALID_ALLOCATION'
  | 'INSUFFICIENT_FUNDS'
  | 'NO_CHOICE_PROVIDED'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_AMOUNT'
  | 'PENDING_DECISION'
  | 'DECISION_NOT_AVAILABLE'
  | 'UNKNOWN_CATALOG_ENTRY'
  | 'INVALID_CHARACTER'
  | 'SNAPSHOT'
  | 'CONFIG';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDurationError extends SimulationError {
  readonly months: number;

  constructor(months: number, allowed: readonly number[]) {
    super('INVALID_DURATION', `Cannot advance ${months} months; choose one of ${allowed.join(', ')}`);
    this.months = months;
  }
}

export class InvalidAllocationError extends SimulationError {
  constructor(message: string) {
    super('INVALID_ALLOCATION', message);
  }
}

export class InsufficientFundsError extends SimulationError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number, account: 'cash' | 'savings' = 'cash') {
    super('INSUFFICIENT_FUNDS', `Cannot take ${requested} from ${account}; only ${available} available`);
    this.requested = requested;
    this.available = available;
  }
}

export class NoChoiceProvidedError extends SimulationError {
  constructor(decisionKind: string) {
    super('NO_CHOICE_PROVIDED', `No choice was provided for pending ${decisionKind} decision`);
  }
}

/** An engine defect. Never caught inside the engine. */
export class InvariantViolationError extends SimulationError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('INVARIANT_VIOLATION', `Player state invariants violated: ${violations.join('; ')}`);
    this.violations = violations;
  }
}

export class InvalidAmountError extends SimulationError {
  constructor(operation: string, amount: number) {
    super('INVALID_AMOUNT', `${operation} requires a finite, non-negative amount (got ${amount})`);
  }
}

export class PendingDecisionError extends SimulationError {
  readonly decisionKind: string;

  constructor(decisionKind: string) {
    super('PENDING_DECISION', `A ${decisionKind} decision must be resolved before advancing`);
    this.decisionKind = decisionKind;
  }
}

export class DecisionNotAvailableError extends SimulationError {
  constructor(message: string) {
    super('DECISION_NOT_AVAILABLE', message);
  }
}

export class UnknownCatalogEntryError extends SimulationError {
  constructor(table: string, id: string) {
    super('UNKNOWN_CATALOG_ENTRY', `No ${table} entry with id "${id}"`);
  }
}

export class InvalidCharacterError extends SimulationError {
  constructor(message: string) {
    super('INVALID_CHARACTER', message);
  }
}

export class SnapshotError extends SimulationError {
  constructor(message: string) {
    super('SNAPSHOT', message);
  }
}

export class ConfigError extends SimulationError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
