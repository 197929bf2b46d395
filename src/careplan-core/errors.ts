// src/careplan-core/errors.ts
// Engine error types. Recoverable conditions (advisory failures, missing
// regional data) never throw; these cover caller contract violations and
// programming errors.

export interface ContractIssue {
  path: string;
  message: string;
}

export class IntakeContractError extends Error {
  readonly issues: ContractIssue[];

  constructor(issues: ContractIssue[]) {
    super(
      `Intake answers violate the engine contract: ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join('; ')}`,
    );
    this.name = 'IntakeContractError';
    this.issues = issues;
  }
}

export class CarePackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CarePackError';
  }
}

/** Raised when the question catalog cannot produce a tier at all. */
export class ScoringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
