// src/domain/errors.ts

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised before a run starts when the configuration is unusable, with
 * one issue per offending field (e.g. a zero-length fixed period or a
 * rate outside [0, 1)).
 */
export class InvalidConfigurationError extends Error {
  public readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[] = []) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidConfigurationError);
    }
  }
}

/**
 * Raised mid-run when an arithmetic invariant breaks, e.g. an
 * overpayment larger than the outstanding balance. There is no
 * recovery path: it points at a bug in the policy or the loop.
 */
export class SimulationInvariantError extends Error {
  public readonly month: number;
  public readonly details?: Record<string, number>;

  constructor(
    message: string,
    month: number,
    details?: Record<string, number>
  ) {
    super(`${message} (month ${month})`);
    this.name = "SimulationInvariantError";
    this.month = month;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationInvariantError);
    }
  }
}
