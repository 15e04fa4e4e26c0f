export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/** Malformed pricing catalog or demand schedule. Raised before any model is built. */
export class ConfigError extends Error {
  public statusCode = 400;
  public issues: string[];

  constructor(issues: string[]) {
    super(
      issues.length === 1
        ? `Invalid planning input: ${issues[0]}`
        : `Invalid planning input (${issues.length} issues)`,
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** The solver's assignment does not match the model's naming scheme. */
export class DecodeError extends Error {
  public statusCode = 500;
  public variable?: string;

  constructor(message: string, variable?: string) {
    super(message);
    this.name = 'DecodeError';
    this.variable = variable;
  }
}

/** A solver result that cannot occur for a well-formed model (unbounded, invalid plan). */
export class SolverInvariantError extends Error {
  public statusCode = 500;

  constructor(message: string) {
    super(message);
    this.name = 'SolverInvariantError';
  }
}
