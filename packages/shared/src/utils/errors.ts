export class BudgetlineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BudgetlineError';
  }
}

export class InvalidUsageError extends BudgetlineError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    expected = 'a non-negative integer',
  ) {
    super(`Invalid usage: ${field} must be ${expected}, got ${String(value)}`);
    this.name = 'InvalidUsageError';
  }
}

export class TaskValidationError extends BudgetlineError {
  constructor(
    public readonly taskId: string,
    public readonly issues: string[] = [],
  ) {
    super(`Task validation failed: ${taskId}${issues.length > 0 ? ` (${issues.join(', ')})` : ''}`);
    this.name = 'TaskValidationError';
  }
}

export class TaskExecutionFault extends BudgetlineError {
  constructor(
    public readonly taskId: string,
    public readonly cause: unknown,
  ) {
    super(`Task execution failed: ${taskId}`);
    this.name = 'TaskExecutionFault';
  }

  /** Message of the underlying fault, as reported in task outcomes. */
  get reason(): string {
    return this.cause instanceof Error ? this.cause.message : String(this.cause);
  }
}

export class ConfigError extends BudgetlineError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
