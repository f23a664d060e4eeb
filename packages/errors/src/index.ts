function isError(value: unknown): value is Error {
  return typeof value === 'object' && value !== null && 'name' in value;
}

/**
 * The base class for all errors raised while waiting on a task.
 *
 * Failures raised by the task itself (e.g. a rejected `status()` call) are
 * never wrapped in this class; they reach the caller unchanged.
 */
export class TaskWaitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TaskWaitError';
  }

  static is(value: unknown): value is TaskWaitError {
    return (
      isError(value) &&
      [
        'TaskWaitError',
        'TaskTimeoutError',
        'TaskWaitOptionsError',
        'TaskWaitConfigError',
      ].includes(value.name)
    );
  }
}

/**
 * Thrown when the deadline of a wait passes before the task reached a
 * terminal status.
 */
export class TaskTimeoutError extends TaskWaitError {
  /** The absolute deadline that was exceeded. */
  deadline: Date;
  /** The configured timeout in milliseconds, when known. */
  timeout?: number;

  constructor(deadline: number, options?: { timeout?: number }) {
    const timeout = options?.timeout;
    super(
      timeout === undefined
        ? `Timed out waiting for task (deadline ${new Date(deadline).toISOString()})`
        : `Timed out waiting for task after ${timeout}ms`
    );
    this.name = 'TaskTimeoutError';
    this.deadline = new Date(deadline);
    this.timeout = timeout;
  }

  static is(value: unknown): value is TaskTimeoutError {
    return isError(value) && value.name === 'TaskTimeoutError';
  }
}

/**
 * Thrown when the options passed to `taskwait()` fail validation.
 */
export class TaskWaitOptionsError extends TaskWaitError {
  issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`Invalid wait options: ${issues.join('; ')}`, options);
    this.name = 'TaskWaitOptionsError';
    this.issues = issues;
  }

  static is(value: unknown): value is TaskWaitOptionsError {
    return isError(value) && value.name === 'TaskWaitOptionsError';
  }
}

/**
 * Thrown when a `TASKWAIT_*` environment variable cannot be parsed.
 */
export class TaskWaitConfigError extends TaskWaitError {
  variable: string;

  constructor(variable: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid environment variable ${variable}: ${reason}`, options);
    this.name = 'TaskWaitConfigError';
    this.variable = variable;
  }

  static is(value: unknown): value is TaskWaitConfigError {
    return isError(value) && value.name === 'TaskWaitConfigError';
  }
}
