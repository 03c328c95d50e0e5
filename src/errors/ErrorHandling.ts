/**
 * Error types for the test runner and the packet injector.
 *
 * Failures of the invoked compiler (non-zero exit, timeout, start failure) are
 * not errors here: the runner reports them as a RunOutcome.
 */

/**
 * Base error class for all runner errors
 */
export class RunnerError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RunnerError';
    this.code = code;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, RunnerError.prototype);
  }
}

/**
 * Error thrown for a malformed command line; the usage text is shown with it
 */
export class UsageError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', details);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Error thrown when the root directory or the input file does not exist
 */
export class MissingInputError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MISSING_INPUT', details);
    this.name = 'MissingInputError';
    Object.setPrototypeOf(this, MissingInputError.prototype);
  }
}

/**
 * Error thrown for invalid settings or an invalid packet selector
 */
export class ConfigurationError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a frame could not be put on the wire
 */
export class TransmitError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSMIT_ERROR', details);
    this.name = 'TransmitError';
    Object.setPrototypeOf(this, TransmitError.prototype);
  }
}

/**
 * Errors that are reported together with the usage text
 */
export function isUsageRelated(error: unknown): error is UsageError | MissingInputError {
  return error instanceof UsageError || error instanceof MissingInputError;
}

/**
 * Convert anything thrown into a RunnerError
 */
export function toRunnerError(error: unknown): RunnerError {
  if (error instanceof RunnerError) {
    return error;
  }

  if (error instanceof Error) {
    const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new RunnerError(error.message, 'UNKNOWN_ERROR', {
      originalError: error.toString(),
      ...(errno ? { errno } : {}),
    });
  }

  return new RunnerError(String(error), 'UNKNOWN_ERROR');
}
