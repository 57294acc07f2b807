/**
 * Error types for the observability layer
 *
 * Only startup and programming errors surface as exceptions. Expected failure
 * modes (unreadable directories, empty windows, missing repositories) are
 * modelled as zero-valued or null results instead.
 */

export type ObservabilityErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'SAMPLING_ERROR'
  | 'RECORDING_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Base error class for observability errors
 */
export class ObservabilityError extends Error {
  constructor(
    message: string,
    public readonly code: ObservabilityErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ObservabilityError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Serialize into a plain shape for structured logs
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause && { cause: this.cause.message }),
    };
  }
}

/**
 * Configuration file missing, unreadable or invalid
 */
export class ConfigurationError extends ObservabilityError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Host metrics could not be read during a sampling tick
 */
export class SamplingError extends ObservabilityError {
  constructor(message: string, cause?: Error) {
    super(message, 'SAMPLING_ERROR', cause);
    this.name = 'SamplingError';
  }
}

/**
 * A request metric could not be recorded
 */
export class RecordingError extends ObservabilityError {
  constructor(message: string, cause?: Error) {
    super(message, 'RECORDING_ERROR', cause);
    this.name = 'RecordingError';
  }
}

export function isObservabilityError(error: unknown): error is ObservabilityError {
  return error instanceof ObservabilityError;
}

/**
 * Wrap unknown error as ObservabilityError
 */
export function wrapError(
  error: unknown,
  code: ObservabilityErrorCode = 'UNKNOWN_ERROR',
  message?: string
): ObservabilityError {
  if (isObservabilityError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new ObservabilityError(errorMessage, code, cause);
}

/**
 * The `code` of a Node system error (ENOENT, EACCES, ...), if there is one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
