/**
 * Unified error hierarchy for chords-export
 *
 * Base error classes that provide:
 * - Consistent error codes across the retrieval engine and the CLI
 * - Process exit code mapping for the command line
 * - Classification of which failures abort the whole run
 */

/**
 * Abstract base class for all chords-export errors.
 * All domain-specific errors should extend this class.
 */
export abstract class ChordsExportError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;
  /** Exit code the CLI uses when this error ends the run */
  abstract readonly exitCode: number;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ---------------------------------------------------------------------------
// User input
// ---------------------------------------------------------------------------

/**
 * The download request failed validation
 */
export class InvalidRequestError extends ChordsExportError {
  readonly code: string = 'INVALID_REQUEST';
  readonly exitCode = 2 as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, cause);
  }
}

/**
 * Start is after end, or a timestamp / clock time could not be parsed
 */
export class InvalidTimeRangeError extends InvalidRequestError {
  override readonly code: string = 'INVALID_TIME_RANGE';
}

export class UnknownPortalError extends InvalidRequestError {
  override readonly code: string = 'UNKNOWN_PORTAL';

  constructor(
    public readonly portal: string,
    knownPortals: readonly string[]
  ) {
    super(`Unknown portal "${portal}". Expected one of: ${knownPortals.join(', ')}`);
  }
}

/**
 * A requested column does not exist for the instrument, or names a derived compass column
 */
export class ColumnSelectionError extends ChordsExportError {
  readonly code: string = 'COLUMN_SELECTION';
  readonly exitCode = 2 as const;

  constructor(
    message: string,
    public readonly rejected: string[],
    public readonly available: string[]
  ) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Remote conditions reported by the portal
// ---------------------------------------------------------------------------

export class AuthenticationError extends ChordsExportError {
  readonly code: string = 'AUTHENTICATION_FAILED';
  readonly exitCode = 3 as const;
}

export class RemoteServerError extends ChordsExportError {
  readonly code: string = 'REMOTE_SERVER_ERROR';
  readonly exitCode = 4 as const;
}

/**
 * A transport failure kept recurring after every retry
 */
export class RetryExhaustedError extends ChordsExportError {
  readonly code: string = 'RETRY_EXHAUSTED';
  readonly exitCode = 4 as const;

  constructor(
    public readonly attempts: number,
    cause: Error
  ) {
    super(`Operation failed after ${attempts} attempts: ${cause.message}`, cause);
  }
}

// ---------------------------------------------------------------------------
// Malformed remote data
// ---------------------------------------------------------------------------

export class MalformedResponseError extends ChordsExportError {
  readonly code: string = 'MALFORMED_RESPONSE';
  readonly exitCode = 5 as const;

  constructor(
    message: string,
    public readonly responseBody?: unknown,
    cause?: Error
  ) {
    super(message, cause);
  }
}

/**
 * A directional field held a value that is not a whole-number bearing
 */
export class BearingTypeError extends MalformedResponseError {
  override readonly code: string = 'BEARING_TYPE';

  constructor(
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(`Bearing for "${field}" must be an integer, got ${JSON.stringify(value)}`, value);
  }
}

// ---------------------------------------------------------------------------
// Internal consistency
// ---------------------------------------------------------------------------

export class RangeSplitError extends ChordsExportError {
  readonly code: string = 'RANGE_SPLIT';
  readonly exitCode = 6 as const;
}

export class TimestampMismatchError extends ChordsExportError {
  readonly code: string = 'TIMESTAMP_MISMATCH';
  readonly exitCode = 6 as const;

  constructor(
    public readonly timestamps: number,
    public readonly observations: number,
    public readonly testFlags: number
  ) {
    super(
      `Dataset columns out of step: ${timestamps} timestamps, ${observations} observations, ${testFlags} test flags`
    );
  }
}

export class MalformedHeaderError extends ChordsExportError {
  readonly code: string = 'MALFORMED_HEADER';
  readonly exitCode = 6 as const;

  constructor(
    message: string,
    public readonly headers: string[]
  ) {
    super(message);
  }
}

/**
 * Type guard to check if an error is a ChordsExportError
 */
export function isChordsExportError(error: unknown): error is ChordsExportError {
  return error instanceof ChordsExportError;
}

/**
 * Errors that must stop every remaining instrument, whatever the run policy
 */
export function isRunFatal(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof MalformedHeaderError ||
    error instanceof TimestampMismatchError
  );
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
