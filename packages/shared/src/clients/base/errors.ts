export interface ChordsApiErrorOptions {
  message: string;
  status: number;
  statusText: string;
  responseBody?: unknown;
  isNetworkError?: boolean;
  isTimeoutError?: boolean;
  cause?: Error;
}

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Transport-level failure talking to a portal. Conditions the portal reports in a JSON body
 * are classified by the client and never surface as this error.
 */
export class ChordsApiError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly responseBody: unknown;
  readonly isNetworkError: boolean;
  readonly isTimeoutError: boolean;

  constructor(options: ChordsApiErrorOptions) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'ChordsApiError';
    this.status = options.status;
    this.statusText = options.statusText;
    this.responseBody = options.responseBody;
    this.isNetworkError = options.isNetworkError ?? false;
    this.isTimeoutError = options.isTimeoutError ?? false;
  }

  static isChordsApiError(error: unknown): error is ChordsApiError {
    return error instanceof ChordsApiError;
  }

  isRetryable(): boolean {
    if (this.isNetworkError || this.isTimeoutError) {
      return true;
    }
    return RETRYABLE_STATUS_CODES.has(this.status);
  }
}
