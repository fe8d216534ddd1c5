/**
 * BatchExecutor - retries a single portal request with exponential backoff and jitter
 * Rate limiting is handled by ChordsClient, not here
 */

import { RetryExhaustedError } from '../../errors';

export interface BatchExecutorConfig {
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /** Errors for which this returns false are rethrown at once, untouched */
  shouldRetry: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

const DEFAULT_CONFIG: BatchExecutorConfig = {
  maxRetries: 3,
  retryDelayMs: 1000,
  maxRetryDelayMs: 10000,
  shouldRetry: () => true,
};

export class BatchExecutor {
  private readonly config: BatchExecutorConfig;

  constructor(config?: Partial<BatchExecutorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Execute a single operation with retry logic
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    let lastError = new Error('Operation was never attempted');

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.config.shouldRetry(lastError)) {
          throw lastError;
        }

        if (attempt < this.config.maxRetries) {
          await this.waitWithBackoff(attempt, lastError);
        }
      }
    }

    throw new RetryExhaustedError(this.config.maxRetries + 1, lastError);
  }

  private async waitWithBackoff(attempt: number, error: Error): Promise<void> {
    const baseDelay = this.config.retryDelayMs * 2 ** attempt;
    const cappedDelay = Math.min(baseDelay, this.config.maxRetryDelayMs);
    const jitter = Math.random() * cappedDelay;
    this.config.onRetry?.(error, attempt + 1, jitter);
    await new Promise((resolve) => setTimeout(resolve, jitter));
  }
}
