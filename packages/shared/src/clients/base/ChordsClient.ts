import { getConfig } from '../../config';
import { getErrorMessage, MalformedResponseError } from '../../errors';
import type { ChordsCredentials, FetchResult } from '../../types/chords';
import type { ILogger } from '../../utils/logger-interface';
import { logger as defaultLogger } from '../../utils/logger';
import { formatTimestamp, type TimeRange } from '../../utils/time';
import { classifyResponse } from '../../validators/chords-response';
import { BatchExecutor, type BatchExecutorConfig } from './BatchExecutor';
import { ChordsApiError } from './errors';

/**
 * Anything that can fetch one bounded range for one instrument.
 * The range splitter, window walker and orchestrator depend on this, not on HTTP.
 */
export interface RangeFetcher {
  fetchRange(instrumentId: number, range: TimeRange): Promise<FetchResult>;
}

export interface ChordsClientOptions {
  portalUrl: string;
  credentials: ChordsCredentials;
  logger?: ILogger;
  requestsPerMinute?: number;
  timeoutMs?: number;
  retry?: Partial<Pick<BatchExecutorConfig, 'maxRetries' | 'retryDelayMs' | 'maxRetryDelayMs'>>;
}

/**
 * Minimum interval between requests in ms, with a 10% safety margin
 */
export function getMinIntervalMs(requestsPerMinute: number): number {
  return Math.ceil(((60 * 1000) / requestsPerMinute) * 1.1);
}

/**
 * FIFO rate limit queue with explicit lock/queue control.
 * Serializes requests to enforce a minimum interval between API calls.
 * A single global instance is shared across all ChordsClient instances.
 */
class RateLimitQueue {
  private queue: Array<{
    minIntervalMs: number;
    resolve: () => void;
    reject: (error: Error) => void;
  }> = [];
  private processing = false;
  private lastRequestTime = 0;
  private _disabled = false;

  get disabled(): boolean {
    return this._disabled;
  }

  reset(options?: { disable?: boolean }): void {
    this.lastRequestTime = 0;
    this.queue = [];
    // processing is left alone; the processQueue loop ends on its own once the queue is empty
    this._disabled = options?.disable ?? false;
  }

  /**
   * Acquire a rate limit slot. Resolves when this request is allowed to proceed.
   * Requests are processed in strict FIFO order.
   */
  async acquire(minIntervalMs: number): Promise<void> {
    if (this._disabled) return;

    return new Promise<void>((resolve, reject) => {
      this.queue.push({ minIntervalMs, resolve, reject });
      this.processQueue().catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        for (const pending of this.queue.splice(0)) {
          pending.reject(failure);
        }
      });
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const next = this.queue.shift();
        if (!next) break;

        if (this._disabled) {
          next.resolve();
          continue;
        }

        const elapsed = Date.now() - this.lastRequestTime;
        if (elapsed < next.minIntervalMs) {
          await new Promise<void>((r) => setTimeout(r, next.minIntervalMs - elapsed));
        }

        this.lastRequestTime = Date.now();
        next.resolve();
      }
    } finally {
      this.processing = false;
    }
  }
}

/** Global rate limiter shared across all client instances */
const globalRateLimiter = new RateLimitQueue();

/**
 * Reset the global rate limiter state.
 * @param options.disable - If true, disables rate limiting entirely (useful for tests)
 */
export function resetRateLimiter(options?: { disable?: boolean }): void {
  globalRateLimiter.reset(options);
}

export function maskSecret(secret: string): string {
  return secret.length > 8 ? `${secret.slice(0, 4)}...${secret.slice(-4)}` : '****';
}

export function maskEmail(email: string): string {
  const at = email.indexOf('@');
  if (at <= 0) return '****';
  return `${email.slice(0, 1)}***${email.slice(at)}`;
}

/**
 * Client for the CHORDS data endpoint: `GET <portal>/api/v1/data/<id>?start&end&email&api_key`
 */
export class ChordsClient implements RangeFetcher {
  private readonly baseURL: string;
  private readonly credentials: ChordsCredentials;
  private readonly logger: ILogger;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly executor: BatchExecutor;

  constructor(options: ChordsClientOptions) {
    const config = getConfig();

    this.baseURL = options.portalUrl.endsWith('/') ? options.portalUrl : `${options.portalUrl}/`;
    this.credentials = { ...options.credentials };
    this.logger = (options.logger ?? defaultLogger).child({ component: 'chords-client' });
    this.minIntervalMs = getMinIntervalMs(options.requestsPerMinute ?? config.http.requestsPerMinute);
    this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
    this.executor = new BatchExecutor({
      ...config.retry,
      ...options.retry,
      shouldRetry: (error) => ChordsApiError.isChordsApiError(error) && error.isRetryable(),
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`Retrying request (attempt ${attempt}) in ${Math.round(delayMs)}ms: ${error.message}`);
      },
    });

    if (!this.credentials.email || !this.credentials.apiKey) {
      this.logger.warn('CHORDS email or API key is not set. The portal will deny access.');
    }
  }

  buildURL(instrumentId: number, range: TimeRange): string {
    const url = new URL(`api/v1/data/${instrumentId}`, this.baseURL);
    url.searchParams.set('start', formatTimestamp(range.start));
    url.searchParams.set('end', formatTimestamp(range.end));
    url.searchParams.set('email', this.credentials.email);
    url.searchParams.set('api_key', this.credentials.apiKey);
    return url.toString();
  }

  /**
   * URL with credentials replaced, safe for logs and error messages
   */
  maskURL(url: string): string {
    const masked = new URL(url);
    if (masked.searchParams.has('email')) {
      masked.searchParams.set('email', maskEmail(this.credentials.email));
    }
    if (masked.searchParams.has('api_key')) {
      masked.searchParams.set('api_key', maskSecret(this.credentials.apiKey));
    }
    return masked.toString();
  }

  async fetchRange(instrumentId: number, range: TimeRange): Promise<FetchResult> {
    const url = this.buildURL(instrumentId, range);
    this.logger.debug(`GET ${formatTimestamp(range.start)} -> ${formatTimestamp(range.end)}`, { instrumentId });

    const body = await this.executor.execute(() => this.fetchBody(url));
    const result = classifyResponse(body);

    if (result.kind === 'ok') {
      this.logger.debug(`Got ${result.observations.length} observations`, { instrumentId });
    } else {
      this.logger.debug(`Portal reported ${result.kind}`, { instrumentId });
    }
    return result;
  }

  /**
   * Wait for rate limit before making a request.
   * Delegates to the global RateLimitQueue which enforces FIFO ordering.
   */
  private async waitForRateLimit(): Promise<void> {
    await globalRateLimiter.acquire(this.minIntervalMs);
  }

  private async fetchBody(url: string): Promise<unknown> {
    await this.waitForRateLimit();
    const { response, text } = await this.send(url);
    return this.parseBody(url, response, text);
  }

  private async send(url: string): Promise<{ response: Response; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      return { response, text: await response.text() };
    } catch (error) {
      throw this.transportError(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private transportError(url: string, error: unknown): ChordsApiError {
    const cause = error instanceof Error ? error : undefined;
    if (error instanceof Error && error.name === 'AbortError') {
      return new ChordsApiError({
        message: `Request timed out after ${this.timeoutMs}ms: ${this.maskURL(url)}`,
        status: 0,
        statusText: 'Timeout',
        isTimeoutError: true,
        cause,
      });
    }
    return new ChordsApiError({
      message: `Network error requesting ${this.maskURL(url)}: ${getErrorMessage(error)}`,
      status: 0,
      statusText: 'Network Error',
      isNetworkError: true,
      cause,
    });
  }

  /**
   * JSON bodies are returned whatever the status; the portal reports its own conditions in them
   */
  private parseBody(url: string, response: Response, text: string): unknown {
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      if (!response.ok) {
        throw new ChordsApiError({
          message: `HTTP ${response.status} ${response.statusText} from ${this.maskURL(url)}`,
          status: response.status,
          statusText: response.statusText,
          responseBody: text,
        });
      }
      throw new MalformedResponseError(
        `Portal returned a non-JSON body for ${this.maskURL(url)}`,
        text,
        error instanceof Error ? error : undefined
      );
    }
   }
}
