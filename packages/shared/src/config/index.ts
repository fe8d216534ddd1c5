/**
 * Runtime tuning with environment variable support
 * The log level is not part of it: the logger reads LOG_LEVEL itself
 */

export interface HttpConfig {
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface RetryConfig {
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
}

export interface RetrievalConfig {
  /** Upper bound on sub-divisions before the range splitter gives up */
  maxDivisions: number;
  /** Days between progress lines from the daily window walker */
  progressIntervalDays: number;
}

export interface AppConfig {
  http: HttpConfig;
  retry: RetryConfig;
  retrieval: RetrievalConfig;
}

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: AppConfig = {
  http: {
    requestsPerMinute: 60,
    timeoutMs: 30000,
  },
  retry: {
    maxRetries: 3,
    retryDelayMs: 1000,
    maxRetryDelayMs: 10000,
  },
  retrieval: {
    maxDivisions: 4096,
    progressIntervalDays: 100,
  },
};

/**
 * Parse numeric environment variable with fallback
 */
function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Positive integers only; anything else falls back
 */
function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Load configuration from environment variables with defaults
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    http: {
      requestsPerMinute: parsePositiveInt(env.CHORDS_REQUESTS_PER_MINUTE, DEFAULT_CONFIG.http.requestsPerMinute),
      timeoutMs: parsePositiveInt(env.CHORDS_HTTP_TIMEOUT_MS, DEFAULT_CONFIG.http.timeoutMs),
    },
    retry: {
      maxRetries: Math.max(0, Math.trunc(parseNumber(env.CHORDS_MAX_RETRIES, DEFAULT_CONFIG.retry.maxRetries))),
      retryDelayMs: parseNumber(env.CHORDS_RETRY_DELAY_MS, DEFAULT_CONFIG.retry.retryDelayMs),
      maxRetryDelayMs: parseNumber(env.CHORDS_MAX_RETRY_DELAY_MS, DEFAULT_CONFIG.retry.maxRetryDelayMs),
    },
    retrieval: {
      maxDivisions: parsePositiveInt(env.CHORDS_MAX_DIVISIONS, DEFAULT_CONFIG.retrieval.maxDivisions),
      progressIntervalDays: parsePositiveInt(
        env.CHORDS_PROGRESS_INTERVAL_DAYS,
        DEFAULT_CONFIG.retrieval.progressIntervalDays
      ),
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (mainly for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Override specific configuration values (mainly for testing)
 */
export function setConfig(overrides: Partial<AppConfig>): void {
  configInstance = {
    ...getConfig(),
    ...overrides,
  };
}
