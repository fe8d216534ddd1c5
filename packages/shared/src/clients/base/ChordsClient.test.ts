import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MalformedResponseError, RetryExhaustedError } from '../../errors';
import {
  createDataBody,
  createMockResponse,
  createMockTextResponse,
  createNetworkError,
  createTimeoutAbortError,
} from '../../test-utils/fetch-mock';
import { SilentLogger } from '../../utils/logger';
import { createTimeRange, parseTimestamp } from '../../utils/time';
import { ChordsClient, getMinIntervalMs, maskEmail, maskSecret, resetRateLimiter } from './ChordsClient';
import { ChordsApiError } from './errors';

const credentials = { email: 'test@example.com', apiKey: 'test-secret-key' };
const range = createTimeRange(parseTimestamp('2024-01-01 06:00:00'), parseTimestamp('2024-01-02 05:45:59'));

function createClient(maxRetries = 2) {
  return new ChordsClient({
    portalUrl: 'https://portal.example.org',
    credentials,
    logger: new SilentLogger(),
    retry: { maxRetries, retryDelayMs: 1, maxRetryDelayMs: 1 },
  });
}

describe('ChordsClient helpers', () => {
  it('derives the request interval with a safety margin', () => {
    expect(getMinIntervalMs(60)).toBe(1100);
    expect(getMinIntervalMs(120)).toBe(550);
  });

  it('masks secrets', () => {
    expect(maskSecret('1234567890')).toBe('1234...7890');
    expect(maskSecret('short')).toBe('****');
    expect(maskEmail('test@example.com')).toBe('t***@example.com');
    expect(maskEmail('nobody')).toBe('****');
  });
});

describe('ChordsClient URLs', () => {
  it('builds the data endpoint with the range and credentials', () => {
    expect(createClient().buildURL(7, range)).toBe(
      'https://portal.example.org/api/v1/data/7?start=2024-01-01+06%3A00%3A00&end=2024-01-02+05%3A45%3A59&email=test%40example.com&api_key=test-secret-key'
    );
  });

  it('keeps a portal path prefix', () => {
    const client = new ChordsClient({
      portalUrl: 'https://portal.example.org/chords/',
      credentials,
      logger: new SilentLogger(),
    });
    expect(client.buildURL(1, range)).toMatch(/^https:\/\/portal\.example\.org\/chords\/api\/v1\/data\/1\?/);
  });

  it('masks credentials in URLs meant for logs', () => {
    const client = createClient();
    const masked = client.maskURL(client.buildURL(7, range));
    expect(new URL(masked).searchParams.get('api_key')).toBe('test...-key');
    expect(new URL(masked).searchParams.get('email')).toBe('t***@example.com');
  });
});

describe('ChordsClient.fetchRange', () => {
  beforeEach(() => {
    resetRateLimiter({ disable: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetRateLimiter();
  });

  it('returns observations from a data body', async () => {
    const observation = { time: '2024-01-01T06:00:02Z', test: 'false', measurements: { t1: 25.3, wd: 90 } };
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(createMockResponse(createDataBody([observation])));

    const result = await createClient().fetchRange(7, range);

    expect(result).toEqual({ kind: 'ok', observations: [observation] });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0]?.[0]).toBe(createClient().buildURL(7, range));
  });

  it('classifies the too-many signal', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(createMockResponse({ errors: ['too many data points'] }));

    expect(await createClient().fetchRange(7, range)).toEqual({ kind: 'too-many', detail: 'too many data points' });
  });

  it('classifies authentication failures without retrying', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(createMockResponse({ errors: ['Access Denied, user authentication required.'] }, 401));

    const result = await createClient().fetchRange(7, range);

    expect(result.kind).toBe('auth-error');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('classifies a JSON server error body without retrying', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(createMockResponse({ error: 'Internal Server Error' }, 500));

    expect(await createClient().fetchRange(7, range)).toEqual({
      kind: 'server-error',
      message: 'Internal Server Error',
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries a non-JSON gateway failure', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(createMockTextResponse('<html>Bad Gateway</html>', 502, 'Bad Gateway'))
      .mockResolvedValueOnce(createMockResponse(createDataBody([])));

    expect(await createClient().fetchRange(7, range)).toEqual({ kind: 'ok', observations: [] });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('retries network errors and gives up after the configured attempts', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockRejectedValue(createNetworkError());

    const error = await createClient(1)
      .fetchRange(7, range)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('reports timeouts as retryable transport errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(createTimeoutAbortError());

    const error = await createClient(0)
      .fetchRange(7, range)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    const cause = error instanceof RetryExhaustedError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(ChordsApiError);
    expect(cause instanceof ChordsApiError && cause.isTimeoutError).toBe(true);
    expect(cause?.message).not.toContain('test-secret-key');
  });

  it('rejects a non-JSON success body', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(createMockTextResponse('<html></html>', 200, 'OK'));

    await expect(createClient().fetchRange(7, range)).rejects.toThrow(MalformedResponseError);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});
