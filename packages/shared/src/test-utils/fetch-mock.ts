import type { RawObservation } from '../types/chords';

export function createMockResponse<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createMockTextResponse(text: string, status: number, statusText = 'Error'): Response {
  return new Response(text, { status, statusText, headers: { 'Content-Type': 'text/html' } });
}

/** A portal data body wrapping the given observations */
export function createDataBody(observations: RawObservation[]) {
  return {
    type: 'FeatureCollection',
    features: [{ type: 'Feature', properties: { data: observations } }],
  };
}

export function createNetworkError(): TypeError {
  return new TypeError('Failed to fetch');
}

export function createTimeoutAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}
