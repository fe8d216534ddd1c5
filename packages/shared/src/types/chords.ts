// CHORDS portal API types (GET /api/v1/data/<instrument id>)

/** Scalar a portal reports for one short-name at one timestamp */
export type MeasurementValue = number | string | boolean | null;

export type Measurements = Record<string, MeasurementValue>;

/**
 * One entry of `features[0].properties.data`
 */
export interface RawObservation {
  time: string; // e.g. 2023-12-17T18:45:56Z
  test: string; // "true" | "false"
  measurements: Measurements;
}

/**
 * Measurements plus one `<field>_compass_dir` entry per directional field
 */
export type NormalizedObservation = Readonly<Record<string, MeasurementValue>>;

export interface ChordsCredentials {
  email: string;
  apiKey: string;
}

/**
 * Classification of one portal response. `too-many` is a signal to subdivide, not an error.
 */
export type FetchResult =
  | { kind: 'ok'; observations: RawObservation[] }
  | { kind: 'too-many'; detail: string }
  | { kind: 'auth-error'; message: string }
  | { kind: 'server-error'; message: string };
