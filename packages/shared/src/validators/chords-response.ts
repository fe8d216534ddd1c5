/**
 * Zod validation and classification of CHORDS data responses
 */

import { type ZodIssue, z } from 'zod';
import { MalformedResponseError } from '../errors';
import type { FetchResult, RawObservation } from '../types/chords';

const AUTH_ERROR_PREFIX = 'Access Denied';

// ===== OBSERVATION VALIDATION =====

export const MeasurementValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export const RawObservationSchema: z.ZodType<RawObservation, z.ZodTypeDef, unknown> = z.object({
  time: z.string().min(1, 'Observation time is required'),
  test: z.union([z.string(), z.boolean()]).transform((value) => String(value)),
  measurements: z.record(z.string(), MeasurementValueSchema),
});

// ===== RESPONSE SHAPES =====

const ErrorsBodySchema = z.object({ errors: z.array(z.unknown()) });

const ErrorBodySchema = z.object({ error: z.string() });

const DataBodySchema = z.object({
  features: z
    .array(
      z.object({
        properties: z.object({ data: z.array(z.unknown()) }),
      })
    )
    .min(1, 'Response has no features'),
});

export function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

/**
 * Classify a decoded portal body. The portal reports its conditions in the body, not the status code.
 *
 * @throws MalformedResponseError for any shape that is neither data nor a known error report
 */
export function classifyResponse(body: unknown): FetchResult {
  const errors = ErrorsBodySchema.safeParse(body);
  if (errors.success) {
    const messages = errors.data.errors.map((entry) => String(entry));
    const [first] = messages;
    if (first?.startsWith(AUTH_ERROR_PREFIX)) {
      return { kind: 'auth-error', message: first };
    }
    return { kind: 'too-many', detail: messages.join('; ') };
  }

  const error = ErrorBodySchema.safeParse(body);
  if (error.success) {
    return { kind: 'server-error', message: error.data.error };
  }

  const data = DataBodySchema.safeParse(body);
  if (!data.success) {
    throw new MalformedResponseError(`Unexpected response shape: ${formatIssues(data.error.issues)}`, body);
  }

  const entries = data.data.features[0]?.properties.data ?? [];
  const observations = z.array(RawObservationSchema).safeParse(entries);
  if (!observations.success) {
    throw new MalformedResponseError(
      `Observation validation failed: ${formatIssues(observations.error.issues)}`,
      body
    );
  }

  return { kind: 'ok', observations: observations.data };
}
