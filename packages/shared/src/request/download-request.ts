/**
 * Download request: the user parameters of one run, validated once and passed to every component
 */

import { z } from 'zod';
import { InvalidRequestError } from '../errors';
import { getPortalProfile, type PortalProfile } from '../portals/portal-profiles';
import type { ChordsCredentials } from '../types/chords';
import type { ILogger } from '../utils/logger-interface';
import {
  addDays,
  createDailyWindow,
  createTimeRange,
  type DailyWindow,
  formatTimestamp,
  parseTimestamp,
  type TimeRange,
} from '../utils/time';

/** Portals keep a rolling archive of this many days */
export const ARCHIVE_DAYS = 365 * 2;

// Blank window bounds in a request file mean "not set"
const OptionalClock = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

export const DownloadRequestInputSchema = z
  .object({
    portalName: z.string().min(1, 'Portal name is required'),
    portalUrl: z.string().url('Portal URL must be an absolute URL'),
    outputDir: z.string().min(1, 'Output directory is required'),
    instrumentIds: z
      .array(z.number().int('Instrument ids must be integers'))
      .min(1, 'At least one instrument id is required'),
    email: z.string().email('Email must be a valid address'),
    apiKey: z.string().min(1, 'API key is required'),
    start: z.string().min(1, 'Start timestamp is required'),
    end: z.string().min(1, 'End timestamp is required'),
    columns: z.array(z.string().min(1)).default([]),
    windowStart: OptionalClock,
    windowEnd: OptionalClock,
    nullValue: z
      .union([z.string(), z.number()])
      .default('')
      .transform((value) => String(value)),
    includeTest: z.boolean().default(false),
    writeReadme: z.boolean().default(false),
    continueOnError: z.boolean().default(false),
  })
  .strict();

export type DownloadRequestInput = z.input<typeof DownloadRequestInputSchema>;

export interface DownloadRequest {
  readonly portal: PortalProfile;
  readonly portalUrl: string;
  readonly credentials: Readonly<ChordsCredentials>;
  readonly instrumentIds: readonly number[];
  readonly range: TimeRange;
  /** Absent means the whole range */
  readonly window?: DailyWindow;
  readonly columns: readonly string[];
  readonly nullMarker: string;
  readonly includeTest: boolean;
  readonly outputDir: string;
  readonly writeReadme: boolean;
  readonly continueOnError: boolean;
  /** Conditions worth telling the user about that do not stop the run */
  readonly warnings: readonly string[];
}

export interface ParseRequestOptions {
  now?: Date;
  logger?: ILogger;
}

function parseWindow(windowStart: string | undefined, windowEnd: string | undefined): DailyWindow | undefined {
  if (windowStart === undefined && windowEnd === undefined) return undefined;
  if (windowStart === undefined || windowEnd === undefined) {
    throw new InvalidRequestError(
      'Both windowStart and windowEnd must be set to restrict collection to a daily window'
    );
  }
  return createDailyWindow(windowStart, windowEnd);
}

export function collectRangeWarnings(range: TimeRange, now: Date): string[] {
  const warnings: string[] = [];
  if (range.start < addDays(now, -ARCHIVE_DAYS)) {
    warnings.push(
      `Start ${formatTimestamp(range.start)} is before the portal's two-year archive; only archived data will be returned`
    );
  }
  if (range.end > now) {
    warnings.push(`End ${formatTimestamp(range.end)} is in the future; data up to now will be returned`);
  }
  return warnings;
}

/**
 * Validate raw user parameters into an immutable request.
 *
 * @throws InvalidRequestError (or a subclass) describing the first problem found
 */
export function parseDownloadRequest(input: unknown, options: ParseRequestOptions = {}): DownloadRequest {
  const parsed = DownloadRequestInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidRequestError(`Invalid download request: ${issues.join(', ')}`, issues);
  }

  const values = parsed.data;
  const portal = getPortalProfile(values.portalName);
  const range = createTimeRange(parseTimestamp(values.start), parseTimestamp(values.end));
  const window = parseWindow(values.windowStart, values.windowEnd);
  const warnings = collectRangeWarnings(range, options.now ?? new Date());

  for (const warning of warnings) {
    options.logger?.warn(warning, { component: 'download-request' });
  }

  return Object.freeze({
    portal,
    portalUrl: values.portalUrl,
    credentials: Object.freeze({ email: values.email, apiKey: values.apiKey }),
    instrumentIds: Object.freeze([...values.instrumentIds]),
    range,
    window,
    columns: Object.freeze([...values.columns]),
    nullMarker: values.nullValue,
    includeTest: values.includeTest,
    outputDir: values.outputDir,
    writeReadme: values.writeReadme,
    continueOnError: values.continueOnError,
    warnings: Object.freeze(warnings),
  });
}
