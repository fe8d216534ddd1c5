/**
 * Adaptive range splitting for requests the portal refuses as too large.
 *
 * The whole range is cut into `divisions` equal pieces which are fetched in
 * order. When a piece is still too large the division count doubles, the
 * boundaries are recomputed over the whole range, and the sweep resumes at the
 * start of the piece that failed. Everything collected before the re-split is
 * kept; nothing is fetched twice.
 */

import type { RangeFetcher } from '../clients/base/ChordsClient';
import { AuthenticationError, RangeSplitError, RemoteServerError } from '../errors';
import type { FetchResult } from '../types/chords';
import { computeBoundaries, createTimeRange, formatTimestamp, type TimeRange } from '../utils/time';
import type { DatasetBuilder } from './dataset';
import type { RetrievalOptions, SplitOutcome } from './types';

const INITIAL_DIVISIONS = 2;

type UsableResult = Extract<FetchResult, { kind: 'ok' | 'too-many' }>;

/**
 * Turn the run-ending classifications into errors
 */
export function assertUsable(result: FetchResult, instrumentId: number): asserts result is UsableResult {
  if (result.kind === 'auth-error') {
    throw new AuthenticationError(`${result.message} Check the portal URL, email address and API key.`);
  }
  if (result.kind === 'server-error') {
    throw new RemoteServerError(
      `${result.message} for instrument ${instrumentId}. Check that the instrument id exists on the portal.`
    );
  }
}

/**
 * Pieces of one sweep. Pieces ending at or before `resumeAt` were collected by an earlier
 * sweep and are skipped; a piece straddling it is clipped to start there.
 */
export function planSweep(range: TimeRange, divisions: number, resumeAt: Date): TimeRange[] {
  const boundaries = computeBoundaries(range, divisions);
  const pieces: TimeRange[] = [];

  for (let i = 0; i < boundaries.length - 1; i++) {
    const start = boundaries[i];
    const end = boundaries[i + 1];
    if (!start || !end || end.getTime() <= resumeAt.getTime()) continue;

    pieces.push(createTimeRange(start.getTime() < resumeAt.getTime() ? resumeAt : start, end));
  }

  return pieces;
}

/**
 * Fetch `range` in ever finer pieces until a full sweep succeeds, appending every
 * successful piece to `collector` in chronological order.
 *
 * @throws RangeSplitError once the division count would pass `maxDivisions`, or the range can no longer be cut
 */
export async function splitAndFetch(
  fetcher: RangeFetcher,
  instrumentId: number,
  range: TimeRange,
  collector: DatasetBuilder,
  options: RetrievalOptions
): Promise<SplitOutcome> {
  const log = options.logger.child({ component: 'range-splitter', instrumentId });
  let divisions = INITIAL_DIVISIONS;
  let resumeAt = range.start;
  let requests = 0;

  log.info(`Large data request, reducing ${formatTimestamp(range.start)} -> ${formatTimestamp(range.end)}`);

  while (true) {
    if (divisions > options.maxDivisions) {
      throw new RangeSplitError(
        `Still too many datapoints after splitting into ${divisions / 2} pieces (limit ${options.maxDivisions})`
      );
    }

    let failedAt: Date | undefined;
    for (const piece of planSweep(range, divisions, resumeAt)) {
      requests++;
      const result = await fetcher.fetchRange(instrumentId, piece);
      assertUsable(result, instrumentId);

      if (result.kind === 'too-many') {
        failedAt = piece.start;
        break;
      }
      collector.append(result.observations);
    }

    if (failedAt === undefined) {
      log.info(`Finished reduction with ${divisions} divisions after ${requests} requests`);
      return { divisions, requests };
    }

    resumeAt = failedAt;
    divisions *= 2;
    log.debug(`Too many datapoints from ${formatTimestamp(failedAt)}, retrying with ${divisions} divisions`);
  }
}
