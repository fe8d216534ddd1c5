/**
 * Retrieval orchestrator: runs every instrument of a download request through
 * fetch, reassembly, header derivation and the output sink, one at a time.
 */

import type { RangeFetcher } from '../clients/base/ChordsClient';
import { buildHeaders } from '../columns/column-model';
import { getErrorMessage, isChordsExportError, isRunFatal, MalformedHeaderError } from '../errors';
import type { DownloadRequest } from '../request/download-request';
import type { ILogger } from '../utils/logger-interface';
import { formatTimestamp } from '../utils/time';
import { type Dataset, DatasetBuilder, TIME_COLUMN } from './dataset';
import { assertUsable, splitAndFetch } from './range-splitter';
import type { DatasetSink, RetrievalOptions, RetrievalStrategy, TableTarget } from './types';
import { walkDailyWindows } from './window-walker';

export interface RetrievedInstrument {
  dataset: Dataset;
  strategy: RetrievalStrategy;
  requests: number;
}

export type InstrumentStatus = 'written' | 'no-data' | 'failed';

export interface InstrumentOutcome {
  instrumentId: number;
  status: InstrumentStatus;
  strategy?: RetrievalStrategy;
  /** File written for the instrument: the table or the no-data warning */
  path?: string;
  rows: number;
  measurements: number;
  requests: number;
  durationMs: number;
  errorCode?: string;
  errorMessage?: string;
}

export interface RunSummary {
  portal: string;
  outcomes: InstrumentOutcome[];
  written: number;
  noData: number;
  failed: number;
  totalRows: number;
  totalRequests: number;
  durationMs: number;
}

export interface RunDependencies {
  fetcher: RangeFetcher;
  sink: DatasetSink;
  logger: ILogger;
  options: Omit<RetrievalOptions, 'logger'>;
  /** Called before each instrument starts */
  onInstrumentStart?: (instrumentId: number, index: number, total: number) => void;
  onInstrumentDone?: (outcome: InstrumentOutcome) => void;
}

/**
 * Collect one instrument's observations over the request range.
 *
 * With a daily window the window walker runs; otherwise the whole range is requested at once
 * and handed to the range splitter only if the portal refuses it as too large.
 */
export async function retrieveInstrument(
  fetcher: RangeFetcher,
  request: DownloadRequest,
  instrumentId: number,
  options: RetrievalOptions
): Promise<RetrievedInstrument> {
  const collector = new DatasetBuilder(request.nullMarker);

  if (request.window) {
    const walk = await walkDailyWindows(fetcher, instrumentId, request.range, request.window, collector, options);
    return { dataset: collector.build(), strategy: 'windowed', requests: walk.requests };
  }

  const result = await fetcher.fetchRange(instrumentId, request.range);
  assertUsable(result, instrumentId);

  if (result.kind === 'too-many') {
    options.logger.debug(`Portal refused full range: ${result.detail}`, { instrumentId });
    const split = await splitAndFetch(fetcher, instrumentId, request.range, collector, options);
    return { dataset: collector.build(), strategy: 'split', requests: split.requests + 1 };
  }

  collector.append(result.observations);
  return { dataset: collector.build(), strategy: 'plain', requests: 1 };
}

/**
 * Header row for a retrieved dataset, checked against the rows it will describe
 *
 * @throws MalformedHeaderError when the headers cannot describe the dataset
 */
export function deriveHeaders(dataset: Dataset, request: DownloadRequest): string[] {
  const headers = buildHeaders(dataset.observations, request.columns, request.includeTest, request.portal);
  if (headers.length === 0) return headers;

  if (headers[0] !== TIME_COLUMN) {
    throw new MalformedHeaderError(`Header row must start with "${TIME_COLUMN}"`, headers);
  }
  if (dataset.isEmpty()) {
    throw new MalformedHeaderError('Header row derived for a dataset without rows', headers);
  }
  return headers;
}

export function tableTarget(request: DownloadRequest, instrumentId: number): TableTarget {
  return {
    portal: request.portal.name,
    instrumentId,
    start: request.range.start,
    end: request.range.end,
    outputDir: request.outputDir,
  };
}

async function processInstrument(
  request: DownloadRequest,
  instrumentId: number,
  deps: RunDependencies,
  log: ILogger
): Promise<InstrumentOutcome> {
  const startedAt = Date.now();
  const retrieved = await retrieveInstrument(deps.fetcher, request, instrumentId, { ...deps.options, logger: log });
  const { dataset } = retrieved;
  const headers = deriveHeaders(dataset, request);
  const target = tableTarget(request, instrumentId);

  if (headers.length === 0) {
    const path = await deps.sink.writeNoDataWarning(target);
    log.warn(`No data found for instrument ${instrumentId}`, { instrumentId, path });
    return {
      instrumentId,
      status: 'no-data',
      strategy: retrieved.strategy,
      path,
      rows: 0,
      measurements: dataset.measurementCount,
      requests: retrieved.requests,
      durationMs: Date.now() - startedAt,
    };
  }

  const path = await deps.sink.writeTable(target, headers, dataset.toRows(headers, request.nullMarker));
  log.info(`Finished writing instrument ${instrumentId}`, {
    instrumentId,
    path,
    rows: dataset.length,
    measurements: dataset.measurementCount,
  });
  return {
    instrumentId,
    status: 'written',
    strategy: retrieved.strategy,
    path,
    rows: dataset.length,
    measurements: dataset.measurementCount,
    requests: retrieved.requests,
    durationMs: Date.now() - startedAt,
  };
}

function summarize(portal: string, outcomes: InstrumentOutcome[], durationMs: number): RunSummary {
  return {
    portal,
    outcomes,
    written: outcomes.filter((o) => o.status === 'written').length,
    noData: outcomes.filter((o) => o.status === 'no-data').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    totalRows: outcomes.reduce((sum, o) => sum + o.rows, 0),
    totalRequests: outcomes.reduce((sum, o) => sum + o.requests, 0),
    durationMs,
  };
}

/**
 * Process every instrument of the request strictly in order.
 *
 * Authentication and data integrity failures always end the run. Any other failure ends it too
 * unless `continueOnError` is set, in which case it is recorded against the instrument.
 */
export async function runDownload(request: DownloadRequest, deps: RunDependencies): Promise<RunSummary> {
  const log = deps.logger.child({ component: 'orchestrator' });
  const startedAt = Date.now();
  const outcomes: InstrumentOutcome[] = [];
  const total = request.instrumentIds.length;

  log.info(
    `Downloading ${total} instrument(s) from ${request.portal.name}: ` +
      `${formatTimestamp(request.range.start)} -> ${formatTimestamp(request.range.end)}`
  );
  if (request.window) {
    log.info(`Daily window ${request.window.start.text} -> ${request.window.end.text}`);
  }

  for (const [index, instrumentId] of request.instrumentIds.entries()) {
    deps.onInstrumentStart?.(instrumentId, index, total);
    const instrumentLog = log.child({ instrumentId });
    const instrumentStartedAt = Date.now();
    let outcome: InstrumentOutcome;

    try {
      outcome = await processInstrument(request, instrumentId, deps, instrumentLog);
    } catch (error) {
      if (isRunFatal(error) || !request.continueOnError) {
        throw error;
      }
      instrumentLog.error(`Instrument ${instrumentId} failed: ${getErrorMessage(error)}`, { instrumentId });
      outcome = {
        instrumentId,
        status: 'failed',
        rows: 0,
        measurements: 0,
        requests: 0,
        durationMs: Date.now() - instrumentStartedAt,
        errorCode: isChordsExportError(error) ? error.code : 'UNKNOWN_ERROR',
        errorMessage: getErrorMessage(error),
      };
    }

    outcomes.push(outcome);
    deps.onInstrumentDone?.(outcome);
  }

  const summary = summarize(request.portal.name, outcomes, Date.now() - startedAt);
  log.info(`Run finished: ${summary.written} written, ${summary.noData} without data, ${summary.failed} failed`);
  return summary;
}
