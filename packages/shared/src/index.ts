/**
 * chords-export shared package - main entry point
 *
 * Retrieval engine, portal reference data and the ambient stack used by the CLI.
 * Everything else is reachable through subpath imports (e.g. `@chords-export/shared/utils/time`).
 */

// ===== CLIENT EXPORTS =====
export { type BatchExecutorConfig, BatchExecutor } from './clients/base/BatchExecutor';
export {
  ChordsClient,
  type ChordsClientOptions,
  maskEmail,
  maskSecret,
  type RangeFetcher,
  resetRateLimiter,
} from './clients/base/ChordsClient';
export { ChordsApiError } from './clients/base/errors';
// ===== COLUMN MODEL =====
export { buildHeaders, discoverFields, sortByPortalOrder } from './columns/column-model';
// ===== CONFIGURATION EXPORTS =====
export type { AppConfig } from './config';
export { getConfig, resetConfig, setConfig } from './config';
// ===== ERROR EXPORTS =====
export {
  AuthenticationError,
  BearingTypeError,
  ChordsExportError,
  ColumnSelectionError,
  getErrorMessage,
  InvalidRequestError,
  InvalidTimeRangeError,
  isChordsExportError,
  isRunFatal,
  MalformedHeaderError,
  MalformedResponseError,
  RangeSplitError,
  RemoteServerError,
  RetryExhaustedError,
  TimestampMismatchError,
  UnknownPortalError,
} from './errors';
// ===== PORTALS =====
export {
  getPortalProfile,
  isKnownPortal,
  listPortals,
  type PortalProfile,
  portalNames,
  type UnitEntry,
} from './portals/portal-profiles';
// ===== REQUEST =====
export {
  type DownloadRequest,
  type DownloadRequestInput,
  DownloadRequestInputSchema,
  parseDownloadRequest,
} from './request/download-request';
// ===== RETRIEVAL =====
export { Dataset, DatasetBuilder, TEST_COLUMN, TIME_COLUMN } from './retrieval/dataset';
export { compassLabel, normalizeMeasurements } from './retrieval/normalizer';
export {
  deriveHeaders,
  type InstrumentOutcome,
  type InstrumentStatus,
  retrieveInstrument,
  type RunDependencies,
  type RunSummary,
  runDownload,
} from './retrieval/orchestrator';
export { splitAndFetch } from './retrieval/range-splitter';
export type { DatasetSink, RetrievalOptions, RetrievalStrategy, TableTarget } from './retrieval/types';
export { walkDailyWindows } from './retrieval/window-walker';
// ===== TYPES =====
export type {
  ChordsCredentials,
  FetchResult,
  Measurements,
  MeasurementValue,
  NormalizedObservation,
  RawObservation,
} from './types/chords';
// ===== UTILITIES =====
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
export { logger, SilentLogger } from './utils/logger';
export {
  createDailyWindow,
  createTimeRange,
  type DailyWindow,
  formatTimestamp,
  parseTimestamp,
  type TimeRange,
  toISODateString,
} from './utils/time';
