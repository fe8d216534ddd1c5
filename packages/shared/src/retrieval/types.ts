import type { MeasurementValue } from '../types/chords';
import type { ILogger } from '../utils/logger-interface';

export type RetrievalStrategy = 'plain' | 'split' | 'windowed';

export interface RetrievalOptions {
  /** Runaway guard for the range splitter */
  maxDivisions: number;
  /** Days between progress lines from the window walker */
  progressIntervalDays?: number;
  logger: ILogger;
}

export interface SplitOutcome {
  /** Division count of the sweep that completed */
  divisions: number;
  requests: number;
}

export interface WalkOutcome {
  days: number;
  requests: number;
}

/**
 * Identifies one instrument's output within a run
 */
export interface TableTarget {
  portal: string;
  instrumentId: number;
  start: Date;
  end: Date;
  outputDir: string;
}

/**
 * Where finished instruments go. Implementations return the path they wrote.
 */
export interface DatasetSink {
  writeTable(target: TableTarget, headers: readonly string[], rows: readonly MeasurementValue[][]): Promise<string>;
  writeNoDataWarning(target: TableTarget): Promise<string>;
}
