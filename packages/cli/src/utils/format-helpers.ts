/**
 * Format Helpers
 * Common formatting utilities for CLI commands
 */

import type { InstrumentStatus } from '@chords-export/shared';
import chalk from 'chalk';

/**
 * Format elapsed time in human-readable format
 */
export function formatElapsedTime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

export function colorForStatus(status: InstrumentStatus): (text: string) => string {
  switch (status) {
    case 'written':
      return chalk.green;
    case 'no-data':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
  }
}

/**
 * Log debug message if debug mode is enabled
 */
export function logDebug(debug: boolean, message: string): void {
  if (debug) console.log(chalk.gray(`[DEBUG] ${message}`));
}
