/**
 * Error Handling Utilities
 * Common error handling patterns for CLI commands
 */

import { getErrorMessage, isChordsExportError } from '@chords-export/shared';
import chalk from 'chalk';
import type { Ora } from 'ora';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when command line input or the request file is unusable
 */
export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 2, false, options);
    this.name = 'CLIValidationError';
  }
}

const DEFAULT_TROUBLESHOOTING_TIPS = ['Try with --debug flag for more information'];

/**
 * Troubleshooting tips keyed by error code
 */
export const DOWNLOAD_TIPS: Readonly<Record<string, readonly string[]>> = {
  INVALID_REQUEST: [
    'Timestamps must be written as YYYY-MM-DD HH:MM:SS, window bounds as HH:MM:SS',
    `Run "chords-export portals" to see the portal names`,
  ],
  INVALID_TIME_RANGE: ['Timestamps must be written as YYYY-MM-DD HH:MM:SS, window bounds as HH:MM:SS'],
  UNKNOWN_PORTAL: ['Portal names are case sensitive', `Run "chords-export portals" to see the portal names`],
  COLUMN_SELECTION: [
    'Use the short-names shown on the CHORDS portal (e.g. mcp9808 -> mt1)',
    'Compass direction columns are derived and cannot be requested',
  ],
  AUTHENTICATION_FAILED: [
    'Check the portal URL, email address and API key',
    'Credentials may also come from CHORDS_EMAIL and CHORDS_API_KEY',
  ],
  REMOTE_SERVER_ERROR: [
    'Check that every instrument id exists on the portal',
    'Use --continue-on-error to skip failing instruments',
  ],
  RETRY_EXHAUSTED: ['Check network connectivity', 'Raise CHORDS_HTTP_TIMEOUT_MS or CHORDS_MAX_RETRIES'],
  RANGE_SPLIT: ['Request a shorter time range or a daily window', 'Raise CHORDS_MAX_DIVISIONS'],
};

export function tipsFor(error: unknown): readonly string[] {
  const tips = isChordsExportError(error) ? DOWNLOAD_TIPS[error.code] : undefined;
  return [...(tips ?? []), ...DEFAULT_TROUBLESHOOTING_TIPS];
}

/**
 * Process exit code for an error that reached the command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) return error.exitCode;
  if (isChordsExportError(error)) return error.exitCode;
  return 1;
}

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: readonly string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Handle command error with consistent formatting
 */
export function handleCommandError(
  error: unknown,
  spinner: Pick<Ora, 'fail' | 'stop'>,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: readonly string[];
  }
): never {
  // Re-throw CLIError directly to preserve original exitCode/silent flags
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const errorMessage = getErrorMessage(error);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(options.tips ?? tipsFor(error));

  throw new CLIError(errorMessage, exitCodeFor(error), true, { cause: error });
}
