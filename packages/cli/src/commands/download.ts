/**
 * Download Command
 * Retrieves every requested instrument and writes one CSV file per instrument
 */

import {
  ChordsClient,
  type DatasetSink,
  type DownloadRequest,
  formatTimestamp,
  getConfig,
  type ILogger,
  logger,
  parseDownloadRequest,
  type RangeFetcher,
  type RunSummary,
  runDownload,
} from '@chords-export/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME } from '../utils/constants.js';
import { CsvExporter } from '../utils/csv-exporter.js';
import {
  displayError,
  displayFooter,
  displayHeader,
  displayKeyValue,
  displayList,
  displaySuccess,
  displayTable,
  displayWarning,
} from '../utils/display-helpers.js';
import { CLIError, handleCommandError } from '../utils/error-handling.js';
import { colorForStatus, formatElapsedTime, logDebug } from '../utils/format-helpers.js';
import { writeReadme } from '../utils/readme-writer.js';
import { type DownloadFlags, loadRequestFields } from '../utils/request-loader.js';

/**
 * Engine logger for the spinner's lifetime: warnings and above, everything with --debug
 */
export function commandLogger(debug: boolean): ILogger {
  return logger.child({ component: 'download' }, debug ? 'DEBUG' : 'WARN');
}

export interface DownloadDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
  /** Defaults to a ChordsClient for the request's portal */
  createFetcher?: (request: DownloadRequest) => RangeFetcher;
  sink?: DatasetSink;
}

export interface DownloadResult {
  summary: RunSummary;
  readmePath?: string;
}

function displaySummary(summary: RunSummary, request: DownloadRequest, readmePath?: string): void {
  displayHeader('Download Summary');

  displayKeyValue('Portal', chalk.cyan(summary.portal), 0);
  displayKeyValue(
    'Range',
    `${formatTimestamp(request.range.start)} -> ${formatTimestamp(request.range.end)}`,
    0
  );
  if (request.window) {
    displayKeyValue('Daily window', `${request.window.start.text} -> ${request.window.end.text}`, 0);
  }
  displayKeyValue('Output', chalk.cyan(request.outputDir), 0);
  displayKeyValue('Requests', String(summary.totalRequests), 0);
  displayKeyValue('Elapsed', formatElapsedTime(summary.durationMs), 0);
  console.log('');

  displayTable(
    ['Instrument', 'Status', 'Strategy', 'Rows', 'Measurements', 'File'],
    summary.outcomes.map((outcome) => [
      String(outcome.instrumentId),
      outcome.status,
      outcome.strategy ?? '-',
      String(outcome.rows),
      String(outcome.measurements),
      outcome.path ?? outcome.errorMessage ?? '-',
    ]),
    (line, i) => {
      const outcome = summary.outcomes[i];
      return outcome ? colorForStatus(outcome.status)(line) : line;
    }
  );

  if (readmePath) {
    console.log('');
    displayKeyValue('Units guide', chalk.cyan(readmePath), 0);
  }

  displayFooter();
}

/**
 * Load, validate and run one download. Exposed for tests; the command wires it to gunshi.
 */
export async function executeDownload(
  flags: DownloadFlags,
  debug: boolean,
  deps: DownloadDependencies = {}
): Promise<DownloadResult> {
  const log = deps.logger ?? commandLogger(debug);
  const spinner = ora('Preparing download request...').start();

  try {
    const fields = await loadRequestFields(flags, deps.env);
    const request = parseDownloadRequest(fields);
    spinner.stop();

    for (const warning of request.warnings) {
      displayWarning(warning);
    }
    logDebug(debug, `Instruments: ${request.instrumentIds.join(', ')}`);

    const config = getConfig();
    const fetcher =
      deps.createFetcher?.(request) ??
      new ChordsClient({ portalUrl: request.portalUrl, credentials: request.credentials, logger: log });

    spinner.start(`Downloading ${request.instrumentIds.length} instrument(s) from ${request.portal.name}...`);
    const summary = await runDownload(request, {
      fetcher,
      sink: deps.sink ?? new CsvExporter(),
      logger: log,
      options: {
        maxDivisions: config.retrieval.maxDivisions,
        progressIntervalDays: config.retrieval.progressIntervalDays,
      },
      onInstrumentStart: (instrumentId, index, total) => {
        spinner.text = `[${index + 1}/${total}] Reading instrument ${instrumentId}...`;
      },
    });
    spinner.stop();

    const readmePath = request.writeReadme ? await writeReadme(request.portal, request.outputDir) : undefined;
    displaySummary(summary, request, readmePath);
    return { summary, readmePath };
  } catch (error) {
    handleCommandError(error, spinner, { failMessage: 'Download failed', debug });
  }
}

export const downloadCommand = define({
  name: 'download',
  description: 'Download instrument data from a CHORDS portal into one CSV file per instrument',
  args: {
    config: {
      type: 'string',
      short: 'c',
      description: 'JSON request file; flags override its values',
    },
    portal: {
      type: 'string',
      short: 'p',
      description: 'Portal name, case sensitive (see "portals")',
    },
    'portal-url': {
      type: 'string',
      description: 'Portal base URL, e.g. https://portal.example.org/',
    },
    out: {
      type: 'string',
      short: 'o',
      description: 'Output directory',
    },
    instruments: {
      type: 'string',
      short: 'i',
      description: 'Comma separated instrument ids',
    },
    start: {
      type: 'string',
      description: 'Start timestamp, YYYY-MM-DD HH:MM:SS',
    },
    end: {
      type: 'string',
      description: 'End timestamp, YYYY-MM-DD HH:MM:SS',
    },
    columns: {
      type: 'string',
      description: 'Comma separated short-names to keep (default: all)',
    },
    'window-start': {
      type: 'string',
      description: 'Daily window start, HH:MM:SS',
    },
    'window-end': {
      type: 'string',
      description: 'Daily window end, HH:MM:SS',
    },
    'null-value': {
      type: 'string',
      description: 'Marker written for missing values (default: empty)',
    },
    'include-test': {
      type: 'boolean',
      description: 'Add a test flag column after each field',
    },
    email: {
      type: 'string',
      description: 'Portal account email (or CHORDS_EMAIL)',
    },
    'api-key': {
      type: 'string',
      description: 'Portal API key (or CHORDS_API_KEY)',
    },
    readme: {
      type: 'boolean',
      description: 'Write the units-of-measurement README.txt beside the data',
    },
    'continue-on-error': {
      type: 'boolean',
      description: 'Record a failing instrument and carry on with the rest',
    },
    debug: {
      type: 'boolean',
      short: 'd',
      description: 'Enable debug output',
      default: false,
    },
  },
  examples: `# Download from a request file
${CLI_NAME} download --config request.json

# Daily rainfall reset window for three instruments
${CLI_NAME} download --portal FEWSNET --portal-url https://portal.example.org/ --instruments 1,2,3 \\
  --start "2024-01-01 06:00:00" --end "2024-07-02 05:45:59" \\
  --columns rgt1,rgt2,rgp1,rgp2 --window-start 05:45:00 --window-end 06:00:59 --out ./data`,
  run: async (ctx) => {
    const debug = ctx.values.debug ?? false;

    const { summary } = await executeDownload(
      {
        config: ctx.values.config,
        portal: ctx.values.portal,
        portalUrl: ctx.values['portal-url'],
        out: ctx.values.out,
        instruments: ctx.values.instruments,
        start: ctx.values.start,
        end: ctx.values.end,
        columns: ctx.values.columns,
        windowStart: ctx.values['window-start'],
        windowEnd: ctx.values['window-end'],
        nullValue: ctx.values['null-value'],
        includeTest: ctx.values['include-test'],
        email: ctx.values.email,
        apiKey: ctx.values['api-key'],
        readme: ctx.values.readme,
        continueOnError: ctx.values['continue-on-error'],
      },
      debug
    );

    if (summary.failed > 0) {
      displayError(`${summary.failed} instrument(s) failed`);
      displayList(
        summary.outcomes
          .filter((outcome) => outcome.status === 'failed')
          .map((outcome) => `Instrument ${outcome.instrumentId}: ${outcome.errorMessage ?? 'unknown error'}`),
        { color: 'red' }
      );
      throw new CLIError(`${summary.failed} instrument(s) failed`, 1, true);
    }

    displaySuccess(`Downloaded ${summary.written} instrument(s), ${summary.noData} without data`);
  },
});
