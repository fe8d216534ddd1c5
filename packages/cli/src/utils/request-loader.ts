/**
 * Assembles raw download parameters from a JSON request file, command line flags and the environment.
 * Validation happens afterwards in `parseDownloadRequest`.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ENV_API_KEY, ENV_EMAIL } from './constants.js';
import { CLIValidationError } from './error-handling.js';

export interface DownloadFlags {
  config?: string;
  portal?: string;
  portalUrl?: string;
  out?: string;
  instruments?: string;
  start?: string;
  end?: string;
  columns?: string;
  windowStart?: string;
  windowEnd?: string;
  nullValue?: string;
  includeTest?: boolean;
  email?: string;
  apiKey?: string;
  readme?: boolean;
  continueOnError?: boolean;
}

export type RequestFields = Record<string, unknown>;

const RequestFileSchema = z.record(z.string(), z.unknown());

/**
 * Comma separated instrument ids. Entries that are not numbers are kept as NaN so validation reports them.
 */
export function parseIdList(text: string): number[] {
  return splitList(text).map((entry) => Number(entry));
}

export function splitList(text: string): string[] {
  return text
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export async function readRequestFile(filepath: string): Promise<RequestFields> {
  let text: string;
  try {
    text = await readFile(filepath, 'utf-8');
  } catch (error) {
    throw new CLIValidationError(`Cannot read request file ${filepath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CLIValidationError(`Request file ${filepath} is not valid JSON`, { cause: error });
  }

  const result = RequestFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CLIValidationError(`Request file ${filepath} must contain a JSON object`);
  }
  return result.data;
}

function flagFields(flags: DownloadFlags): RequestFields {
  const fields: RequestFields = {
    portalName: flags.portal,
    portalUrl: flags.portalUrl,
    outputDir: flags.out,
    instrumentIds: flags.instruments === undefined ? undefined : parseIdList(flags.instruments),
    start: flags.start,
    end: flags.end,
    columns: flags.columns === undefined ? undefined : splitList(flags.columns),
    windowStart: flags.windowStart,
    windowEnd: flags.windowEnd,
    nullValue: flags.nullValue,
    includeTest: flags.includeTest,
    email: flags.email,
    apiKey: flags.apiKey,
    writeReadme: flags.readme,
    continueOnError: flags.continueOnError,
  };
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

/**
 * Flags override file values; credentials still missing come from the environment
 */
export function mergeRequestFields(
  file: RequestFields,
  flags: DownloadFlags,
  env: NodeJS.ProcessEnv = process.env
): RequestFields {
  const merged: RequestFields = { ...file, ...flagFields(flags) };
  if (merged.email === undefined && env[ENV_EMAIL]) {
    merged.email = env[ENV_EMAIL];
  }
  if (merged.apiKey === undefined && env[ENV_API_KEY]) {
    merged.apiKey = env[ENV_API_KEY];
  }
  return merged;
}

export async function loadRequestFields(
  flags: DownloadFlags,
  env: NodeJS.ProcessEnv = process.env
): Promise<RequestFields> {
  const file = flags.config ? await readRequestFile(flags.config) : {};
  return mergeRequestFields(file, flags, env);
}
