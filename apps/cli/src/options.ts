import { basename, extname } from 'path';
import type { ZodError } from 'zod';
import { isInputFormat, type InputFormat } from '@colstream/pdf-extract';
import { StreamerOptionsSchema, type StreamerOptions } from '@colstream/types';

export interface CliOptions {
  inputDir?: string;
  out?: string;
  inputFormat?: string;
  xTolerance: string;
  yTolerance: string;
  mask: boolean;
  numericPolicy: string;
  columnPolicy: string;
  clusterPolicy: string;
  rowPolicy: string;
  valuesOut?: string;
  summary: boolean;
  verbose: boolean;
}

/**
 * Read a boolean from the environment; 'true' and '1' are true.
 */
export function envBool(key: string, defaultVal: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
}

function parseNumber(value: string, flag: string): number {
  const trimmed = value.trim();
  const num = trimmed === '' ? NaN : Number(trimmed);
  if (Number.isNaN(num)) {
    throw new Error(`${flag} must be a number, got "${value}"`);
  }
  return num;
}

/**
 * Turn CLI flag values into validated engine options.
 */
export function resolveStreamerOptions(options: CliOptions): StreamerOptions {
  const candidate = {
    xTolerance: parseNumber(options.xTolerance, '--x-tolerance'),
    yTolerance: parseNumber(options.yTolerance, '--y-tolerance'),
    mask: options.mask,
    numericPolicy: options.numericPolicy,
    columnPolicy: options.columnPolicy,
    clusterPolicy: options.clusterPolicy,
    rowPolicy: options.rowPolicy,
  };

  const parsed = StreamerOptionsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Invalid options: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function resolveInputFormat(value: string | undefined): InputFormat | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.toLowerCase();
  if (!isInputFormat(normalized)) {
    throw new Error(`Unsupported input format "${value}" (expected pdf or json)`);
  }
  return normalized;
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

/**
 * Names of the files written for one input in batch mode.
 */
export function outputFileNames(fileName: string): { stream: string; values: string } {
  const stem = basename(fileName, extname(fileName));
  return {
    stream: `${stem}.stream.txt`,
    values: `${stem}.values.json`,
  };
}
