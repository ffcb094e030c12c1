#!/usr/bin/env -S node --import tsx
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import { loadDocumentTokens } from '@colstream/pdf-extract';
import {
  FinancialStreamer,
  processBatch,
  scanDirectoryForInputs,
  validateDirectory,
  type ParseError,
} from '@colstream/stream';
import {
  CLI_DEFAULT_X_TOLERANCE,
  CLI_DEFAULT_Y_TOLERANCE,
  ENGINE_VERSION,
  type StreamerOptions,
} from '@colstream/types';
import {
  envBool,
  outputFileNames,
  resolveInputFormat,
  resolveStreamerOptions,
  type CliOptions,
} from './options.js';
import { formatPageSummary, serializeValues } from './report.js';

const program = new Command();

program
  .name('colstream')
  .description('Reconstruct row/column layout of financial PDFs into an annotated token stream')
  .version(ENGINE_VERSION)
  .argument('[input-file]', 'PDF file, or JSON token document')
  .option('-d, --input-dir <directory>', 'Directory of PDF/JSON files to process', process.env['STREAM_INPUT_DIR'])
  .option('-o, --out <path>', 'Output file (single input) or directory (batch); default: stdout / input directory', process.env['STREAM_OUTPUT_FILE'])
  .option('-f, --input-format <format>', 'Input format: pdf or json (default: from file extension)', process.env['STREAM_INPUT_FORMAT'])
  .option('-x, --x-tolerance <points>', 'Horizontal tolerance for column clustering', process.env['STREAM_X_TOLERANCE'] ?? String(CLI_DEFAULT_X_TOLERANCE))
  .option('-y, --y-tolerance <points>', 'Vertical tolerance for row grouping', process.env['STREAM_Y_TOLERANCE'] ?? String(CLI_DEFAULT_Y_TOLERANCE))
  .option('-m, --mask', 'Mask numeric payloads, keeping their identifiers', envBool('STREAM_MASK', false))
  .option('--numeric-policy <policy>', 'Numeric matching: embedded, whole-token', process.env['STREAM_NUMERIC_POLICY'] ?? 'embedded')
  .option('--column-policy <policy>', 'Column assignment: first-match, nearest', process.env['STREAM_COLUMN_POLICY'] ?? 'first-match')
  .option('--cluster-policy <policy>', 'Baseline clustering: anchor, centroid', process.env['STREAM_CLUSTER_POLICY'] ?? 'anchor')
  .option('--row-policy <policy>', 'Row grouping: anchor, centroid', process.env['STREAM_ROW_POLICY'] ?? 'anchor')
  .option('--values-out <file>', 'Write the value catalog (id -> page, row, column, value) as JSON')
  .option('--summary', 'Print detected columns per page to stderr', envBool('STREAM_SUMMARY', false))
  .option('-v, --verbose', 'Enable verbose output', envBool('STREAM_VERBOSE', false))
  .action(async (inputFile: string | undefined, options: CliOptions) => {
    try {
      const streamerOptions = resolveStreamerOptions(options);

      if (options.inputDir !== undefined) {
        await processDirectory(options.inputDir, streamerOptions, options);
      } else if (inputFile !== undefined) {
        await processSingleFile(inputFile, streamerOptions, options);
      } else {
        console.error('[ERROR] Either an input file or --input-dir must be specified');
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

function logOptions(streamerOptions: StreamerOptions): void {
  console.error(`[INFO] Engine version: ${ENGINE_VERSION}`);
  console.error(`[INFO] Tolerance: x=${streamerOptions.xTolerance} y=${streamerOptions.yTolerance}`);
  console.error(`[INFO] Masking: ${streamerOptions.mask ? 'enabled' : 'disabled'}`);
  console.error(
    `[INFO] Policies: numeric=${streamerOptions.numericPolicy} column=${streamerOptions.columnPolicy} ` +
    `cluster=${streamerOptions.clusterPolicy} row=${streamerOptions.rowPolicy}`
  );
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
}

/**
 * Process a single PDF or token document
 */
async function processSingleFile(
  inputFile: string,
  streamerOptions: StreamerOptions,
  options: CliOptions
): Promise<void> {
  const filePath = resolve(inputFile);
  const format = resolveInputFormat(options.inputFormat);

  if (options.verbose) {
    console.error(`[INFO] Processing: ${filePath}`);
    logOptions(streamerOptions);
  }

  const tokens = await loadDocumentTokens(filePath, format);
  for (const warning of tokens.warnings) {
    console.error(`[WARN] ${warning}`);
  }

  if (options.verbose) {
    const tokenCount = tokens.pages.reduce((sum, page) => sum + page.length, 0);
    console.error(`[INFO] Loaded ${tokens.pages.length} pages (${tokenCount} tokens) from ${tokens.format.toUpperCase()}`);
  }

  const result = new FinancialStreamer(streamerOptions).processDocument(tokens.pages);

  if (result.pages.length === 0) {
    console.error('[WARN] No page produced any tokens; output is empty');
  }

  if (options.summary || options.verbose) {
    for (const line of formatPageSummary(result)) {
      console.error(`[INFO] ${line}`);
    }
  }

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await writeOutput(outPath, result.text + '\n');
    console.error(`[INFO] Output written to: ${outPath}`);
  } else {
    console.log(result.text);
  }

  if (options.valuesOut !== undefined) {
    const valuesPath = resolve(options.valuesOut);
    await writeOutput(valuesPath, serializeValues(result) + '\n');
    console.error(`[INFO] Value catalog written to: ${valuesPath} (${result.values.length} values)`);
  }
}

/**
 * Process every PDF/JSON file of a directory, one run per file
 */
async function processDirectory(
  inputDir: string,
  streamerOptions: StreamerOptions,
  options: CliOptions
): Promise<void> {
  const dirPath = resolve(inputDir);

  if (options.verbose) {
    console.error(`[INFO] Batch mode: scanning directory`);
    console.error(`[INFO] Directory: ${dirPath}`);
    logOptions(streamerOptions);
  }

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    console.error(`[ERROR] ${validation.error ?? `Cannot access directory: ${dirPath}`}`);
    process.exit(1);
  }

  const scanResult = await scanDirectoryForInputs(dirPath);

  if (scanResult.files.length === 0) {
    console.error('[ERROR] No PDF or JSON files found in directory');
    if (scanResult.skipped.length > 0) {
      console.error('[INFO] Skipped files:');
      for (const skip of scanResult.skipped) {
        console.error(`  - ${skip.fileName}: ${skip.reason}`);
      }
    }
    process.exit(1);
  }

  if (options.verbose) {
    console.error(`[INFO] Found ${scanResult.files.length} input file(s)`);
    if (scanResult.skipped.length > 0) {
      console.error(`[INFO] Skipped ${scanResult.skipped.length} file(s)`);
    }
  }

  const result = await processBatch(scanResult.files, streamerOptions, {
    onProgress: (current, total, filename) => {
      console.error(`[INFO] Processing ${current}/${total}: ${filename}`);
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to process ${error.filename}: ${error.error}`);
    },
  });

  const outDir = options.out !== undefined ? resolve(options.out) : dirPath;

  for (const doc of result.documents) {
    const names = outputFileNames(doc.file.fileName);
    const streamPath = resolve(outDir, names.stream);
    const valuesPath = resolve(outDir, names.values);

    await writeOutput(streamPath, doc.result.text + '\n');
    await writeOutput(valuesPath, serializeValues(doc.result) + '\n');
    console.error(`[INFO] Written: ${streamPath}`);

    if (options.summary) {
      for (const line of formatPageSummary(doc.result)) {
        console.error(`  ${line}`);
      }
    }
  }

  console.error('');
  console.error('=== Batch Processing Summary ===');
  console.error(`Total files found:  ${result.summary.totalFilesFound}`);
  console.error(`Files succeeded:    ${result.summary.filesSucceeded}`);
  console.error(`Files failed:       ${result.summary.filesFailed}`);
  console.error(`Pages emitted:      ${result.summary.totalPages}`);
  console.error(`Rows emitted:       ${result.summary.totalRows}`);
  console.error(`Values tagged:      ${result.summary.totalValues}`);
  console.error('================================');

  if (result.parseErrors.length > 0) {
    process.exitCode = 1;
  }
}

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  process.exit(1);
});
