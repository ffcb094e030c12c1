import { loadDocumentTokens } from '@colstream/pdf-extract';
import type { StreamerOptionsInput, StreamResult } from '@colstream/types';
import type { InputFileInfo } from './directory-scanner.js';
import { FinancialStreamer } from './streamer.js';

export interface ParseError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchDocument {
  file: InputFileInfo;
  result: StreamResult;
}

export interface BatchProcessResult {
  documents: BatchDocument[];
  parseErrors: ParseError[];
  summary: {
    totalFilesFound: number;
    filesSucceeded: number;
    filesFailed: number;
    totalPages: number;
    totalRows: number;
    totalValues: number;
  };
}

export interface BatchProcessOptions {
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
}

/**
 * Processes input files one after another, each as its own run with fresh
 * row and value counters. A failing file is recorded and the batch goes on.
 */
export async function processBatch(
  files: InputFileInfo[],
  streamerOptions: StreamerOptionsInput = {},
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const streamer = new FinancialStreamer(streamerOptions);
  const documents: BatchDocument[] = [];
  const parseErrors: ParseError[] = [];
  let totalPages = 0;
  let totalRows = 0;
  let totalValues = 0;

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    try {
      const tokens = await loadDocumentTokens(file.filePath, file.format);
      const result = streamer.processDocument(tokens.pages);

      documents.push({ file, result });
      totalPages += result.pages.length;
      totalRows += result.pages.reduce((sum, page) => sum + page.rowCount, 0);
      totalValues += result.values.length;
    } catch (error) {
      const parseError = createParseError(file, error);
      parseErrors.push(parseError);

      if (options.onError !== undefined) {
        options.onError(parseError);
      }
    }
  }

  return {
    documents,
    parseErrors,
    summary: {
      totalFilesFound: files.length,
      filesSucceeded: documents.length,
      filesFailed: parseErrors.length,
      totalPages,
      totalRows,
      totalValues,
    },
  };
}

function createParseError(file: InputFileInfo, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
