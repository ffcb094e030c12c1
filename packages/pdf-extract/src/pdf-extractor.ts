import { extname } from 'path';
import type { Token } from '@colstream/types';
import { extractPageTokens } from './layout-pdfjs.js';
import { loadTokenDocument } from './token-loader.js';

export const INPUT_FORMATS = ['pdf', 'json'] as const;
export type InputFormat = typeof INPUT_FORMATS[number];

export interface DocumentTokens {
  /** Tokens per page, in document order */
  pages: Token[][];
  format: InputFormat;
  warnings: string[];
}

/**
 * Infer the input format from a file extension.
 * Returns null for anything other than .pdf and .json.
 */
export function detectInputFormat(filePath: string): InputFormat | null {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.json') return 'json';
  return null;
}

export function isInputFormat(value: string): value is InputFormat {
  return (INPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Load the per-page tokens of a document, either by parsing a PDF or by
 * reading a JSON token document.
 *
 * @param filePath - Input file
 * @param format - Explicit format; inferred from the extension when omitted
 */
export async function loadDocumentTokens(filePath: string, format?: InputFormat): Promise<DocumentTokens> {
  const resolved = format ?? detectInputFormat(filePath);
  if (resolved === null) {
    throw new Error(`Cannot infer input format of ${filePath} (expected .pdf or .json)`);
  }

  if (resolved === 'json') {
    const doc = await loadTokenDocument(filePath);
    return { pages: doc.pages, format: 'json', warnings: [] };
  }

  const extracted = await extractPageTokens(filePath);
  return { pages: extracted.pages, format: 'pdf', warnings: extracted.warnings };
}
