/**
 * Token extraction from PDF files using pdfjs-dist.
 *
 * Produces, per page, the word tokens (`text`, `x0`, `top`) the layout engine
 * consumes. Coordinates are converted from PDF space (origin bottom-left) to
 * page-top offsets.
 */
import { readFile } from 'fs/promises';
import type { Token } from '@colstream/types';

/**
 * Result of token extraction.
 */
export interface TokenExtractedPDF {
  /** Tokens per page, index 0 is page 1. Pages without text are empty arrays. */
  pages: Token[][];
  /** Total number of pages */
  totalPages: number;
  /** Metadata from the PDF */
  metadata: {
    title?: string | undefined;
    author?: string | undefined;
    creationDate?: string | undefined;
  };
  /** Non-fatal problems met while reading the file */
  warnings: string[];
}

/**
 * Shape of the pdfjs text items we read.
 */
export interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

/**
 * Extract word tokens per page from a PDF file.
 *
 * @param filePath - Path to the PDF file
 */
export async function extractPageTokens(filePath: string): Promise<TokenExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractPageTokensFromBuffer(new Uint8Array(dataBuffer));
}

/**
 * Extract word tokens per page from a buffer.
 */
export async function extractPageTokensFromBuffer(buffer: Buffer | Uint8Array): Promise<TokenExtractedPDF> {
  // Legacy build runs on Node 20 without extra polyfills
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const data = Buffer.isBuffer(buffer) ? new Uint8Array(buffer) : buffer;

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
  });

  const pdfDocument = await loadingTask.promise;
  try {
    const numPages = pdfDocument.numPages;
    const pages: Token[][] = [];

    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const pageHeight = page.getViewport({ scale: 1 }).height;
      const textContent = await page.getTextContent();

      const tokens: Token[] = [];
      for (const item of textContent.items) {
        // Only actual text items, not marked content
        if (!isTextItem(item)) continue;
        tokens.push(...textItemToTokens(item, pageHeight));
      }
      pages.push(tokens);
      page.cleanup();
    }

    const warnings: string[] = [];
    let title: string | undefined;
    let author: string | undefined;
    let creationDate: string | undefined;

    try {
      const metadata = await pdfDocument.getMetadata();
      const info: unknown = metadata.info;
      if (typeof info === 'object' && info !== null) {
        const fields = new Map<string, unknown>(Object.entries(info));
        const infoTitle = fields.get('Title');
        const infoAuthor = fields.get('Author');
        const infoCreationDate = fields.get('CreationDate');
        if (typeof infoTitle === 'string') title = infoTitle;
        if (typeof infoAuthor === 'string') author = infoAuthor;
        if (typeof infoCreationDate === 'string') creationDate = infoCreationDate;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Metadata unavailable: ${message}`);
    }

    return {
      pages,
      totalPages: numPages,
      metadata: {
        title,
        author,
        creationDate,
      },
      warnings,
    };
  } finally {
    await loadingTask.destroy();
  }
}

/**
 * Type guard to check if an item is a text item (has str and transform).
 */
export function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

/**
 * Convert one pdfjs text item into word tokens.
 *
 * Runs containing whitespace are split into words; each word's `x0` is placed
 * proportionally to its character offset within the run. `top` is measured
 * from the top edge of the page.
 *
 * @param item - pdfjs text item
 * @param pageHeight - Page height in PDF units (viewport at scale 1)
 */
export function textItemToTokens(item: PdfjsTextItemLike, pageHeight: number): Token[] {
  const str = item.str;
  if (str.trim().length === 0) return [];

  // Transform matrix [scaleX, skewX, skewY, scaleY, translateX, translateY]
  const transform = item.transform;
  const x = Number(transform[4]) || 0;
  const y = Number(transform[5]) || 0;

  const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
  const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);
  const top = pageHeight - y - height;

  const tokens: Token[] = [];
  for (const match of str.matchAll(/\S+/g)) {
    const offset = match.index ?? 0;
    tokens.push({
      text: match[0],
      x0: x + (width * offset) / str.length,
      top,
    });
  }
  return tokens;
}
