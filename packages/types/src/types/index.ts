import type { Token } from '../schemas/token.js';

/**
 * Tokens judged to share one text line, ordered left to right by `x0`.
 */
export interface Row {
  /** Reference vertical position the row was grouped against */
  top: number;
  /** Tokens in this row, sorted by x0 */
  tokens: Token[];
}

/**
 * One numeric occurrence found inside a token's text.
 */
export interface NumericSpan {
  /** Start offset in the normalized text (inclusive) */
  start: number;
  /** End offset in the normalized text (exclusive) */
  end: number;
  /** Matched text as it appears in the token */
  raw: string;
  /** Payload with thousands separators removed */
  value: string;
}

/**
 * Catalog entry for an emitted value marker. `value` is never masked.
 */
export interface ValueRecord {
  id: number;
  page: number;
  rowId: number;
  column: number;
  x: number;
  value: string;
  raw: string;
}

export interface PageSummary {
  pageNumber: number;
  columnCount: number;
  rowCount: number;
  valueCount: number;
  baselines: number[];
}

export interface StreamResult {
  /** The annotated stream for the whole document */
  text: string;
  /** Non-empty pages only, in document order */
  pages: PageSummary[];
  values: ValueRecord[];
  /** Pages that delivered no tokens (1-based) */
  skippedPages: number[];
}
