/**
 * Page stream serialization.
 *
 * Turns a page's tokens into annotated lines:
 *
 *   [r_001]<x:010> <col:1, x:010> Revenue <col:2, x:200> <v_001:1234>
 */
import {
  clusterCoordinates,
  collectXOrigins,
  filterEmptyRows,
  getColumnIndex,
  groupTokensIntoRows,
} from '@colstream/pdf-extract';
import { normalizeText, tagText } from '@colstream/tagging';
import {
  formatPadded,
  truncateCoordinate,
  type Row,
  type StreamerOptions,
  type Token,
  type ValueRecord,
} from '@colstream/types';
import type { RunCounters } from './counters.js';

export interface SerializedRow {
  rowId: number;
  line: string;
  values: ValueRecord[];
}

export interface SerializedPage {
  pageNumber: number;
  lines: string[];
  baselines: number[];
  values: ValueRecord[];
}

export function formatPageHeader(pageNumber: number, columnCount: number): string {
  return `=== PAGE ${pageNumber} [Detected ${columnCount} Columns] ===`;
}

export function formatRowPrefix(rowId: number, baseX: number): string {
  return `[r_${formatPadded(rowId)}]<x:${formatPadded(baseX)}> `;
}

export function formatFragment(column: number, x: number, taggedText: string): string {
  return `<col:${column}, x:${formatPadded(x)}> ${taggedText} `;
}

/**
 * Serialize one row, drawing a row id and one value id per numeric span.
 * The row must not be empty.
 */
export function serializeRow(
  row: Row,
  baselines: readonly number[],
  pageNumber: number,
  options: StreamerOptions,
  counters: RunCounters
): SerializedRow {
  const first = row.tokens[0];
  if (first === undefined) {
    throw new Error(`Cannot serialize an empty row on page ${pageNumber}`);
  }

  const rowId = counters.nextRowId();
  const values: ValueRecord[] = [];
  let line = formatRowPrefix(rowId, truncateCoordinate(first.x0));

  for (const token of row.tokens) {
    const column = getColumnIndex(token.x0, baselines, options.xTolerance, options.columnPolicy);
    const x = truncateCoordinate(token.x0);
    const tagged = tagText(
      normalizeText(token.text),
      { policy: options.numericPolicy, mask: options.mask },
      counters
    );

    for (const { id, span } of tagged.values) {
      values.push({
        id,
        page: pageNumber,
        rowId,
        column,
        x,
        value: span.value,
        raw: span.raw,
      });
    }

    line += formatFragment(column, x, tagged.text);
  }

  return { rowId, line, values };
}

/**
 * Serialize one page. Returns null for a page without tokens, which then
 * contributes nothing to the document (no header, no counters consumed).
 */
export function serializePage(
  tokens: readonly Token[],
  pageNumber: number,
  options: StreamerOptions,
  counters: RunCounters
): SerializedPage | null {
  if (tokens.length === 0) return null;

  const rows = filterEmptyRows(groupTokensIntoRows(tokens, options.yTolerance, options.rowPolicy));
  const baselines = clusterCoordinates(collectXOrigins(rows), options.xTolerance, options.clusterPolicy);

  const lines: string[] = [];
  const values: ValueRecord[] = [];
  for (const row of rows) {
    const serialized = serializeRow(row, baselines, pageNumber, options, counters);
    lines.push(serialized.line);
    values.push(...serialized.values);
  }

  return { pageNumber, lines, baselines, values };
}

/**
 * Header plus lines of a serialized page.
 */
export function renderPage(page: SerializedPage): string {
  return `${formatPageHeader(page.pageNumber, page.baselines.length)}\n${page.lines.join('\n')}`;
}
