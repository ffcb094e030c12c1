import type { StreamResult } from '@colstream/types';

/**
 * One line per emitted page with its detected column count, plus a line for
 * skipped pages when there are any.
 */
export function formatPageSummary(result: StreamResult): string[] {
  const lines = result.pages.map(page =>
    `Page ${page.pageNumber}: ${page.columnCount} columns, ${page.rowCount} rows, ${page.valueCount} values`
  );
  if (result.skippedPages.length > 0) {
    lines.push(`Skipped pages (no tokens): ${result.skippedPages.join(', ')}`);
  }
  return lines;
}

/**
 * Value catalog as written by --values-out.
 */
export function serializeValues(result: StreamResult): string {
  return JSON.stringify({ values: result.values }, null, 2);
}
