/**
 * Row grouping for layout reconstruction.
 * Groups page tokens into text lines based on vertical proximity.
 */
import type { Row, RowPolicy, Token } from '@colstream/types';

/**
 * Group tokens into rows based on `top` proximity.
 *
 * Tokens are visited in `(top, x0)` order. Under the `anchor` policy a token
 * joins the current row when it lies within `yTolerance` of the reference
 * position, and the reference is reset to the `top` of the token that opens
 * each new row. Since only the row's first member is compared against, a row
 * may drift by up to `(members - 1) * yTolerance` before a token is rejected.
 *
 * The `centroid` policy compares against the running mean `top` of the row
 * instead. It produces different rows on drifting lines and is opt-in.
 *
 * @param tokens - Tokens of a single page
 * @param yTolerance - Maximum vertical gap to consider tokens on the same row
 * @param policy - Reference position rule (default: 'anchor')
 * @returns Rows in top-to-bottom discovery order, each sorted by x0
 */
export function groupTokensIntoRows(
  tokens: readonly Token[],
  yTolerance: number,
  policy: RowPolicy = 'anchor'
): Row[] {
  if (tokens.length === 0) return [];

  // Array.prototype.sort is stable, ties keep their input order
  const sorted = [...tokens].sort((a, b) => (a.top - b.top) || (a.x0 - b.x0));

  const rows: Row[] = [];
  let currentRow: Token[] = [];
  let anchorTop = sorted[0]?.top ?? 0;
  let topSum = 0;

  for (const token of sorted) {
    const reference = policy === 'centroid' && currentRow.length > 0
      ? topSum / currentRow.length
      : anchorTop;

    if (Math.abs(token.top - reference) <= yTolerance) {
      currentRow.push(token);
      topSum += token.top;
    } else {
      if (currentRow.length > 0) {
        rows.push(createRow(currentRow, anchorTop));
      }
      currentRow = [token];
      topSum = token.top;
      anchorTop = token.top;
    }
  }

  if (currentRow.length > 0) {
    rows.push(createRow(currentRow, anchorTop));
  }

  return rows;
}

function createRow(tokens: Token[], top: number): Row {
  return {
    top,
    tokens: [...tokens].sort((a, b) => a.x0 - b.x0),
  };
}

/**
 * Collect the x-origins of every token in the given rows, in row order.
 */
export function collectXOrigins(rows: readonly Row[]): number[] {
  const xs: number[] = [];
  for (const row of rows) {
    for (const token of row.tokens) {
      xs.push(token.x0);
    }
  }
  return xs;
}

/**
 * Drop rows without tokens.
 */
export function filterEmptyRows(rows: readonly Row[]): Row[] {
  return rows.filter(row => row.tokens.length > 0);
}
