/**
 * Column index assignment against discovered baselines.
 */
import type { ColumnPolicy, Row } from '@colstream/types';

/**
 * Map an x-origin to its 1-based column index.
 *
 * `first-match` scans the baselines in ascending order and returns the first
 * one within `xTolerance` of `x0`, falling back to column 1 when none
 * qualifies. This is not a closest-baseline search: with overlapping
 * tolerance windows the leftmost qualifying column wins.
 *
 * `nearest` returns the baseline with the smallest distance to `x0`
 * regardless of tolerance, ties going to the lower index.
 *
 * @returns Index in `[1, baselines.length]`, or 1 when there are no baselines
 */
export function getColumnIndex(
  x0: number,
  baselines: readonly number[],
  xTolerance: number,
  policy: ColumnPolicy = 'first-match'
): number {
  if (policy === 'nearest') {
    return nearestColumn(x0, baselines);
  }

  for (let i = 0; i < baselines.length; i++) {
    const baseline = baselines[i];
    if (baseline !== undefined && Math.abs(x0 - baseline) <= xTolerance) {
      return i + 1;
    }
  }
  return 1;
}

function nearestColumn(x0: number, baselines: readonly number[]): number {
  let best = 1;
  let bestDistance = Infinity;

  for (let i = 0; i < baselines.length; i++) {
    const baseline = baselines[i];
    if (baseline === undefined) continue;

    const distance = Math.abs(x0 - baseline);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = i + 1;
    }
  }

  return best;
}

/**
 * Column index of every token in a row, in the row's token order.
 */
export function mapRowToColumns(
  row: Row,
  baselines: readonly number[],
  xTolerance: number,
  policy: ColumnPolicy = 'first-match'
): number[] {
  return row.tokens.map(token => getColumnIndex(token.x0, baselines, xTolerance, policy));
}
