/**
 * Column baseline discovery by greedy 1-D clustering of x-origins.
 */
import type { ClusterPolicy } from '@colstream/types';

/**
 * Cluster x-coordinates into ascending column baselines.
 *
 * With the `anchor` policy each coordinate is compared against the last
 * accepted baseline: a coordinate more than `xTolerance` to its right opens a
 * new column, anything else is absorbed and discarded, so only the seed value
 * of each cluster survives.
 *
 * With the `centroid` policy a coordinate is compared against the running
 * mean of the current cluster, and the mean is reported as the baseline.
 *
 * @param coords - x-origins of all tokens on a page (not mutated)
 * @param xTolerance - Maximum gap still treated as the same column
 * @param policy - Comparison rule (default: 'anchor')
 * @returns Strictly ascending baselines, empty for empty input
 */
export function clusterCoordinates(
  coords: readonly number[],
  xTolerance: number,
  policy: ClusterPolicy = 'anchor'
): number[] {
  if (coords.length === 0) return [];

  const sorted = [...coords].sort((a, b) => a - b);
  return policy === 'centroid'
    ? clusterByCentroid(sorted, xTolerance)
    : clusterByAnchor(sorted, xTolerance);
}

function clusterByAnchor(sorted: number[], xTolerance: number): number[] {
  const baselines: number[] = [];
  let last: number | undefined;

  for (const c of sorted) {
    if (last === undefined || c > last + xTolerance) {
      baselines.push(c);
      last = c;
    }
  }

  return baselines;
}

function clusterByCentroid(sorted: number[], xTolerance: number): number[] {
  const baselines: number[] = [];
  let sum = 0;
  let count = 0;

  for (const c of sorted) {
    if (count > 0 && c > sum / count + xTolerance) {
      baselines.push(sum / count);
      sum = 0;
      count = 0;
    }
    sum += c;
    count++;
  }
  baselines.push(sum / count);

  return baselines;
}
