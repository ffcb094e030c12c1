/**
 * Layout utilities for token streams.
 * Provides row grouping, baseline discovery and column assignment.
 */

export {
  groupTokensIntoRows,
  collectXOrigins,
  filterEmptyRows,
} from './rows.js';

export { clusterCoordinates } from './baselines.js';

export {
  getColumnIndex,
  mapRowToColumns,
} from './columns.js';
