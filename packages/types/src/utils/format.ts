import { MARKER_PAD_WIDTH } from './constants.js';

/**
 * Format an integer the way `%03d` does: zero-padded to `width` characters,
 * the width including a leading minus sign.
 *
 * @example formatPadded(7) === '007'; formatPadded(-5) === '-05'; formatPadded(1234) === '1234'
 */
export function formatPadded(value: number, width: number = MARKER_PAD_WIDTH): string {
  const n = Math.trunc(value);
  if (n < 0) {
    return '-' + String(-n).padStart(Math.max(width - 1, 0), '0');
  }
  return String(n).padStart(width, '0');
}

/**
 * Truncate a coordinate toward zero, as the stream reports positions.
 */
export function truncateCoordinate(value: number): number {
  // Avoid -0 leaking into comparisons
  return Math.trunc(value) + 0;
}
