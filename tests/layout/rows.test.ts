/**
 * Tests for row grouping.
 */
import { describe, it, expect } from 'vitest';
import { groupTokensIntoRows, collectXOrigins, filterEmptyRows } from '@colstream/pdf-extract';
import type { Token } from '@colstream/types';

const texts = (tokens: Token[]): string[] => tokens.map(t => t.text);

describe('groupTokensIntoRows', () => {
  it('should group tokens with similar top offsets into rows', () => {
    const tokens: Token[] = [
      { text: 'Revenue', x0: 10, top: 100 },
      { text: '1,234', x0: 200, top: 101 },
      { text: 'Costs', x0: 10, top: 120 },
      { text: '(567)', x0: 200, top: 119 },
    ];

    const rows = groupTokensIntoRows(tokens, 3);

    expect(rows).toHaveLength(2);
    expect(texts(rows[0]?.tokens ?? [])).toEqual(['Revenue', '1,234']);
    expect(texts(rows[1]?.tokens ?? [])).toEqual(['Costs', '(567)']);
  });

  it('should return rows in top-to-bottom order regardless of input order', () => {
    const tokens: Token[] = [
      { text: 'bottom', x0: 10, top: 300 },
      { text: 'top', x0: 10, top: 50 },
      { text: 'middle', x0: 10, top: 150 },
    ];

    const rows = groupTokensIntoRows(tokens, 3);

    expect(rows.map(r => r.tokens[0]?.text)).toEqual(['top', 'middle', 'bottom']);
    expect(rows.map(r => r.top)).toEqual([50, 150, 300]);
  });

  it('should sort tokens within a row by x0, including the last row', () => {
    const tokens: Token[] = [
      { text: 'A', x0: 50, top: 100 },
      { text: 'B', x0: 10, top: 101 },
    ];

    const rows = groupTokensIntoRows(tokens, 3);

    expect(rows).toHaveLength(1);
    expect(texts(rows[0]?.tokens ?? [])).toEqual(['B', 'A']);
  });

  it('should keep input order for tokens with identical coordinates', () => {
    const tokens: Token[] = [
      { text: 'first', x0: 10, top: 100 },
      { text: 'second', x0: 10, top: 100 },
    ];

    const rows = groupTokensIntoRows(tokens, 0);

    expect(texts(rows[0]?.tokens ?? [])).toEqual(['first', 'second']);
  });

  it('should measure tolerance against the row anchor, not a running average', () => {
    const tokens: Token[] = [
      { text: 'a', x0: 10, top: 100 },
      { text: 'b', x0: 20, top: 102 },
      { text: 'c', x0: 30, top: 104 },
    ];

    const rows = groupTokensIntoRows(tokens, 3);

    expect(rows).toHaveLength(2);
    expect(texts(rows[0]?.tokens ?? [])).toEqual(['a', 'b']);
    expect(texts(rows[1]?.tokens ?? [])).toEqual(['c']);
    expect(rows[1]?.top).toBe(104);
  });

  it('should compare against the running mean under the centroid policy', () => {
    const tokens: Token[] = [
      { text: 'a', x0: 10, top: 100 },
      { text: 'b', x0: 20, top: 102 },
      { text: 'c', x0: 30, top: 104 },
    ];

    const rows = groupTokensIntoRows(tokens, 3, 'centroid');

    expect(rows).toHaveLength(1);
    expect(texts(rows[0]?.tokens ?? [])).toEqual(['a', 'b', 'c']);
  });

  it('should split every distinct top into its own row at tolerance 0', () => {
    const tokens: Token[] = [
      { text: 'a', x0: 10, top: 100 },
      { text: 'b', x0: 10, top: 100.5 },
      { text: 'c', x0: 10, top: 100 },
    ];

    const rows = groupTokensIntoRows(tokens, 0);

    expect(rows).toHaveLength(2);
    expect(texts(rows[0]?.tokens ?? [])).toEqual(['a', 'c']);
  });

  it('should preserve every input token exactly once', () => {
    const tokens: Token[] = [
      { text: 't1', x0: 300, top: 12 },
      { text: 't2', x0: 10, top: 40 },
      { text: 't3', x0: 150, top: 13 },
      { text: 't4', x0: 75, top: 41.5 },
      { text: 't5', x0: 10, top: 90 },
      { text: 't6', x0: 220, top: 11 },
    ];

    const rows = groupTokensIntoRows(tokens, 2);
    const flattened = rows.flatMap(r => texts(r.tokens)).sort();

    expect(flattened).toEqual(['t1', 't2', 't3', 't4', 't5', 't6']);
    for (const row of rows) {
      const xs = row.tokens.map(t => t.x0);
      expect(xs).toEqual([...xs].sort((a, b) => a - b));
    }
  });

  it('should not mutate the input array', () => {
    const tokens: Token[] = [
      { text: 'b', x0: 10, top: 200 },
      { text: 'a', x0: 10, top: 100 },
    ];

    groupTokensIntoRows(tokens, 3);

    expect(texts(tokens)).toEqual(['b', 'a']);
  });

  it('should return empty array for empty input', () => {
    expect(groupTokensIntoRows([], 3)).toHaveLength(0);
  });
});

describe('collectXOrigins', () => {
  it('should collect x0 of every token in row order', () => {
    const rows = [
      { top: 100, tokens: [{ text: 'a', x0: 10, top: 100 }, { text: 'b', x0: 200, top: 100 }] },
      { top: 120, tokens: [{ text: 'c', x0: 12, top: 120 }] },
    ];

    expect(collectXOrigins(rows)).toEqual([10, 200, 12]);
  });
});

describe('filterEmptyRows', () => {
  it('should drop rows without tokens', () => {
    const rows = [
      { top: 100, tokens: [] },
      { top: 120, tokens: [{ text: 'c', x0: 12, top: 120 }] },
    ];

    const filtered = filterEmptyRows(rows);

    expect(filtered).toHaveLength(1);
    expect(filtered[0]?.top).toBe(120);
  });
});
