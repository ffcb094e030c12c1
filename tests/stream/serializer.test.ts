import { describe, it, expect } from 'vitest';
import {
  RunCounters,
  formatFragment,
  formatPageHeader,
  formatRowPrefix,
  renderPage,
  serializePage,
  serializeRow,
} from '@colstream/stream';
import { StreamerOptionsSchema, type Row, type Token } from '@colstream/types';

const options = StreamerOptionsSchema.parse({ xTolerance: 20, yTolerance: 5 });

describe('markers', () => {
  it('should format the page header', () => {
    expect(formatPageHeader(3, 4)).toBe('=== PAGE 3 [Detected 4 Columns] ===');
  });

  it('should format the row prefix with padded id and x', () => {
    expect(formatRowPrefix(7, 45)).toBe('[r_007]<x:045> ');
    expect(formatRowPrefix(1000, -5)).toBe('[r_1000]<x:-05> ');
  });

  it('should format a token fragment followed by a space', () => {
    expect(formatFragment(2, 200, '<v_001:1234>')).toBe('<col:2, x:200> <v_001:1234> ');
  });
});

describe('serializeRow', () => {
  it('should emit the row marker and one fragment per token', () => {
    const row: Row = {
      top: 100,
      tokens: [
        { text: 'Revenue', x0: 10.7, top: 100 },
        { text: '1,234', x0: 200.2, top: 100 },
      ],
    };
    const counters = new RunCounters();

    const serialized = serializeRow(row, [10, 200], 1, options, counters);

    expect(serialized.rowId).toBe(1);
    expect(serialized.line).toBe('[r_001]<x:010> <col:1, x:010> Revenue <col:2, x:200> <v_001:1234> ');
    expect(serialized.values).toEqual([
      { id: 1, page: 1, rowId: 1, column: 2, x: 200, value: '1234', raw: '1234' },
    ]);
  });

  it('should continue from the counters it is given', () => {
    const counters = new RunCounters();
    counters.nextRowId();
    counters.nextRowId();
    counters.nextValueId();

    const row: Row = { top: 5, tokens: [{ text: '△50', x0: 300, top: 5 }] };
    const serialized = serializeRow(row, [10, 300], 2, options, counters);

    expect(serialized.line).toBe('[r_003]<x:300> <col:2, x:300> <v_002:-50> ');
  });

  it('should reject an empty row', () => {
    expect(() => serializeRow({ top: 0, tokens: [] }, [], 1, options, new RunCounters()))
      .toThrow('Cannot serialize an empty row on page 1');
  });
});

describe('serializePage', () => {
  it('should return null for a page without tokens and leave the counters untouched', () => {
    const counters = new RunCounters();

    expect(serializePage([], 1, options, counters)).toBeNull();
    expect(counters.rowCounter).toBe(0);
  });

  it('should group rows, detect baselines and render lines', () => {
    const tokens: Token[] = [
      { text: '1,234', x0: 200, top: 100 },
      { text: 'Revenue', x0: 10, top: 100 },
      { text: '(567)', x0: 10, top: 120 },
    ];

    const page = serializePage(tokens, 1, options, new RunCounters());

    expect(page?.baselines).toEqual([10, 200]);
    expect(page?.lines).toEqual([
      '[r_001]<x:010> <col:1, x:010> Revenue <col:2, x:200> <v_001:1234> ',
      '[r_002]<x:010> <col:1, x:010> <v_002:-567> ',
    ]);
    expect(page?.values.map(v => v.id)).toEqual([1, 2]);
  });

  it('should render the header above the lines', () => {
    const rendered = renderPage({
      pageNumber: 2,
      lines: ['[r_001]<x:010> <col:1, x:010> A '],
      baselines: [10],
      values: [],
    });

    expect(rendered).toBe('=== PAGE 2 [Detected 1 Columns] ===\n[r_001]<x:010> <col:1, x:010> A ');
  });
});
