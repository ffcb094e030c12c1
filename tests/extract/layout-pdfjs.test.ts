/**
 * Tests for the pdfjs item to token conversion.
 */
import { describe, it, expect } from 'vitest';
import { textItemToTokens, isTextItem } from '@colstream/pdf-extract';

describe('textItemToTokens', () => {
  it('should convert PDF coordinates into a top offset', () => {
    const tokens = textItemToTokens(
      { str: 'Revenue', transform: [10, 0, 0, 10, 50, 700], width: 70, height: 10 },
      800
    );

    expect(tokens).toEqual([{ text: 'Revenue', x0: 50, top: 90 }]);
  });

  it('should split runs into words placed proportionally', () => {
    const tokens = textItemToTokens(
      { str: 'Net sales', transform: [10, 0, 0, 10, 50, 700], width: 90, height: 10 },
      800
    );

    expect(tokens).toEqual([
      { text: 'Net', x0: 50, top: 90 },
      { text: 'sales', x0: 90, top: 90 },
    ]);
  });

  it('should handle repeated spaces between words', () => {
    const tokens = textItemToTokens(
      { str: 'a  b', transform: [10, 0, 0, 10, 0, 100], width: 40, height: 10 },
      200
    );

    expect(tokens.map(t => t.x0)).toEqual([0, 30]);
  });

  it('should approximate missing width and height from the transform', () => {
    const tokens = textItemToTokens({ str: 'abc', transform: [10, 0, 0, 10, 5, 100] }, 200);

    expect(tokens).toEqual([{ text: 'abc', x0: 5, top: 90 }]);
  });

  it('should drop blank items', () => {
    expect(textItemToTokens({ str: '   ', transform: [1, 0, 0, 1, 0, 0] }, 100)).toEqual([]);
  });
});

describe('isTextItem', () => {
  it('should accept items with str and transform', () => {
    expect(isTextItem({ str: 'x', transform: [1, 0, 0, 1, 0, 0] })).toBe(true);
  });

  it('should reject marked content and non-objects', () => {
    expect(isTextItem({ type: 'beginMarkedContent' })).toBe(false);
    expect(isTextItem({ str: 'x' })).toBe(false);
    expect(isTextItem(null)).toBe(false);
    expect(isTextItem('x')).toBe(false);
  });
});
