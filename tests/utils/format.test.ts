import { describe, it, expect } from 'vitest';
import { formatPadded, truncateCoordinate } from '@colstream/types';

describe('formatPadded', () => {
  it('should zero-pad to three digits', () => {
    expect(formatPadded(0)).toBe('000');
    expect(formatPadded(7)).toBe('007');
    expect(formatPadded(45)).toBe('045');
  });

  it('should not truncate wider numbers', () => {
    expect(formatPadded(1234)).toBe('1234');
  });

  it('should count the minus sign in the width', () => {
    expect(formatPadded(-5)).toBe('-05');
    expect(formatPadded(-123)).toBe('-123');
  });

  it('should truncate fractions toward zero', () => {
    expect(formatPadded(12.9)).toBe('012');
    expect(formatPadded(-0.5)).toBe('000');
  });

  it('should honour a custom width', () => {
    expect(formatPadded(7, 5)).toBe('00007');
  });
});

describe('truncateCoordinate', () => {
  it('should truncate toward zero', () => {
    expect(truncateCoordinate(199.99)).toBe(199);
    expect(truncateCoordinate(-3.7)).toBe(-3);
  });

  it('should not return negative zero', () => {
    expect(Object.is(truncateCoordinate(-0.2), 0)).toBe(true);
  });
});
