import { describe, expect, it } from 'vitest';
import { InvalidRangeError } from '../daylight/errors';
import { dstBounds, dstInEffect } from '../dst';

describe('dstBounds', () => {
  it('finds the 2025 switch days', () => {
    expect(dstBounds(2025)).toEqual({
      start: { year: 2025, month: 3, day: 9 },
      end: { year: 2025, month: 11, day: 2 },
    });
  });

  it('handles a month that starts on Sunday', () => {
    // 1 March 2026 and 1 November 2026 are Sundays
    expect(dstBounds(2026)).toEqual({
      start: { year: 2026, month: 3, day: 8 },
      end: { year: 2026, month: 11, day: 1 },
    });
  });

  it('keeps two-digit years in the first century', () => {
    expect(dstBounds(50)).toEqual({
      start: { year: 50, month: 3, day: 13 },
      end: { year: 50, month: 11, day: 6 },
    });
  });
});

describe('dstInEffect', () => {
  it('is on in July and off in January', () => {
    expect(dstInEffect(2025, 7, 1)).toBe(true);
    expect(dstInEffect(2025, 1, 1)).toBe(false);
  });

  it('starts on the second Sunday of March', () => {
    expect(dstInEffect(2025, 3, 8)).toBe(false);
    expect(dstInEffect(2025, 3, 9)).toBe(true);
  });

  it('is already over on the first Sunday of November', () => {
    expect(dstInEffect(2025, 11, 1)).toBe(true);
    expect(dstInEffect(2025, 11, 2)).toBe(false);
  });

  it('accepts years before 100', () => {
    expect(dstInEffect(99, 3, 7)).toBe(false);
    expect(dstInEffect(99, 3, 8)).toBe(true);
    expect(dstInEffect(99, 7, 1)).toBe(true);
  });

  it('is off for late December', () => {
    expect(dstInEffect(2024, 12, 31)).toBe(false);
  });

  it('rejects impossible dates', () => {
    expect(() => dstInEffect(2025, 2, 30)).toThrow(InvalidRangeError);
    expect(() => dstInEffect(2025, 13, 1)).toThrow('date must be a valid calendar date, got 2025-13-1');
  });
});
