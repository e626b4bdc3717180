import { describe, expect, it } from 'vitest';
import { formatClock, formatDuration, formatTitle, formatUsDate, hourLabel } from '../format';

describe('formatClock', () => {
  it('pads hours and minutes', () => {
    expect(formatClock({ hour: 6, minute: 5 })).toBe('06:05');
    expect(formatClock({ hour: 21, minute: 14 })).toBe('21:14');
  });

  it('shows dashes for a missing time', () => {
    expect(formatClock(null)).toBe('--:--');
  });
});

describe('formatDuration', () => {
  it('prints hours, minutes and seconds', () => {
    expect(formatDuration((14 * 3600 + 30 * 60 + 15) * 1000 + 999)).toBe('14:30:15');
    expect(formatDuration(24 * 3600 * 1000)).toBe('24:00:00');
    expect(formatDuration(0)).toBe('0:00:00');
  });
});

describe('formatTitle', () => {
  it('puts the date first and rounds coordinates to three places', () => {
    expect(formatTitle({ year: 2025, month: 6, day: 21 }, 'Ann Arbor', 42.2253, -83.74567)).toBe(
      '06/21/2025: Ann Arbor (42.225°, -83.746°)',
    );
  });

  it('cuts long names at fifteen characters', () => {
    expect(formatTitle({ year: 2025, month: 1, day: 2 }, 'Llanfairpwllgwyngyll', 53.2207, -4.2042)).toBe(
      '01/02/2025: Llanfairpwllgwy... (53.221°, -4.204°)',
    );
  });
});

describe('formatUsDate / hourLabel', () => {
  it('formats as MM/DD/YYYY and H:00', () => {
    expect(formatUsDate({ year: 2024, month: 12, day: 31 })).toBe('12/31/2024');
    expect(hourLabel(0)).toBe('0:00');
    expect(hourLabel(23)).toBe('23:00');
  });
});
