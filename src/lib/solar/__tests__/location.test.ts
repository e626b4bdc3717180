import { describe, expect, it } from 'vitest';
import { InvalidLocationError, InvalidRangeError } from '../../daylight/errors';
import { calendarDateIn, formatCalendarDate, parseCalendarDate, parseLocation } from '../location';

describe('parseLocation', () => {
  it('accepts a well-formed location and trims the name', () => {
    expect(
      parseLocation({ name: '  Ann Arbor ', timezone: 'America/Detroit', latitude: 42.2253, longitude: -83.74567 }),
    ).toEqual({ name: 'Ann Arbor', timezone: 'America/Detroit', latitude: 42.2253, longitude: -83.74567 });
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => parseLocation({ name: 'Nowhere', timezone: 'UTC', latitude: 91, longitude: 0 })).toThrow(
      InvalidLocationError,
    );
    try {
      parseLocation({ name: 'Nowhere', timezone: 'UTC', latitude: 0, longitude: -181 });
    } catch (err) {
      if (!(err instanceof InvalidLocationError)) throw err;
      expect(err.code).toBe('INVALID_LOCATION');
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]).toMatch(/^longitude: /);
    }
  });

  it('rejects unknown timezones and blank names', () => {
    expect(() => parseLocation({ name: 'X', timezone: 'Mars/Olympus', latitude: 0, longitude: 0 })).toThrow(
      'timezone: unknown timezone "Mars/Olympus"',
    );
    expect(() => parseLocation({ name: '   ', timezone: 'UTC', latitude: 0, longitude: 0 })).toThrow(
      'name: name is required',
    );
  });

  it('rejects coordinates that did not parse as numbers', () => {
    expect(() => parseLocation({ name: 'X', timezone: 'UTC', latitude: Number(''), longitude: Number('abc') })).toThrow(
      InvalidLocationError,
    );
  });
});

describe('calendar dates', () => {
  it('parses and formats YYYY-MM-DD', () => {
    expect(parseCalendarDate('2025-03-09')).toEqual({ year: 2025, month: 3, day: 9 });
    expect(formatCalendarDate({ year: 2025, month: 3, day: 9 })).toBe('2025-03-09');
  });

  it('rejects malformed and impossible dates', () => {
    expect(() => parseCalendarDate('03/09/2025')).toThrow(InvalidRangeError);
    expect(() => parseCalendarDate('2025-02-29')).toThrow('date must be a valid calendar date, got 2025-02-29');
  });

  it('reads the local calendar date of an instant', () => {
    const instant = new Date(Date.UTC(2025, 0, 1, 3, 0));
    expect(calendarDateIn(instant, 'America/Los_Angeles')).toEqual({ year: 2024, month: 12, day: 31 });
    expect(calendarDateIn(instant, 'UTC')).toEqual({ year: 2025, month: 1, day: 1 });
  });
});
