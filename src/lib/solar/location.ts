import { z } from 'zod';
import { InvalidLocationError, InvalidRangeError } from '../daylight/errors';

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

export const LocationSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  region: z.string().trim().optional(),
  timezone: z.string().refine(isTimeZone, (tz) => ({ message: `unknown timezone "${tz}"` })),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export type Location = z.infer<typeof LocationSchema>;

/** Validate user-entered location fields. */
export function parseLocation(input: unknown): Location {
  const result = LocationSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidLocationError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseCalendarDate(text: string): CalendarDate {
  const match = ISO_DATE.exec(text.trim());
  if (!match) throw new InvalidRangeError('date', text, 'formatted YYYY-MM-DD');
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidRangeError('date', text, 'a valid calendar date');
  }
  return { year, month, day };
}

const pad = (n: number) => n.toString().padStart(2, '0');

export function formatCalendarDate(date: CalendarDate): string {
  return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

/** The calendar date of `instant` on the wall clock of `timezone`. */
export function calendarDateIn(instant: Date, timezone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? '0');
  return { year: get('year'), month: get('month'), day: get('day') };
}
