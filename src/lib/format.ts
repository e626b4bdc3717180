import type { TimeOfDay } from './daylight/types';
import type { CalendarDate } from './solar/location';

const pad = (n: number) => n.toString().padStart(2, '0');

export function formatClock(t: TimeOfDay | null): string {
  if (t === null) return '--:--';
  return `${pad(t.hour)}:${pad(Math.floor(t.minute))}`;
}

/** Elapsed time as H:MM:SS, fractions of a second dropped. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hrs = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${hrs}:${pad(mins)}:${pad(secs)}`;
}

/** MM/DD/YYYY */
export function formatUsDate(date: CalendarDate): string {
  return `${pad(date.month)}/${pad(date.day)}/${date.year}`;
}

const TITLE_NAME_LIMIT = 15;

export function formatTitle(date: CalendarDate, name: string, latitude: number, longitude: number): string {
  const shortName = name.length > TITLE_NAME_LIMIT ? `${name.slice(0, TITLE_NAME_LIMIT)}...` : name;
  return `${formatUsDate(date)}: ${shortName} (${latitude.toFixed(3)}°, ${longitude.toFixed(3)}°)`;
}

export function hourLabel(hour: number): string {
  return `${hour}:00`;
}
