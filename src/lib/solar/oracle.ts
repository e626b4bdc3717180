import SunCalc from 'suncalc';
import type { TimeOfDay } from '../daylight/types';
import type { CalendarDate, Location } from './location';

type Coordinates = Pick<Location, 'latitude' | 'longitude'>;

export interface SolarEvents {
  readonly depression: number;
  readonly noon: Date;
  readonly sunrise: Date | null;
  readonly sunset: Date | null;
  readonly dawn: Date | null;
  readonly dusk: Date | null;
}

export type SkyCondition = 'continuous_daylight' | 'continuous_night';

/** Altitude suncalc uses for sunrise/sunset (refraction plus solar radius). */
const HORIZON_ALTITUDE = -0.833;

// suncalc's built-in twilight times, keyed by depression
const BUILT_IN: Record<number, [dawn: string, dusk: string]> = {
  6: ['dawn', 'dusk'],
  12: ['nauticalDawn', 'nauticalDusk'],
  18: ['nightEnd', 'night'],
};

const registered = new Set<number>();

function timeNames(depression: number): [dawn: string, dusk: string] {
  const builtIn = BUILT_IN[depression];
  if (builtIn) return builtIn;
  const names: [string, string] = [`dawn_${depression}`, `dusk_${depression}`];
  if (!registered.has(depression)) {
    SunCalc.addTime(-depression, names[0], names[1]);
    registered.add(depression);
  }
  return names;
}

/**
 * Local mean solar noon of the calendar date, so suncalc picks the
 * transit that belongs to that day at this longitude.
 */
function anchor(date: CalendarDate, longitude: number): Date {
  const utcNoon = Date.UTC(date.year, date.month - 1, date.day, 12);
  return new Date(utcNoon - (longitude / 15) * 60 * 60 * 1000);
}

function valid(d: Date | undefined): Date | null {
  return d === undefined || Number.isNaN(d.getTime()) ? null : d;
}

/**
 * Sunrise, sunset and dawn/dusk at `depression` degrees below the horizon.
 * Events the sun never reaches on that date come back as `null`.
 */
export function solarEvents(date: CalendarDate, location: Coordinates, depression: number): SolarEvents {
  const [dawnName, duskName] = timeNames(depression);
  const times: Record<string, Date | undefined> = {
    ...SunCalc.getTimes(anchor(date, location.longitude), location.latitude, location.longitude),
  };
  return {
    depression,
    noon: times.solarNoon ?? anchor(date, location.longitude),
    sunrise: valid(times.sunrise),
    sunset: valid(times.sunset),
    dawn: valid(times[dawnName]),
    dusk: valid(times[duskName]),
  };
}

/** Whether a day without sunrise/sunset is polar day or polar night. */
export function skyCondition(date: CalendarDate, location: Coordinates): SkyCondition {
  const { noon } = solarEvents(date, location, 6);
  const { altitude } = SunCalc.getPosition(noon, location.latitude, location.longitude);
  return (altitude * 180) / Math.PI > HORIZON_ALTITUDE ? 'continuous_daylight' : 'continuous_night';
}

/** Wall-clock hour and minute of `instant` in an IANA timezone; seconds are dropped. */
export function toTimeOfDay(instant: Date, timezone: string): TimeOfDay {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? '0');
  return { hour: get('hour') % 24, minute: get('minute') };
}
