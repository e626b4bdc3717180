import { TAU } from '../daylight/angle';
import { singleBand, STANDARD_BANDS } from '../daylight/bands';
import { MissingEventError } from '../daylight/errors';
import { buildSegments } from '../daylight/segments';
import type { ArcSegment, Band, EventTimes, TimeOfDay, TwilightBand } from '../daylight/types';
import { formatClock, formatDuration, formatTitle } from '../format';
import { createLogger } from '../log';
import type { CalendarDate, Location } from '../solar/location';
import { skyCondition, solarEvents, toTimeOfDay, type SkyCondition } from '../solar/oracle';

const log = createLogger('daylight-wheel');

export type TwilightMode = { kind: 'single'; depression: number } | { kind: 'nested' };

export function bandsForMode(mode: TwilightMode): readonly TwilightBand[] {
  return mode.kind === 'nested' ? STANDARD_BANDS : [singleBand(mode.depression)];
}

export interface WheelRequest {
  date: CalendarDate;
  location: Location;
  bands: readonly TwilightBand[];
}

export interface DaySummary {
  title: string;
  sunrise: string;
  sunset: string;
  dayLength: string;
  footer: string;
}

export interface DaylightWheel {
  segments: ArcSegment[];
  events: EventTimes;
  condition: 'normal' | SkyCondition;
  /** Bands dropped because the sun never got that far below the horizon. */
  skippedBands: TwilightBand[];
  summary: DaySummary;
}

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0 };
const NOON: TimeOfDay = { hour: 12, minute: 0 };
const FULL_DAY_MS = 24 * 60 * 60 * 1000;

export function describeDay(
  request: Pick<WheelRequest, 'date' | 'location'>,
  sunrise: Date | null,
  sunset: Date | null,
  condition: DaylightWheel['condition'],
): DaySummary {
  const { date, location } = request;
  const rise = sunrise ? formatClock(toTimeOfDay(sunrise, location.timezone)) : formatClock(null);
  const set = sunset ? formatClock(toTimeOfDay(sunset, location.timezone)) : formatClock(null);

  let lengthMs = 0;
  if (sunrise && sunset) lengthMs = sunset.getTime() - sunrise.getTime();
  else if (condition === 'continuous_daylight') lengthMs = FULL_DAY_MS;
  const dayLength = formatDuration(lengthMs);

  return {
    title: formatTitle(date, location.name, location.latitude, location.longitude),
    sunrise: rise,
    sunset: set,
    dayLength,
    footer: `Sunrise: ${rise}    Sunset: ${set}    Day Length: ${dayLength}`,
  };
}

function polarWheel(condition: SkyCondition): ArcSegment[] {
  return [
    {
      start: 0,
      width: TAU,
      band: condition === 'continuous_daylight' ? 'daylight' : 'night',
      phase: null,
      from: 'midnight',
      to: 'midnight',
    },
  ];
}

/** The sun stays above the shallowest dropped depression all night. */
function closingBand(skipped: readonly TwilightBand[]): Band {
  if (skipped.length === 0) return 'night';
  return skipped.reduce((shallowest, b) => (b.depression < shallowest.depression ? b : shallowest)).band;
}

/**
 * Query the oracle for every band, convert to wall-clock times in the
 * location's timezone and lay out the wheel.
 *
 * No sunrise or sunset gives a one-segment polar wheel. A twilight band
 * whose dawn or dusk never happens is dropped and the rest are rebuilt;
 * the arc past the outermost remaining dusk then carries the shallowest
 * dropped band instead of night.
 */
export function planDaylightWheel(request: WheelRequest): DaylightWheel {
  const { date, location } = request;
  const tz = location.timezone;

  const events: Record<string, TimeOfDay> = { midnight: MIDNIGHT, noon: NOON };
  const answers = (request.bands.length > 0 ? request.bands : [singleBand(6)]).map((band) => ({
    band,
    answer: solarEvents(date, location, band.depression),
  }));
  const { sunrise, sunset } = answers[0].answer;
  if (sunrise) events.sunrise = toTimeOfDay(sunrise, tz);
  if (sunset) events.sunset = toTimeOfDay(sunset, tz);
  if (request.bands.length > 0) {
    for (const { band, answer } of answers) {
      if (answer.dawn) events[band.dawn] = toTimeOfDay(answer.dawn, tz);
      if (answer.dusk) events[band.dusk] = toTimeOfDay(answer.dusk, tz);
    }
  }

  let active = [...request.bands];
  const skippedBands: TwilightBand[] = [];
  for (;;) {
    try {
      const segments = buildSegments(events, active, closingBand(skippedBands));
      return {
        segments,
        events,
        condition: 'normal',
        skippedBands,
        summary: describeDay(request, sunrise, sunset, 'normal'),
      };
    } catch (err) {
      if (!(err instanceof MissingEventError)) throw err;

      if (err.band === 'daylight') {
        const condition = skyCondition(date, location);
        log.info(`no ${err.label}: ${condition.replace('_', ' ')}`, { date, location: location.name });
        return {
          segments: polarWheel(condition),
          events,
          condition,
          skippedBands,
          summary: describeDay(request, null, null, condition),
        };
      }

      const { label } = err;
      const missing = active.find((b) => b.dawn === label || b.dusk === label);
      if (!missing) throw err;
      log.warn(`skipping ${missing.band}: sun never reaches ${missing.depression}° below the horizon`, {
        label,
        date,
      });
      skippedBands.push(missing);
      active = active.filter((b) => b !== missing);
    }
  }
}
