/** Wall-clock time, hour in [0, 24) and minute in [0, 60). */
export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

/** Position on the 24-hour face in radians: 0 = midnight (top), π = noon, clockwise. */
export type Angle = number;

export type Band =
  | 'night'
  | 'astronomical_twilight'
  | 'nautical_twilight'
  | 'civil_twilight'
  | 'twilight'
  | 'daylight';

export type Phase = 'morning' | 'evening';

/** Event label → wall-clock time for one rendering pass. */
export type EventTimes = Readonly<Record<string, TimeOfDay>>;

/**
 * One twilight ring around the daylight arc. `dawn` and `dusk` are the
 * event labels looked up in {@link EventTimes}.
 */
export interface TwilightBand {
  readonly depression: number;
  readonly band: Band;
  readonly dawn: string;
  readonly dusk: string;
}

export interface ArcSegment {
  readonly start: Angle;
  /** Clockwise extent in radians, 0 to 2π. */
  readonly width: number;
  readonly band: Band;
  readonly phase: Phase | null;
  readonly from: string;
  readonly to: string;
}
