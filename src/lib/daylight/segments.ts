import { angleOf, clockwiseWidth, TAU } from './angle';
import { singleBand } from './bands';
import { InvalidRangeError, MissingEventError, NestingOrderError } from './errors';
import type { Angle, ArcSegment, Band, EventTimes, Phase, TwilightBand } from './types';

export const TILING_TOLERANCE = 1e-9;

interface Boundary {
  readonly label: string;
  readonly angle: Angle;
}

interface Ring {
  readonly band: Band;
  readonly dawn: Boundary;
  readonly dusk: Boundary;
}

function boundary(events: EventTimes, label: string, band: Band): Boundary {
  const time = Object.prototype.hasOwnProperty.call(events, label) ? events[label] : undefined;
  if (time === undefined) throw new MissingEventError(label, band);
  return { label, angle: angleOf(time) };
}

function arc(from: Boundary, to: Boundary, band: Band, phase: Phase | null): ArcSegment {
  return {
    start: from.angle,
    width: clockwiseWidth(from.angle, to.angle),
    band,
    phase,
    from: from.label,
    to: to.label,
  };
}

/** Innermost (shallowest) band first. */
function orderBands(bands: readonly TwilightBand[]): TwilightBand[] {
  for (const b of bands) {
    if (!(b.depression > 0 && b.depression < 90)) {
      throw new InvalidRangeError(`${b.band} depression`, b.depression, 'in (0°, 90°)');
    }
  }
  const ordered = [...bands].sort((a, b) => a.depression - b.depression);
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].depression === ordered[i - 1].depression) {
      throw new InvalidRangeError(`${ordered[i].band} depression`, ordered[i].depression, 'unique across bands');
    }
  }
  return ordered;
}

export function totalWidth(segments: readonly ArcSegment[]): number {
  return segments.reduce((sum, s) => sum + s.width, 0);
}

/**
 * Every ring must enclose exactly the arcs inside it: the clockwise span
 * from its dawn to its dusk equals daylight plus the inner twilight arcs.
 */
function findOverlap(rings: readonly Ring[], daylight: ArcSegment, morning: readonly ArcSegment[], evening: readonly ArcSegment[]): Band {
  let covered = daylight.width;
  for (let i = 0; i < rings.length; i++) {
    covered += morning[morning.length - 1 - i].width + evening[i].width;
    const span = clockwiseWidth(rings[i].dawn.angle, rings[i].dusk.angle);
    if (Math.abs(covered - span) > TILING_TOLERANCE) return rings[i].band;
  }
  return 'night';
}

/**
 * Split the 24-hour circle into night, twilight and daylight arcs.
 *
 * Output runs clockwise from the darkest region: night (from the outermost
 * dusk), the morning twilight arcs from outermost to innermost, daylight,
 * then the evening arcs from innermost to outermost.
 *
 * @param events - label → time; needs `sunrise`, `sunset` and each band's dawn/dusk
 * @param bands - twilight rings, any order; sorted by depression before use
 * @param closing - band of the arc from the outermost dusk back to its dawn;
 *   a twilight band when the sun never sinks below the next depression
 * @throws MissingEventError when a required label is absent
 * @throws NestingOrderError when the rings overlap instead of nesting
 */
export function buildSegments(
  events: EventTimes,
  bands: readonly TwilightBand[] = [singleBand(6)],
  closing: Band = 'night',
): ArcSegment[] {
  const ordered = orderBands(bands);
  const sunrise = boundary(events, 'sunrise', 'daylight');
  const sunset = boundary(events, 'sunset', 'daylight');
  const rings: Ring[] = ordered.map((b) => ({
    band: b.band,
    dawn: boundary(events, b.dawn, b.band),
    dusk: boundary(events, b.dusk, b.band),
  }));

  const morning: ArcSegment[] = [];
  const evening: ArcSegment[] = [];
  let inner: { dawn: Boundary; dusk: Boundary } = { dawn: sunrise, dusk: sunset };
  for (const ring of rings) {
    morning.unshift(arc(ring.dawn, inner.dawn, ring.band, 'morning'));
    evening.push(arc(inner.dusk, ring.dusk, ring.band, 'evening'));
    inner = ring;
  }

  const daylight = arc(sunrise, sunset, 'daylight', null);
  const night = arc(inner.dusk, inner.dawn, closing, null);
  const segments = [night, ...morning, daylight, ...evening];

  const total = totalWidth(segments);
  if (Math.abs(total - TAU) <= TILING_TOLERANCE) return segments;

  // every boundary on the same instant: the closing arc covers the circle
  if (total <= TILING_TOLERANCE) return [{ ...night, width: TAU }, ...segments.slice(1)];

  throw new NestingOrderError(findOverlap(rings, daylight, morning, evening), total);
}
