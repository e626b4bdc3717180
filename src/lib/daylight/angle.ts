import { InvalidRangeError } from './errors';
import type { Angle, TimeOfDay } from './types';

export const TAU = 2 * Math.PI;

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value < max;
}

export function angleOf(t: TimeOfDay): Angle {
  if (!inRange(t.hour, 0, 24)) throw new InvalidRangeError('hour', t.hour, 'in [0, 24)');
  if (!inRange(t.minute, 0, 60)) throw new InvalidRangeError('minute', t.minute, 'in [0, 60)');
  return ((t.hour + t.minute / 60) / 24) * TAU;
}

/**
 * Clockwise distance from `from` to `to`, `(to - from) mod 2π`.
 * Always in [0, 2π); equal angles give 0.
 */
export function clockwiseWidth(from: Angle, to: Angle): number {
  if (!inRange(from, 0, TAU)) throw new InvalidRangeError('angle', from, 'in [0, 2π)');
  if (!inRange(to, 0, TAU)) throw new InvalidRangeError('angle', to, 'in [0, 2π)');
  const width = (((to - from) % TAU) + TAU) % TAU;
  return width === TAU ? 0 : width;
}
