import { TAU } from '../daylight/angle';
import type { Angle, ArcSegment } from '../daylight/types';

const round = (n: number) => Number(n.toFixed(3));

/** Wheel angle (0 = top, clockwise) to SVG degrees (0 = +x, clockwise because y points down). */
export function wheelToSvgDegrees(angle: Angle): number {
  return (angle * 180) / Math.PI - 90;
}

export function polarToCartesian(cx: number, cy: number, r: number, angleDeg: number) {
  const angleRad = (angleDeg * Math.PI) / 180;
  return {
    x: round(cx + r * Math.cos(angleRad)),
    y: round(cy + r * Math.sin(angleRad)),
  };
}

export function describeArc(cx: number, cy: number, r: number, startAngle: number, endAngle: number): string {
  const start = polarToCartesian(cx, cy, r, startAngle);
  const end = polarToCartesian(cx, cy, r, endAngle);

  let sweep = endAngle - startAngle;
  if (sweep < 0) sweep += 360;
  const largeArc = sweep > 180 ? 1 : 0;

  return `M ${cx} ${cy} L ${start.x} ${start.y} A ${r} ${r} 0 ${largeArc} 1 ${end.x} ${end.y} Z`;
}

export type SegmentShape = { kind: 'wedge'; d: string } | { kind: 'disc' } | { kind: 'empty' };

/** Wedge for a segment; a full turn can't be one SVG arc, so it becomes a disc. */
export function segmentShape(segment: ArcSegment, cx: number, cy: number, r: number): SegmentShape {
  if (segment.width <= 0) return { kind: 'empty' };
  if (segment.width >= TAU) return { kind: 'disc' };
  const startDeg = wheelToSvgDegrees(segment.start);
  const endDeg = startDeg + (segment.width * 180) / Math.PI;
  return { kind: 'wedge', d: describeArc(cx, cy, r, startDeg, endDeg) };
}
