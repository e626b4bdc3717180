import { TAU } from '../lib/daylight/angle';
import { BAND_LABELS } from '../lib/daylight/bands';
import type { ArcSegment, Band } from '../lib/daylight/types';
import { segmentShape, polarToCartesian, wheelToSvgDegrees } from '../lib/wheel/arcPath';
import { hourLabel } from '../lib/format';

const SVG_SIZE = 600;
const CENTER = SVG_SIZE / 2;
const WHEEL_RADIUS = 220;
const RING_RADIUS = WHEEL_RADIUS * 1.05;
const LABEL_RADIUS = WHEEL_RADIUS * 1.14;

export const BAND_STYLE: Record<Band, { fill: string; opacity: number }> = {
  night: { fill: 'darkblue', opacity: 0.8 },
  astronomical_twilight: { fill: 'midnightblue', opacity: 0.75 },
  nautical_twilight: { fill: 'midnightblue', opacity: 0.6 },
  civil_twilight: { fill: 'midnightblue', opacity: 0.45 },
  twilight: { fill: 'midnightblue', opacity: 0.6 },
  daylight: { fill: 'gold', opacity: 0.8 },
};

interface DaylightWheelProps {
  segments: readonly ArcSegment[];
  title?: string;
  footer?: string;
}

export default function DaylightWheel({ segments, title, footer }: DaylightWheelProps) {
  const hours = Array.from({ length: 24 }, (_, h) => h);

  return (
    <svg
      viewBox={`0 0 ${SVG_SIZE} ${SVG_SIZE}`}
      width="100%"
      style={{ maxWidth: SVG_SIZE, display: 'block', margin: '0 auto' }}
      role="img"
      aria-label={title ?? 'Daylight wheel'}
    >
      {title && (
        <text x={CENTER} y={24} textAnchor="middle" fontSize={18}>
          {title}
        </text>
      )}

      {segments.map((segment, i) => {
        const shape = segmentShape(segment, CENTER, CENTER, WHEEL_RADIUS);
        const { fill, opacity } = BAND_STYLE[segment.band];
        const label = `${BAND_LABELS[segment.band]}${segment.phase ? ` (${segment.phase})` : ''}`;
        if (shape.kind === 'empty') return null;
        if (shape.kind === 'disc') {
          return (
            <circle key={i} cx={CENTER} cy={CENTER} r={WHEEL_RADIUS} fill={fill} fillOpacity={opacity} data-band={segment.band}>
              <title>{label}</title>
            </circle>
          );
        }
        return (
          <path key={i} d={shape.d} fill={fill} fillOpacity={opacity} data-band={segment.band}>
            <title>{label}</title>
          </path>
        );
      })}

      {/* Hour ticks just outside the filled area */}
      {hours.map((h) => {
        const deg = wheelToSvgDegrees((h / 24) * TAU);
        const inner = polarToCartesian(CENTER, CENTER, WHEEL_RADIUS, deg);
        const outer = polarToCartesian(CENTER, CENTER, RING_RADIUS, deg);
        const text = polarToCartesian(CENTER, CENTER, LABEL_RADIUS, deg);
        return (
          <g key={h}>
            <line x1={inner.x} y1={inner.y} x2={outer.x} y2={outer.y} stroke="black" strokeWidth={0.8} />
            <text x={text.x} y={text.y} textAnchor="middle" dominantBaseline="middle" fontSize={11}>
              {hourLabel(h)}
            </text>
          </g>
        );
      })}

      <circle cx={CENTER} cy={CENTER} r={RING_RADIUS} fill="none" stroke="black" strokeWidth={1.2} />

      {footer && (
        <text x={CENTER} y={SVG_SIZE - 12} textAnchor="middle" fontSize={14} style={{ whiteSpace: 'pre' }}>
          {footer}
        </text>
      )}
    </svg>
  );
}
