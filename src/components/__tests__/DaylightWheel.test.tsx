import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import { TAU } from '../../lib/daylight/angle';
import { buildSegments } from '../../lib/daylight/segments';
import DaylightWheel from '../DaylightWheel';

const countBands = (markup: string) => (markup.match(/data-band="/g) ?? []).length;

describe('DaylightWheel', () => {
  it('draws one wedge per segment', () => {
    const segments = buildSegments({
      first_light: { hour: 5, minute: 30 },
      sunrise: { hour: 6, minute: 0 },
      sunset: { hour: 20, minute: 0 },
      last_light: { hour: 20, minute: 30 },
    });
    const markup = renderToStaticMarkup(<DaylightWheel segments={segments} />);

    expect(countBands(markup)).toBe(4);
    expect(markup).toContain('<path d="M 300 300 L 520 300 A 220 220 0 1 1 109.474 190 Z" fill="gold"');
    expect(markup).toContain('<title>Civil twilight (morning)</title>');
    expect(markup).toContain('<title>Daylight</title>');
  });

  it('labels all 24 hours', () => {
    const markup = renderToStaticMarkup(<DaylightWheel segments={[]} />);

    expect(markup).toContain('>0:00</text>');
    expect(markup).toContain('>12:00</text>');
    expect(markup).toContain('>23:00</text>');
    expect((markup.match(/<line /g) ?? []).length).toBe(24);
  });

  it('skips empty arcs and draws a full night as a disc', () => {
    const segments = buildSegments({ sunrise: { hour: 0, minute: 0 }, sunset: { hour: 0, minute: 0 } }, []);
    expect(segments[0].width).toBe(TAU);

    const markup = renderToStaticMarkup(<DaylightWheel segments={segments} />);

    expect(countBands(markup)).toBe(1);
    expect(markup).toContain('<circle cx="300" cy="300" r="220" fill="darkblue" fill-opacity="0.8" data-band="night">');
  });

  it('prints the title and footer', () => {
    const markup = renderToStaticMarkup(
      <DaylightWheel segments={[]} title="06/21/2025: Ann Arbor (42.225°, -83.746°)" footer="Sunrise: 05:59" />,
    );

    expect(markup).toContain('>06/21/2025: Ann Arbor (42.225°, -83.746°)</text>');
    expect(markup).toContain('>Sunrise: 05:59</text>');
    expect(markup).toContain('aria-label="06/21/2025: Ann Arbor (42.225°, -83.746°)"');
  });
});
