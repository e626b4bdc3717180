import type { Band, TwilightBand } from './types';

export const CIVIL: TwilightBand = {
  depression: 6,
  band: 'civil_twilight',
  dawn: 'civil_dawn',
  dusk: 'civil_dusk',
};

export const NAUTICAL: TwilightBand = {
  depression: 12,
  band: 'nautical_twilight',
  dawn: 'nautical_dawn',
  dusk: 'nautical_dusk',
};

export const ASTRONOMICAL: TwilightBand = {
  depression: 18,
  band: 'astronomical_twilight',
  dawn: 'astro_dawn',
  dusk: 'astro_dusk',
};

export const STANDARD_BANDS: readonly TwilightBand[] = [CIVIL, NAUTICAL, ASTRONOMICAL];

function bandFor(depression: number): Band {
  const standard = STANDARD_BANDS.find((b) => b.depression === depression);
  return standard ? standard.band : 'twilight';
}

/** One dawn/dusk pair at an arbitrary depression, labelled first_light / last_light. */
export function singleBand(depression: number): TwilightBand {
  return {
    depression,
    band: bandFor(depression),
    dawn: 'first_light',
    dusk: 'last_light',
  };
}

export const BAND_LABELS: Record<Band, string> = {
  night: 'Night',
  astronomical_twilight: 'Astronomical twilight',
  nautical_twilight: 'Nautical twilight',
  civil_twilight: 'Civil twilight',
  twilight: 'Twilight',
  daylight: 'Daylight',
};
