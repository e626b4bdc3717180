import { useEffect, useMemo, useState } from 'react';
import { CITIES, DEFAULT_CITY_INDEX, DEFAULT_DEPRESSION, DEPRESSION_CHOICES, type City } from '../config';
import { DaylightError, InvalidLocationError } from '../lib/daylight/errors';
import { dstInEffect } from '../lib/dst';
import { calendarDateIn, formatCalendarDate, parseCalendarDate, parseLocation } from '../lib/solar/location';
import { bandsForMode, planDaylightWheel, type DaylightWheel as Wheel, type TwilightMode } from '../lib/wheel/daylightWheel';
import DaylightWheel from './DaylightWheel';

const MODE_KEY = 'dayLength_twilightMode';

function loadMode(): TwilightMode {
  if (typeof localStorage === 'undefined') return { kind: 'single', depression: DEFAULT_DEPRESSION };
  const saved = localStorage.getItem(MODE_KEY);
  if (saved === 'nested') return { kind: 'nested' };
  const depression = Number(saved);
  if (DEPRESSION_CHOICES.some((d) => d === depression)) return { kind: 'single', depression };
  return { kind: 'single', depression: DEFAULT_DEPRESSION };
}

function modeValue(mode: TwilightMode): string {
  return mode.kind === 'nested' ? 'nested' : String(mode.depression);
}

const CONDITION_TEXT: Record<Wheel['condition'], string | null> = {
  normal: null,
  continuous_daylight: 'Midnight sun: the sun does not set on this date.',
  continuous_night: 'Polar night: the sun does not rise on this date.',
};

const inputStyle = { padding: '4px 6px', fontSize: 14 };

interface DayLengthAppProps {
  /** YYYY-MM-DD; defaults to today in the first city's timezone. */
  initialDate?: string;
  initialCityIndex?: number;
  initialMode?: TwilightMode;
}

type Outcome = { wheel: Wheel; error: null } | { wheel: null; error: string };

export default function DayLengthApp({ initialDate, initialCityIndex = DEFAULT_CITY_INDEX, initialMode }: DayLengthAppProps) {
  const [cities, setCities] = useState<City[]>(CITIES);
  const [cityIndex, setCityIndex] = useState(initialCityIndex);
  const [dateText, setDateText] = useState(
    () => initialDate ?? formatCalendarDate(calendarDateIn(new Date(), CITIES[initialCityIndex].timezone)),
  );
  const [mode, setMode] = useState<TwilightMode>(() => initialMode ?? loadMode());
  const [showLocationForm, setShowLocationForm] = useState(false);
  // Last entered values stay in the form between openings
  const [draft, setDraft] = useState({ name: '', latitude: '', longitude: '', timezone: 'UTC' });
  const [formError, setFormError] = useState<string | null>(null);

  useEffect(() => {
    localStorage.setItem(MODE_KEY, modeValue(mode));
  }, [mode]);

  const city = cities[cityIndex];

  const outcome = useMemo<Outcome>(() => {
    try {
      const date = parseCalendarDate(dateText);
      return { wheel: planDaylightWheel({ date, location: city, bands: bandsForMode(mode) }), error: null };
    } catch (err) {
      if (err instanceof DaylightError) return { wheel: null, error: err.message };
      throw err;
    }
  }, [city, dateText, mode]);

  const dst = useMemo(() => {
    if (!city.region?.endsWith('USA') || !city.timezone.startsWith('America/')) return null;
    try {
      const { year, month, day } = parseCalendarDate(dateText);
      return dstInEffect(year, month, day);
    } catch (err) {
      if (err instanceof DaylightError) return null;
      throw err;
    }
  }, [city, dateText]);

  function addLocation() {
    try {
      const location = parseLocation({
        name: draft.name,
        region: 'User-defined',
        timezone: draft.timezone.trim(),
        latitude: draft.latitude.trim() === '' ? Number.NaN : Number(draft.latitude),
        longitude: draft.longitude.trim() === '' ? Number.NaN : Number(draft.longitude),
      });
      setCities((prev) => [...prev, location]);
      setCityIndex(cities.length);
      setFormError(null);
      setShowLocationForm(false);
    } catch (err) {
      if (!(err instanceof InvalidLocationError)) throw err;
      setFormError(err.message);
    }
  }

  return (
    <div style={{ fontFamily: 'system-ui, sans-serif', maxWidth: 640, margin: '0 auto', padding: 16 }}>
      <div style={{ display: 'flex', flexWrap: 'wrap', gap: 12, alignItems: 'center', marginBottom: 12 }}>
        <label>
          Date{' '}
          <input type="date" value={dateText} onChange={(e) => setDateText(e.target.value)} style={inputStyle} />
        </label>
        <label>
          Location{' '}
          <select value={cityIndex} onChange={(e) => setCityIndex(Number(e.target.value))} style={inputStyle}>
            {cities.map((c, i) => (
              <option key={`${c.name}-${i}`} value={i}>
                {c.name}
              </option>
            ))}
          </select>
        </label>
        <button type="button" onClick={() => setShowLocationForm((v) => !v)} style={inputStyle}>
          {showLocationForm ? 'Cancel' : 'Custom location…'}
        </button>
        <label>
          Twilight{' '}
          <select
            value={modeValue(mode)}
            onChange={(e) =>
              setMode(e.target.value === 'nested' ? { kind: 'nested' } : { kind: 'single', depression: Number(e.target.value) })
            }
            style={inputStyle}
          >
            {DEPRESSION_CHOICES.map((d) => (
              <option key={d} value={String(d)}>
                {d}° {d === 6 ? 'civil' : d === 12 ? 'nautical' : 'astronomical'}
              </option>
            ))}
            <option value="nested">all bands</option>
          </select>
        </label>
      </div>

      {showLocationForm && (
        <form
          onSubmit={(e) => {
            e.preventDefault();
            addLocation();
          }}
          style={{ display: 'grid', gap: 6, maxWidth: 300, marginBottom: 12 }}
        >
          {(['name', 'latitude', 'longitude', 'timezone'] as const).map((field) => (
            <label key={field} style={{ display: 'flex', justifyContent: 'space-between', gap: 8 }}>
              {field[0].toUpperCase() + field.slice(1)}:
              <input
                value={draft[field]}
                onChange={(e) => setDraft((prev) => ({ ...prev, [field]: e.target.value }))}
                style={inputStyle}
              />
            </label>
          ))}
          <button type="submit" style={inputStyle}>
            OK
          </button>
          {formError && <div role="alert" style={{ color: 'firebrick' }}>{formError}</div>}
        </form>
      )}

      {outcome.error !== null ? (
        <div role="alert" style={{ color: 'firebrick' }}>{outcome.error}</div>
      ) : (
        <>
          <DaylightWheel
            segments={outcome.wheel.segments}
            title={outcome.wheel.summary.title}
            footer={outcome.wheel.summary.footer}
          />
          {CONDITION_TEXT[outcome.wheel.condition] && <p>{CONDITION_TEXT[outcome.wheel.condition]}</p>}
          {outcome.wheel.skippedBands.length > 0 && (
            <p>{`Not reached on this date: ${outcome.wheel.skippedBands.map((b) => `${b.depression}°`).join(', ')}`}</p>
          )}
        </>
      )}

      <div style={{ fontSize: 12, opacity: 0.7, marginTop: 8 }}>
        {dst !== null && <span>{`DST (US): ${dst ? 'in effect' : 'not in effect'} · `}</span>}
        <span>{`v${__APP_VERSION__}`}</span>
      </div>
    </div>
  );
}
