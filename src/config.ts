import type { Location } from './lib/solar/location';

export type City = Location;

export const CITIES: City[] = [
  { name: 'Ann Arbor', region: 'Michigan/USA', timezone: 'America/Detroit', latitude: 42.2253, longitude: -83.74567 },
  { name: 'New York', region: 'New York/USA', timezone: 'America/New_York', latitude: 40.7128, longitude: -74.006 },
  { name: 'Chicago', region: 'Illinois/USA', timezone: 'America/Chicago', latitude: 41.8781, longitude: -87.6298 },
  { name: 'Denver', region: 'Colorado/USA', timezone: 'America/Denver', latitude: 39.7392, longitude: -104.9903 },
  { name: 'Los Angeles', region: 'California/USA', timezone: 'America/Los_Angeles', latitude: 34.0522, longitude: -118.2437 },
  { name: 'Anchorage', region: 'Alaska/USA', timezone: 'America/Anchorage', latitude: 61.2181, longitude: -149.9003 },
  { name: 'Honolulu', region: 'Hawaii/USA', timezone: 'Pacific/Honolulu', latitude: 21.3069, longitude: -157.8583 },
  { name: 'Toronto', region: 'Canada', timezone: 'America/Toronto', latitude: 43.6532, longitude: -79.3832 },
  { name: 'Mexico City', region: 'Mexico', timezone: 'America/Mexico_City', latitude: 19.4326, longitude: -99.1332 },
  { name: 'São Paulo', region: 'Brazil', timezone: 'America/Sao_Paulo', latitude: -23.5505, longitude: -46.6333 },
  { name: 'London', region: 'England', timezone: 'Europe/London', latitude: 51.5074, longitude: -0.1278 },
  { name: 'Paris', region: 'France', timezone: 'Europe/Paris', latitude: 48.8566, longitude: 2.3522 },
  { name: 'Berlin', region: 'Germany', timezone: 'Europe/Berlin', latitude: 52.52, longitude: 13.405 },
  { name: 'Reykjavík', region: 'Iceland', timezone: 'Atlantic/Reykjavik', latitude: 64.1466, longitude: -21.9426 },
  { name: 'Tromsø', region: 'Norway', timezone: 'Europe/Oslo', latitude: 69.6492, longitude: 18.9553 },
  { name: 'Moscow', region: 'Russia', timezone: 'Europe/Moscow', latitude: 55.7558, longitude: 37.6173 },
  { name: 'Cairo', region: 'Egypt', timezone: 'Africa/Cairo', latitude: 30.0444, longitude: 31.2357 },
  { name: 'Nairobi', region: 'Kenya', timezone: 'Africa/Nairobi', latitude: -1.2921, longitude: 36.8219 },
  { name: 'Mumbai', region: 'India', timezone: 'Asia/Kolkata', latitude: 19.076, longitude: 72.8777 },
  { name: 'Singapore', region: 'Singapore', timezone: 'Asia/Singapore', latitude: 1.3521, longitude: 103.8198 },
  { name: 'Tokyo', region: 'Japan', timezone: 'Asia/Tokyo', latitude: 35.6762, longitude: 139.6503 },
  { name: 'Sydney', region: 'Australia', timezone: 'Australia/Sydney', latitude: -33.8688, longitude: 151.2093 },
  { name: 'Ushuaia', region: 'Argentina', timezone: 'America/Argentina/Ushuaia', latitude: -54.8019, longitude: -68.303 },
  { name: 'McMurdo Station', region: 'Antarctica', timezone: 'Antarctica/McMurdo', latitude: -77.8419, longitude: 166.6863 },
];

export const DEFAULT_CITY_INDEX = 0;

// 6° = civil twilight
export const DEFAULT_DEPRESSION = 6;

export const DEPRESSION_CHOICES = [6, 12, 18] as const;
