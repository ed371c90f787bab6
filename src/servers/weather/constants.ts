/** Weather service constants */

export const WEATHER_API_BASE_URL = 'https://api.open-meteo.com/v1/forecast';

export const CURRENT_WEATHER_PARAMS = [
  'temperature_2m',
  'relative_humidity_2m',
  'apparent_temperature',
  'precipitation',
  'wind_speed_10m',
  'wind_direction_10m',
] as const;

export const DAILY_FORECAST_PARAMS = [
  'temperature_2m_max',
  'temperature_2m_min',
  'precipitation_sum',
  'wind_speed_10m_max',
] as const;

export const DETAILED_DAILY_PARAMS = [
  'temperature_2m_max',
  'temperature_2m_min',
  'precipitation_sum',
  'precipitation_probability_max',
  'wind_speed_10m_max',
  'weather_code',
] as const;

export const HOURLY_PARAMS = ['temperature_2m', 'precipitation', 'weather_code', 'wind_speed_10m'] as const;

export const TEMPERATURE_THRESHOLDS = {
  extreme: { min: 5, max: 30, penalty: 30 },
  moderate: { min: 10, max: 25, penalty: 15 },
  ideal: { min: 15, max: 25 },
} as const;

export const WIND_THRESHOLDS = {
  severe: { speed: 40, penalty: 25 },
  moderate: { speed: 30, penalty: 15 },
} as const;

export const PRECIPITATION_THRESHOLDS = {
  heavyRain: 5.0, // mm/h
  strongWinds: 40.0, // km/h
} as const;

export const WEATHER_CODE_PENALTIES = {
  snow: { min: 70, penalty: 40 },
  rain: { min: 50, penalty: 30 },
  drizzle: { min: 30, penalty: 20 },
} as const;

export const SEVERE_WEATHER_CODES = {
  thunderstorm: 90,
  snow: 70,
} as const;

export const DEFAULT_FORECAST_DAYS = 3;
export const MAX_DISPLAY_DAYS = 3;
export const MAX_FORECAST_DAYS = 16;
export const TRIP_RECOMMENDATION_DAYS = 5;

// WMO weather interpretation codes
export const WEATHER_DESCRIPTIONS: ReadonlyArray<{ codes: readonly number[]; label: string }> = [
  { codes: [0], label: 'Clear sky' },
  { codes: [1, 2, 3], label: 'Partly cloudy' },
  { codes: [45, 48], label: 'Foggy' },
  { codes: [51, 53, 55], label: 'Drizzle' },
  { codes: [61, 63, 65], label: 'Rain' },
  { codes: [71, 73, 75], label: 'Snow' },
  { codes: [80, 81, 82], label: 'Rain showers' },
  { codes: [95, 96, 99], label: 'Thunderstorm' },
];
