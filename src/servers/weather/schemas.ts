import { z } from 'zod';

// Open-Meteo returns parallel arrays keyed by variable; gaps come back as null.
const series = z.array(z.number().nullable()).default([]);

export const DailyForecastSchema = z.object({
  time: z.array(z.string()).default([]),
  temperature_2m_max: series,
  temperature_2m_min: series,
  precipitation_sum: series,
  precipitation_probability_max: series,
  wind_speed_10m_max: series,
  weather_code: series,
});

export const HourlyForecastSchema = z.object({
  time: z.array(z.string()).default([]),
  temperature_2m: series,
  precipitation: series,
  weather_code: series,
  wind_speed_10m: series,
});

const reading = z.number().nullable().optional();

export const CurrentWeatherSchema = z.object({
  temperature_2m: reading,
  relative_humidity_2m: reading,
  apparent_temperature: reading,
  precipitation: reading,
  wind_speed_10m: reading,
  wind_direction_10m: reading,
});

const units = z.record(z.string(), z.string()).default({});

export const ForecastResponseSchema = z.object({
  current: CurrentWeatherSchema.default({}),
  current_units: units,
  daily: DailyForecastSchema.optional(),
  daily_units: units,
  hourly: HourlyForecastSchema.optional(),
});

export type DailyForecast = z.infer<typeof DailyForecastSchema>;
export type HourlyForecast = z.infer<typeof HourlyForecastSchema>;
export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;
