import { BaseService, displayValue, formatErrorResponse, formatLocation, type ServiceDeps } from '../base-service';
import {
  CURRENT_WEATHER_PARAMS,
  DAILY_FORECAST_PARAMS,
  DEFAULT_FORECAST_DAYS,
  DETAILED_DAILY_PARAMS,
  HOURLY_PARAMS,
  MAX_DISPLAY_DAYS,
  MAX_FORECAST_DAYS,
  PRECIPITATION_THRESHOLDS,
  SEVERE_WEATHER_CODES,
  TEMPERATURE_THRESHOLDS,
  TRIP_RECOMMENDATION_DAYS,
  WEATHER_API_BASE_URL,
  WEATHER_CODE_PENALTIES,
  WEATHER_DESCRIPTIONS,
  WIND_THRESHOLDS,
} from './constants';
import {
  ForecastResponseSchema,
  type DailyForecast,
  type ForecastResponse,
  type HourlyForecast,
} from './schemas';
import {
  TravelAgentError,
  type LocationInput,
  type ScoredDay,
  type WeatherEvent,
} from '../../types/types';

export interface DayConditions {
  maxTemp: number;
  minTemp: number;
  precipSum: number;
  precipProb: number;
  wind: number;
  weatherCode: number;
}

export class WeatherService extends BaseService {
  constructor(deps: ServiceDeps = {}) {
    super('weather', deps);
  }

  /** Current conditions plus a short daily outlook. */
  async getCurrentWeather(location: LocationInput): Promise<string> {
    const label = formatLocation(location);
    const coords = await this.resolveLocation(
      location,
      `Could not find coordinates for ${label}. Check your location name.`
    );
    const data = await this.fetchForecast(
      {
        latitude: coords.latitude,
        longitude: coords.longitude,
        current: CURRENT_WEATHER_PARAMS.join(','),
        daily: DAILY_FORECAST_PARAMS.join(','),
        timezone: 'auto',
      },
      'weather data fetch'
    );
    return formatWeatherReport(label, data);
  }

  async getForecast(location: LocationInput, days = DEFAULT_FORECAST_DAYS): Promise<string> {
    const daily = await this.getForecastData(location, days);
    return formatForecastReport(formatLocation(location), daily, days);
  }

  /** Daily series for other services; callers that already hold coordinates skip geocoding. */
  async getForecastData(location: LocationInput, days = DEFAULT_FORECAST_DAYS): Promise<DailyForecast> {
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${formatLocation(location)}`);
    const data = await this.fetchForecast(
      {
        latitude: coords.latitude,
        longitude: coords.longitude,
        daily: DETAILED_DAILY_PARAMS.join(','),
        forecast_days: Math.min(days, MAX_FORECAST_DAYS),
        timezone: 'auto',
      },
      'weather forecast data fetch'
    );
    return data.daily ?? emptyDaily();
  }

  async getTripRecommendations(location: LocationInput): Promise<string> {
    const label = formatLocation(location);
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${label}`);
    const data = await this.fetchForecast(
      {
        latitude: coords.latitude,
        longitude: coords.longitude,
        daily: DETAILED_DAILY_PARAMS.join(','),
        timezone: 'auto',
      },
      'weather forecast data fetch'
    );
    return formatTripRecommendations(label, scoreWeatherDays(data.daily ?? emptyDaily()));
  }

  async getSevereWeatherEvents(location: LocationInput): Promise<string> {
    const label = formatLocation(location);
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${label}`);
    const data = await this.fetchForecast(
      {
        latitude: coords.latitude,
        longitude: coords.longitude,
        hourly: HOURLY_PARAMS.join(','),
        daily: 'weather_code,precipitation_probability_max',
        forecast_days: DEFAULT_FORECAST_DAYS,
        timezone: 'auto',
      },
      'weather events data fetch'
    );
    const events = detectSevereWeatherEvents(data.hourly ?? emptyHourly());
    return formatWeatherEvents(label, events);
  }

  private async fetchForecast(params: Record<string, string | number>, context: string): Promise<ForecastResponse> {
    try {
      return await this.requestJson(WEATHER_API_BASE_URL, ForecastResponseSchema, { params });
    } catch (err) {
      if (err instanceof TravelAgentError) {
        throw new TravelAgentError(formatErrorResponse(err.message, context), err.code, err.details);
      }
      throw err;
    }
  }
}

// ---------- scoring ----------

export function calculateDayScore(day: DayConditions): number {
  let score = 100.0;

  const { extreme, moderate } = TEMPERATURE_THRESHOLDS;
  if (day.maxTemp > extreme.max || day.minTemp < extreme.min) {
    score -= extreme.penalty;
  } else if (day.maxTemp > moderate.max || day.minTemp < moderate.min) {
    score -= moderate.penalty;
  }

  score -= day.precipSum * 10.0;
  score -= day.precipProb / 2.0;

  if (day.wind > WIND_THRESHOLDS.severe.speed) {
    score -= WIND_THRESHOLDS.severe.penalty;
  } else if (day.wind > WIND_THRESHOLDS.moderate.speed) {
    score -= WIND_THRESHOLDS.moderate.penalty;
  }

  if (day.weatherCode >= WEATHER_CODE_PENALTIES.snow.min) {
    score -= WEATHER_CODE_PENALTIES.snow.penalty;
  } else if (day.weatherCode >= WEATHER_CODE_PENALTIES.rain.min) {
    score -= WEATHER_CODE_PENALTIES.rain.penalty;
  } else if (day.weatherCode >= WEATHER_CODE_PENALTIES.drizzle.min) {
    score -= WEATHER_CODE_PENALTIES.drizzle.penalty;
  }

  return Math.trunc(Math.max(0, score));
}

/** Reads row `i` of the daily series; missing readings fall back to mild defaults. */
export function dayConditionsAt(daily: DailyForecast, i: number): DayConditions {
  return {
    maxTemp: valueAt(daily.temperature_2m_max, i, 20),
    minTemp: valueAt(daily.temperature_2m_min, i, 10),
    precipSum: valueAt(daily.precipitation_sum, i, 0),
    precipProb: valueAt(daily.precipitation_probability_max, i, 0),
    wind: valueAt(daily.wind_speed_10m_max, i, 0),
    weatherCode: valueAt(daily.weather_code, i, 0),
  };
}

// Best first; ties keep calendar order.
export function scoreWeatherDays(daily: DailyForecast): ScoredDay[] {
  const days = daily.time.map((date, i) => ({
    date,
    score: calculateDayScore(dayConditionsAt(daily, i)),
    maxTemp: daily.temperature_2m_max[i] ?? null,
    precip: daily.precipitation_sum[i] ?? null,
  }));
  return days.sort((a, b) => b.score - a.score);
}

export function describeWeatherCode(code: number): string {
  return WEATHER_DESCRIPTIONS.find((d) => d.codes.includes(code))?.label ?? 'Unknown';
}

export function detectSevereWeatherEvents(hourly: HourlyForecast): WeatherEvent[] {
  const events: WeatherEvent[] = [];

  hourly.time.forEach((time, i) => {
    const precip = valueAt(hourly.precipitation, i, 0);
    const wind = valueAt(hourly.wind_speed_10m, i, 0);
    const code = valueAt(hourly.weather_code, i, 0);

    if (precip >= PRECIPITATION_THRESHOLDS.heavyRain) {
      events.push({ time, type: 'Heavy Rain', value: `${precip}mm` });
    }
    if (wind >= PRECIPITATION_THRESHOLDS.strongWinds) {
      events.push({ time, type: 'Strong Winds', value: `${wind}km/h` });
    }
    if (code >= SEVERE_WEATHER_CODES.thunderstorm) {
      events.push({ time, type: 'Thunderstorm', value: 'Severe' });
    } else if (code >= SEVERE_WEATHER_CODES.snow) {
      events.push({ time, type: 'Snow', value: 'Heavy' });
    }
  });

  return events;
}

export function qualityLabel(score: number): string {
  if (score >= 80) return 'Excellent';
  if (score >= 60) return 'Good';
  if (score >= 40) return 'Fair';
  return 'Poor';
}

// ---------- formatting ----------

export function formatWeatherReport(location: string, data: ForecastResponse): string {
  const { current } = data;
  const cu = (key: string, fallback: string) => data.current_units[key] ?? fallback;
  const du = (key: string, fallback: string) => data.daily_units[key] ?? fallback;

  let report = `Weather for ${location}:\n`;
  report += `Current Temperature: ${displayValue(current.temperature_2m)} ${cu('temperature_2m', '°C')}\n`;
  report += `Feels Like: ${displayValue(current.apparent_temperature)} ${cu('apparent_temperature', '°C')}\n`;
  report += `Humidity: ${displayValue(current.relative_humidity_2m)} ${cu('relative_humidity_2m', '%')}\n`;
  report += `Precipitation: ${displayValue(current.precipitation)} ${cu('precipitation', 'mm')}\n`;
  report += `Wind Speed: ${displayValue(current.wind_speed_10m)} ${cu('wind_speed_10m', 'km/h')}\n`;
  report += `Wind Direction: ${displayValue(current.wind_direction_10m)} ${cu('wind_direction_10m', '°')}\n\n`;

  report += 'Forecast for the next days:\n';
  const daily = data.daily ?? emptyDaily();
  const shown = Math.min(MAX_DISPLAY_DAYS, daily.time.length);
  for (let i = 0; i < shown; i++) {
    const min = displayValue(daily.temperature_2m_min[i]);
    const max = displayValue(daily.temperature_2m_max[i]);
    report += `${daily.time[i]}: ${min}-${max} ${du('temperature_2m_max', '°C')}, `;
    report += `Precipitation: ${displayValue(daily.precipitation_sum[i])} ${du('precipitation_sum', 'mm')}, `;
    report += `Wind: ${displayValue(daily.wind_speed_10m_max[i])} ${du('wind_speed_10m_max', 'km/h')}\n`;
  }

  return report;
}

export function formatForecastReport(location: string, daily: DailyForecast, days: number): string {
  let report = `${days}-day weather forecast for ${location}:\n\n`;

  const shown = Math.min(days, daily.time.length);
  for (let i = 0; i < shown; i++) {
    const description = describeWeatherCode(valueAt(daily.weather_code, i, 0));
    report += `${daily.time[i]}:\n`;
    report += `  Temperature: ${displayValue(daily.temperature_2m_min[i])}°C - ${displayValue(daily.temperature_2m_max[i])}°C\n`;
    report += `  Weather: ${description}\n`;
    report += `  Precipitation: ${displayValue(daily.precipitation_sum[i])}mm (Probability: ${displayValue(daily.precipitation_probability_max[i])}%)\n`;
    report += `  Wind: ${displayValue(daily.wind_speed_10m_max[i])} km/h\n\n`;
  }

  return report;
}

export function formatTripRecommendations(location: string, days: ScoredDay[]): string {
  let report = `Best trip days for ${location} (next 7 days):\n\n`;

  days.slice(0, TRIP_RECOMMENDATION_DAYS).forEach((day, i) => {
    report += `${i + 1}. ${day.date} - ${qualityLabel(day.score)} (Score: ${day.score}/100)\n`;
    report += `   Max Temperature: ${displayValue(day.maxTemp)}°C, Precipitation: ${displayValue(day.precip)}mm\n\n`;
  });

  return report;
}

export function formatWeatherEvents(location: string, events: WeatherEvent[]): string {
  if (events.length === 0) {
    return `No severe weather events expected for ${location} in the next ${DEFAULT_FORECAST_DAYS} days.`;
  }

  let report = `Severe weather events for ${location}:\n\n`;
  for (const event of events) {
    report += `⚠️  ${event.time}: ${event.type} (${event.value})\n`;
  }
  return report;
}

// ---------- helpers ----------

function valueAt(values: ReadonlyArray<number | null>, i: number, fallback: number): number {
  return values[i] ?? fallback;
}

function emptyDaily(): DailyForecast {
  return {
    time: [],
    temperature_2m_max: [],
    temperature_2m_min: [],
    precipitation_sum: [],
    precipitation_probability_max: [],
    wind_speed_10m_max: [],
    weather_code: [],
  };
}

function emptyHourly(): HourlyForecast {
  return { time: [], temperature_2m: [], precipitation: [], weather_code: [], wind_speed_10m: [] };
}
