import { BaseService, formatLocation, isKeyOf, titleCase, type ServiceDeps } from '../base-service';
import {
  ACCOMMODATION_ROWS,
  ACTIVITY_SEARCH_LIMIT,
  BUDGET_CATEGORIES,
  DEFAULT_BUDGET,
  DEFAULT_TRIP_DURATION,
  DEFAULT_TRIP_STYLE,
  ERROR_MESSAGES,
  EVENING_TYPE,
  FORECAST_WINDOW_DAYS,
  MAX_AFTERNOON_ACTIVITIES,
  MAX_TRIP_DURATION,
  MIN_ACTIVITY_RATING,
  MIN_TRIP_DURATION,
  MORNING_TYPES,
  TRIP_DURATIONS,
  TRIP_STYLES,
  WEATHER_ACTIVITY_MAPPING,
  WEATHER_TRIP_LEAD_DAYS,
  type TripStyle,
} from './constants';
import type { BookingService } from '../booking/service';
import type { PlacesService } from '../places/service';
import { dayConditionsAt, type DayConditions, type WeatherService } from '../weather/service';
import { addDays, consecutiveDates, diffDays, formatLongDate, parseIsoDate, toIsoDate, weekdayName } from '../../utils/dates';
import {
  ErrorCodes,
  TravelAgentError,
  errorMessage,
  type AccommodationSuggestion,
  type Activity,
  type Coordinates,
  type DayPlan,
  type LocationInput,
  type TimeOfDay,
} from '../../types/types';

/** The services a plan is built from. Without `booking` plans carry no lodging. */
export interface PlannerServices {
  weather: WeatherService;
  places: PlacesService;
  booking?: BookingService;
}

export interface TripOptions {
  startDate?: string;
  duration?: number | string;
  tripStyle?: string;
  budget?: string;
  includeAccommodation?: boolean;
}

export interface WeatherTripOptions {
  duration?: number | string;
  tripStyle?: string;
}

export interface DailyActivityOptions {
  date?: string;
  tripStyle?: string;
}

export interface ScoredDate {
  date: Date;
  score: number;
}

export class TripPlannerService extends BaseService {
  constructor(
    private readonly services: PlannerServices,
    deps: ServiceDeps = {}
  ) {
    super('trip-planner', deps);
  }

  async planCompleteTrip(location: LocationInput, options: TripOptions = {}): Promise<string> {
    const days = assertDuration(options.duration);
    const styleName = options.tripStyle ?? DEFAULT_TRIP_STYLE;
    const style = assertTripStyle(styleName);
    const budget = options.budget ?? DEFAULT_BUDGET;
    if (!isKeyOf(BUDGET_CATEGORIES, budget)) {
      throw invalid(`Invalid budget category '${budget}'. Available: ${Object.keys(BUDGET_CATEGORIES).join(', ')}`);
    }
    const start = options.startDate === undefined ? undefined : assertDate(options.startDate);

    const coords = await this.resolveLocation(location, ERROR_MESSAGES.locationNotFound);
    const dates = start ? consecutiveDates(start, days) : await this.selectOptimalDates(coords, days);

    const plans: DayPlan[] = [];
    for (const date of dates) {
      plans.push(await this.planDay(coords, date, style));
    }

    const accommodation =
      options.includeAccommodation !== false ? await this.suggestAccommodation(coords, dates[0], days) : null;

    return formatTripPlan({
      location: formatLocation(location),
      dates,
      plans,
      accommodation,
      style: styleName,
      budget,
      dailyBudget: BUDGET_CATEGORIES[budget].dailyBudget,
    });
  }

  async planWeatherOptimizedTrip(
    location: LocationInput,
    weatherCondition: string,
    options: WeatherTripOptions = {}
  ): Promise<string> {
    const days = assertDuration(options.duration);
    const styleName = options.tripStyle ?? DEFAULT_TRIP_STYLE;
    const style = assertTripStyle(styleName);
    const slots = assertWeatherCondition(weatherCondition);

    const coords = await this.resolveLocation(location, ERROR_MESSAGES.locationNotFound);
    // forecast codes are not matched against the condition yet; trips start a little ahead
    const dates = consecutiveDates(addDays(this.today(), WEATHER_TRIP_LEAD_DAYS), days);

    const plans: DayPlan[] = [];
    for (const date of dates) {
      plans.push(await this.planWeatherDay(coords, date, slots, style));
    }

    return formatWeatherTripPlan(formatLocation(location), dates, plans, weatherCondition, styleName);
  }

  async suggestDailyActivities(
    location: LocationInput,
    weatherCondition: string,
    options: DailyActivityOptions = {}
  ): Promise<string> {
    const styleName = options.tripStyle ?? DEFAULT_TRIP_STYLE;
    const style = assertTripStyle(styleName);
    const slots = assertWeatherCondition(weatherCondition);
    const date = options.date === undefined ? this.today() : assertDate(options.date);

    const coords = await this.resolveLocation(location, ERROR_MESSAGES.locationNotFound);
    const plan = await this.planWeatherDay(coords, date, slots, style);
    return formatDailySuggestions(formatLocation(location), date, plan, weatherCondition, styleName);
  }

  /** Best-scoring run of `days` consecutive forecast days, or from tomorrow when the forecast is no help. */
  async selectOptimalDates(coords: Coordinates, days: number): Promise<Date[]> {
    const fallback = consecutiveDates(addDays(this.today(), 1), days);

    let scored: ScoredDate[];
    try {
      const daily = await this.services.weather.getForecastData(coords, FORECAST_WINDOW_DAYS);
      scored = daily.time.slice(0, FORECAST_WINDOW_DAYS).flatMap((iso, i) => {
        const date = parseIsoDate(iso);
        return date ? [{ date, score: plannerDayScore(dayConditionsAt(daily, i)) }] : [];
      });
    } catch (err) {
      this.log.warn(`Forecast unavailable, starting tomorrow: ${errorMessage(err)}`);
      return fallback;
    }

    return findBestConsecutiveDays(scored, days) ?? fallback;
  }

  private async planDay(coords: Coordinates, date: Date, style: TripStyle): Promise<DayPlan> {
    const activities: Activity[] = [];
    const add = (activity: Activity | null) => {
      if (activity) activities.push(activity);
    };

    const morningType = style.preferredTypes.find((t) => MORNING_TYPES.includes(t));
    if (morningType) {
      add(await this.findActivity(coords, morningType, style.travelRadius, 'morning'));
    }

    const afternoonCount = Math.min(style.activitiesPerDay - 1, MAX_AFTERNOON_ACTIVITIES);
    for (let i = 0; i < afternoonCount; i++) {
      const type = style.preferredTypes[i % style.preferredTypes.length];
      if (type) add(await this.findActivity(coords, type, style.travelRadius, 'afternoon'));
    }

    add(await this.findActivity(coords, EVENING_TYPE, style.travelRadius, 'evening'));

    return { date: toIsoDate(date), dayName: weekdayName(date), activities };
  }

  private async planWeatherDay(
    coords: Coordinates,
    date: Date,
    slots: Record<TimeOfDay, readonly string[]>,
    style: TripStyle
  ): Promise<DayPlan> {
    const activities: Activity[] = [];
    for (const time of ['morning', 'afternoon', 'evening'] as const) {
      const type = slots[time][0];
      if (!type) continue;
      const activity = await this.findActivity(coords, type, style.travelRadius, time);
      if (activity) activities.push(activity);
    }
    return { date: toIsoDate(date), dayName: weekdayName(date), activities };
  }

  // First well-rated nearby place of a type; a failed search just leaves the slot empty.
  private async findActivity(
    coords: Coordinates,
    type: string,
    radius: number,
    time: TimeOfDay
  ): Promise<Activity | null> {
    try {
      const [place] = await this.services.places.searchPlacesData(coords, {
        placeType: type,
        radius,
        limit: ACTIVITY_SEARCH_LIMIT,
        minRating: MIN_ACTIVITY_RATING,
      });
      if (!place) return null;
      return {
        type,
        time,
        name: place.name ?? `Sample ${titleCase(type)}`,
        rating: place.rating ?? 0,
        address: place.vicinity ?? 'Address not available',
        placeId: place.place_id ?? '',
        priceLevel: place.price_level ?? 0,
      };
    } catch (err) {
      this.log.warn(`No ${type} for the ${time}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async suggestAccommodation(
    coords: Coordinates,
    checkIn: Date | undefined,
    nights: number
  ): Promise<AccommodationSuggestion | null> {
    const { booking } = this.services;
    if (!booking || !checkIn) return null;

    const checkOut = addDays(checkIn, nights);
    try {
      const data = await booking.searchAccommodationsData(coords, {
        checkin: toIsoDate(checkIn),
        checkout: toIsoDate(checkOut),
        rows: ACCOMMODATION_ROWS,
      });
      const [first] = data.results;
      if (!first) return null;

      const pricePerNight = toNumber(first.price?.amount);
      return {
        name: first.name ?? 'Hotel Name',
        rating: toNumber(first.star_rating),
        pricePerNight,
        currency: first.price?.currency ?? 'USD',
        totalCost: pricePerNight * nights,
        checkIn: toIsoDate(checkIn),
        checkOut: toIsoDate(checkOut),
        nights,
      };
    } catch (err) {
      this.log.warn(`Accommodation lookup failed: ${errorMessage(err)}`);
      return null;
    }
  }
}

// ---------- input checks ----------

/** Days for a duration given as a count or a preset name; null when it is neither. */
export function parseDuration(duration: number | string | undefined): number | null {
  if (duration === undefined) return DEFAULT_TRIP_DURATION;
  if (typeof duration === 'number') {
    return Number.isInteger(duration) && duration >= MIN_TRIP_DURATION && duration <= MAX_TRIP_DURATION
      ? duration
      : null;
  }
  const value = duration.trim().toLowerCase();
  if (/^\d+$/.test(value)) return parseDuration(Number(value));
  return isKeyOf(TRIP_DURATIONS, value) ? TRIP_DURATIONS[value] : null;
}

function assertDuration(duration: number | string | undefined): number {
  const days = parseDuration(duration);
  if (days === null) throw invalid(ERROR_MESSAGES.invalidDuration);
  return days;
}

function assertTripStyle(name: string): TripStyle {
  if (!isKeyOf(TRIP_STYLES, name)) {
    throw invalid(`Invalid trip style '${name}'. Available: ${Object.keys(TRIP_STYLES).join(', ')}`);
  }
  return TRIP_STYLES[name];
}

function assertWeatherCondition(condition: string): Record<TimeOfDay, readonly string[]> {
  const key = condition.trim().toLowerCase();
  if (!isKeyOf(WEATHER_ACTIVITY_MAPPING, key)) {
    throw invalid(
      `Weather condition '${condition}' not supported. Available: ${Object.keys(WEATHER_ACTIVITY_MAPPING).join(', ')}`
    );
  }
  return WEATHER_ACTIVITY_MAPPING[key];
}

function assertDate(value: string): Date {
  const date = parseIsoDate(value);
  if (!date) throw invalid(ERROR_MESSAGES.invalidDates);
  return date;
}

function invalid(message: string): TravelAgentError {
  return new TravelAgentError(message, ErrorCodes.INVALID_INPUT);
}

function toNumber(value: number | string | null | undefined): number {
  const n = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

// ---------- date selection ----------

/** Harsher on heat and cold than the weather server's ranking; never below 0. */
export function plannerDayScore(day: DayConditions): number {
  let score = 100;

  if (day.maxTemp > 35 || day.maxTemp < 5) score -= 30;
  else if (day.maxTemp > 30 || day.maxTemp < 10) score -= 15;

  if (day.minTemp < 0) score -= 20;
  else if (day.minTemp < 5) score -= 10;

  score -= day.precipSum * 10;
  score -= day.precipProb / 2;

  if (day.wind > 50) score -= 25;
  else if (day.wind > 30) score -= 10;

  if (day.weatherCode >= 95) score -= 30; // thunderstorm
  else if (day.weatherCode >= 71) score -= 25; // snow
  else if (day.weatherCode >= 61) score -= 20; // rain
  else if (day.weatherCode >= 51) score -= 10; // drizzle

  return Math.max(0, score);
}

/** Start of the highest-scoring run of `days` calendar-consecutive dates; null when none scores above 0. */
export function findBestConsecutiveDays(scored: ScoredDate[], days: number): Date[] | null {
  const sorted = [...scored].sort((a, b) => a.date.getTime() - b.date.getTime());
  let best: Date[] | null = null;
  let bestScore = 0;

  for (let i = 0; i + days <= sorted.length; i++) {
    const window = sorted.slice(i, i + days);
    const consecutive = window.every((d, j) => {
      const prev = window[j - 1];
      return !prev || diffDays(prev.date, d.date) === 1;
    });
    if (!consecutive) continue;

    const total = window.reduce((sum, d) => sum + d.score, 0);
    if (total > bestScore) {
      bestScore = total;
      best = window.map((d) => d.date);
    }
  }
  return best;
}

// ---------- formatting ----------

const TIME_ICONS: Record<TimeOfDay, string> = { morning: '🌅', afternoon: '☀️', evening: '🌙' };

function dateRange(dates: Date[]): string {
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (!first || !last) return '';
  const n = dates.length;
  return `${formatLongDate(first)} - ${formatLongDate(last)} (${n} ${n === 1 ? 'day' : 'days'})`;
}

function formatActivity(activity: Activity, weatherCondition?: string): string {
  let out = `  ${TIME_ICONS[activity.time]} ${activity.name}\n`;
  if (weatherCondition) out += `     Perfect for ${weatherCondition} weather\n`;
  out += `     Type: ${titleCase(activity.type)}\n`;
  out += `     Rating: ${activity.rating.toFixed(1)}/5.0\n`;
  if (!weatherCondition && activity.address) out += `     Address: ${activity.address}\n`;
  return out + '\n';
}

function formatActivities(plan: DayPlan, weatherCondition?: string): string {
  if (plan.activities.length === 0) return '  No activities planned for this day\n\n';
  return plan.activities.map((a) => formatActivity(a, weatherCondition)).join('');
}

export interface TripPlanView {
  location: string;
  dates: Date[];
  plans: DayPlan[];
  accommodation: AccommodationSuggestion | null;
  style: string;
  budget: string;
  dailyBudget: number;
}

export function formatTripPlan(view: TripPlanView): string {
  let out = `🎯 TRIP PLAN FOR ${view.location.toUpperCase()}\n`;
  out += `📅 Dates: ${dateRange(view.dates)}\n`;
  out += `🎨 Style: ${titleCase(view.style)}\n`;
  out += `💰 Budget: ${titleCase(view.budget)} ($${view.dailyBudget}/day)\n\n`;

  const stay = view.accommodation;
  if (stay) {
    out += '🏨 ACCOMMODATION:\n';
    out += `   ${stay.name}\n`;
    out += `   Check-in: ${stay.checkIn}\n`;
    out += `   Check-out: ${stay.checkOut}\n`;
    out += `   Duration: ${stay.nights} ${stay.nights === 1 ? 'night' : 'nights'}\n`;
    out += `   Price: ${stay.pricePerNight} ${stay.currency} per night (Total: ${stay.totalCost} ${stay.currency})\n\n`;
  }

  out += '📋 DAILY ITINERARY:\n\n';
  view.plans.forEach((plan, i) => {
    out += `Day ${i + 1} - ${plan.dayName}, ${plan.date}:\n`;
    out += formatActivities(plan);
  });

  const total = view.plans.reduce((sum, p) => sum + p.activities.length, 0);
  out += '💡 TRIP PLANNING NOTES:\n';
  out += `• Plan includes ${total} total activities\n`;
  out += `• Activities are optimized for ${view.style} travel style\n`;
  out += `• Budget considerations: ${view.budget} category (about $${view.dailyBudget} per day)\n`;
  out += '• Check weather conditions before departure\n';
  out += '• Book accommodations and activities in advance\n';
  return out;
}

export function formatWeatherTripPlan(
  location: string,
  dates: Date[],
  plans: DayPlan[],
  weatherCondition: string,
  style: string
): string {
  let out = `🌤️ WEATHER-OPTIMIZED TRIP PLAN FOR ${location.toUpperCase()}\n`;
  out += `📅 Dates: ${dateRange(dates)}\n`;
  out += `🌦️ Optimized for: ${titleCase(weatherCondition)} weather\n`;
  out += `🎨 Style: ${titleCase(style)}\n\n`;

  out += '📋 WEATHER-SPECIFIC ITINERARY:\n\n';
  plans.forEach((plan, i) => {
    out += `Day ${i + 1} - ${plan.dayName}, ${plan.date}:\n`;
    out += `☁️ Expected weather: ${weatherCondition}\n\n`;
    out += formatActivities(plan, weatherCondition);
  });

  out += '🌈 WEATHER PLANNING NOTES:\n';
  out += `• All activities optimized for ${weatherCondition} conditions\n`;
  out += '• Indoor alternatives available for weather changes\n';
  out += '• Check weather forecast 24-48 hours before activities\n';
  out += `• Pack appropriate clothing for ${weatherCondition} weather\n`;
  return out;
}

export function formatDailySuggestions(
  location: string,
  date: Date,
  plan: DayPlan,
  weatherCondition: string,
  style: string
): string {
  let out = `🗓️ ACTIVITY SUGGESTIONS FOR ${location.toUpperCase()}\n`;
  out += `📅 ${weekdayName(date)}, ${formatLongDate(date)}\n`;
  out += `🌦️ Weather: ${titleCase(weatherCondition)}\n`;
  out += `🎨 Style: ${titleCase(style)}\n\n`;
  return out + formatActivities(plan, weatherCondition);
}
