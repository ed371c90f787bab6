/** Trip planner constants */

import type { PlaceTypeKey } from '../places/constants';
import type { TimeOfDay } from '../../types/types';

export const TRIP_DURATIONS = {
  weekend: 2,
  short: 3,
  week: 7,
  extended: 14,
  month: 30,
} as const;

export const DEFAULT_TRIP_DURATION = 3;
export const MIN_TRIP_DURATION = 1;
export const MAX_TRIP_DURATION = 30;

export interface TripStyle {
  activitiesPerDay: number;
  travelRadius: number; // meters
  preferredTypes: readonly PlaceTypeKey[];
}

export const TRIP_STYLES: Record<string, TripStyle> = {
  relaxed: {
    activitiesPerDay: 2,
    travelRadius: 10000,
    preferredTypes: ['restaurant', 'cafe', 'park', 'museum', 'spa'],
  },
  balanced: {
    activitiesPerDay: 3,
    travelRadius: 15000,
    preferredTypes: ['tourist_attraction', 'restaurant', 'museum', 'park', 'shopping_mall'],
  },
  adventure: {
    activitiesPerDay: 4,
    travelRadius: 25000,
    preferredTypes: ['tourist_attraction', 'amusement_park', 'zoo', 'park', 'sport_center'],
  },
  cultural: {
    activitiesPerDay: 3,
    travelRadius: 20000,
    preferredTypes: ['museum', 'art_gallery', 'church', 'tourist_attraction', 'restaurant'],
  },
  food_focused: {
    activitiesPerDay: 4,
    travelRadius: 15000,
    preferredTypes: ['restaurant', 'cafe', 'bakery', 'bar', 'market'],
  },
};

export const WEATHER_ACTIVITY_MAPPING: Record<string, Record<TimeOfDay, readonly PlaceTypeKey[]>> = {
  clear: {
    morning: ['park', 'tourist_attraction', 'zoo'],
    afternoon: ['amusement_park', 'tourist_attraction', 'park'],
    evening: ['restaurant', 'bar', 'night_market'],
  },
  sunny: {
    morning: ['park', 'tourist_attraction', 'beach'],
    afternoon: ['zoo', 'amusement_park', 'outdoor_activity'],
    evening: ['restaurant', 'rooftop_bar', 'outdoor_dining'],
  },
  partly_cloudy: {
    morning: ['museum', 'tourist_attraction', 'park'],
    afternoon: ['shopping_mall', 'tourist_attraction', 'cafe'],
    evening: ['restaurant', 'movie_theater', 'bar'],
  },
  cloudy: {
    morning: ['museum', 'art_gallery', 'shopping_mall'],
    afternoon: ['tourist_attraction', 'cafe', 'indoor_activity'],
    evening: ['restaurant', 'bar', 'entertainment'],
  },
  overcast: {
    morning: ['museum', 'shopping_mall', 'art_gallery'],
    afternoon: ['cafe', 'indoor_attraction', 'shopping'],
    evening: ['restaurant', 'movie_theater', 'indoor_entertainment'],
  },
  rainy: {
    morning: ['museum', 'shopping_mall', 'art_gallery'],
    afternoon: ['movie_theater', 'aquarium', 'indoor_activity'],
    evening: ['restaurant', 'bar', 'spa'],
  },
  snowy: {
    morning: ['museum', 'shopping_mall', 'indoor_attraction'],
    afternoon: ['cafe', 'art_gallery', 'indoor_activity'],
    evening: ['restaurant', 'bar', 'indoor_entertainment'],
  },
};

export const BUDGET_CATEGORIES: Record<string, { dailyBudget: number }> = {
  budget: { dailyBudget: 50 },
  mid_range: { dailyBudget: 150 },
  luxury: { dailyBudget: 500 },
};

export const DEFAULT_TRIP_STYLE = 'balanced';
export const DEFAULT_BUDGET = 'mid_range';

// morning slot only takes one of these
export const MORNING_TYPES: readonly PlaceTypeKey[] = ['cafe', 'museum', 'park', 'tourist_attraction'];
export const MAX_AFTERNOON_ACTIVITIES = 2;
export const EVENING_TYPE: PlaceTypeKey = 'restaurant';

export const FORECAST_WINDOW_DAYS = 14;
export const WEATHER_TRIP_LEAD_DAYS = 2;

export const ACTIVITY_SEARCH_LIMIT = 5;
export const MIN_ACTIVITY_RATING = 3.5;
export const ACCOMMODATION_ROWS = 5;

export const ERROR_MESSAGES = {
  invalidDates: 'Invalid date format or date range',
  locationNotFound: 'Could not find the specified location',
  invalidDuration: `Invalid duration. Use number of days (${MIN_TRIP_DURATION}-${MAX_TRIP_DURATION}) or preset (${Object.keys(
    TRIP_DURATIONS
  ).join(', ')})`,
} as const;
