/** Places service constants: Google Places nearby search, Photon for geocoding */

export const GOOGLE_PLACES_API_BASE_URL = 'https://maps.googleapis.com/maps/api/place';
export const PHOTON_API_BASE_URL = 'https://photon.komoot.io';

export const ENDPOINTS = {
  nearbySearch: '/nearbysearch/json',
  photonSearch: '/api',
  photonReverse: '/reverse',
} as const;

// Keys the tools accept, mapped to the Google type sent upstream.
export const PLACE_TYPES = {
  restaurant: 'restaurant',
  cafe: 'cafe',
  bakery: 'bakery',
  bar: 'bar',
  night_club: 'night_club',
  tourist_attraction: 'tourist_attraction',
  museum: 'museum',
  art_gallery: 'art_gallery',
  church: 'church',
  park: 'park',
  zoo: 'zoo',
  aquarium: 'aquarium',
  amusement_park: 'amusement_park',
  movie_theater: 'movie_theater',
  shopping_mall: 'shopping_mall',
  spa: 'spa',
  gym: 'gym',
  stadium: 'stadium',
  library: 'library',
  campground: 'campground',
  lodging: 'lodging',
  natural_feature: 'natural_feature',
  // planner vocabulary without a Google type of its own
  beach: 'natural_feature',
  market: 'supermarket',
  sport_center: 'gym',
  outdoor_activity: 'park',
  outdoor_dining: 'restaurant',
  rooftop_bar: 'bar',
  night_market: 'tourist_attraction',
  indoor_activity: 'bowling_alley',
  indoor_attraction: 'museum',
  indoor_entertainment: 'movie_theater',
  entertainment: 'movie_theater',
  shopping: 'shopping_mall',
} as const;

export type PlaceTypeKey = keyof typeof PLACE_TYPES;

export const PRICE_LEVELS = {
  free: 0,
  inexpensive: 1,
  moderate: 2,
  expensive: 3,
  very_expensive: 4,
} as const;

export const MAX_SEARCH_RADIUS = 50000;
export const DEFAULT_RADIUS = 5000;
export const DEFAULT_RESULTS_LIMIT = 20;
export const MIN_RESULTS_LIMIT = 1;
export const MAX_RESULTS_LIMIT = 60;
export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_GEOCODE_LIMIT = 5;

export const PER_TYPE_WEATHER = 3;
export const PER_TYPE_DISTANCE = 2;

export const WEATHER_PLACE_MAPPING: Record<string, readonly PlaceTypeKey[]> = {
  sunny: ['park', 'tourist_attraction', 'zoo', 'amusement_park'],
  rainy: ['museum', 'art_gallery', 'shopping_mall', 'movie_theater', 'aquarium'],
  cloudy: ['museum', 'tourist_attraction', 'art_gallery', 'cafe'],
  snowy: ['museum', 'shopping_mall', 'cafe', 'spa'],
  windy: ['museum', 'shopping_mall', 'cafe', 'restaurant'],
  hot: ['aquarium', 'museum', 'shopping_mall', 'spa'],
  cold: ['museum', 'cafe', 'shopping_mall', 'movie_theater'],
};

export const DISTANCE_CATEGORIES: Record<string, { radius: number; types: readonly PlaceTypeKey[] }> = {
  walking: { radius: 1000, types: ['cafe', 'restaurant', 'park', 'tourist_attraction'] },
  short_drive: { radius: 5000, types: ['museum', 'shopping_mall', 'art_gallery', 'restaurant'] },
  day_trip: { radius: 25000, types: ['tourist_attraction', 'amusement_park', 'zoo', 'park'] },
  extended: { radius: 50000, types: ['natural_feature', 'tourist_attraction', 'campground'] },
};
