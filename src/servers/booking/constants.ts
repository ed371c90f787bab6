/** Booking.com Demand API constants */

export const BOOKING_API_BASE_URL = 'https://demandapi.booking.com/3.1';

export const ENDPOINTS = {
  search: '/accommodations/search',
  details: '/accommodations/details',
  reviews: '/accommodations/reviews',
} as const;

export const SEARCH_EXTRAS = ['extra_charges', 'products'] as const;

export const ACCOMMODATION_TYPES = {
  hotel: 204,
  apartment: 201,
  resort: 219,
  villa: 212,
  hostel: 203,
  bed_and_breakfast: 202,
  guesthouse: 216,
} as const;

export const DEFAULT_PLATFORM = 'desktop';
export const DEFAULT_COUNTRY = 'us';
export const DEFAULT_CURRENCY = 'USD';
export const DEFAULT_ADULTS = 2;
export const DEFAULT_ROOMS = 1;
export const DEFAULT_ROWS = 20;
export const MAX_ROWS = 100;
export const MIN_ROWS = 10;

// listings never show more than this many rows
export const MAX_LISTED = 10;
export const MAX_AMENITIES = 10;
export const MAX_PHOTOS = 5;
export const MAX_REVIEWS = 3;
export const REVIEW_EXCERPT_LENGTH = 200;

export const MAX_DAYS_IN_FUTURE = 500;
export const MAX_STAY_DURATION = 90;

export const MIN_PRICE = 0;
export const MAX_PRICE = 10000;
