import type { z } from 'zod';
import {
  BaseService,
  displayValue,
  formatLocation,
  isKeyOf,
  requireApiKey,
  type ServiceDeps,
} from '../base-service';
import {
  ACCOMMODATION_TYPES,
  BOOKING_API_BASE_URL,
  DEFAULT_ADULTS,
  DEFAULT_COUNTRY,
  DEFAULT_CURRENCY,
  DEFAULT_PLATFORM,
  DEFAULT_ROOMS,
  DEFAULT_ROWS,
  ENDPOINTS,
  MAX_AMENITIES,
  MAX_DAYS_IN_FUTURE,
  MAX_LISTED,
  MAX_PHOTOS,
  MAX_PRICE,
  MAX_REVIEWS,
  MAX_ROWS,
  MAX_STAY_DURATION,
  MIN_PRICE,
  MIN_ROWS,
  REVIEW_EXCERPT_LENGTH,
  SEARCH_EXTRAS,
} from './constants';
import {
  DetailsResponseSchema,
  ReviewsResponseSchema,
  SearchResponseSchema,
  type Accommodation,
  type DetailsResponse,
  type ReviewsResponse,
  type SearchResponse,
} from './schemas';
import { diffDays, parseIsoDate } from '../../utils/dates';
import { ErrorCodes, TravelAgentError, errorMessage, type LocationInput } from '../../types/types';

export interface StaySearch {
  checkin: string;
  checkout: string;
  adults?: number;
  rooms?: number;
  rows?: number;
}

export interface StayFilters {
  starRating?: number;
  priceMin?: number;
  priceMax?: number;
  accommodationType?: string;
}

const SERVICE_NAME = 'Booking.com';

export class BookingService extends BaseService {
  constructor(
    private readonly apiKey: string | undefined,
    deps: ServiceDeps = {}
  ) {
    super('booking', deps);
  }

  async searchAccommodations(location: LocationInput, stay: StaySearch): Promise<string> {
    const data = await this.searchAccommodationsData(location, stay);
    return formatSearchResults(formatLocation(location), data);
  }

  /** Raw search results; the trip planner picks its lodging from these. */
  async searchAccommodationsData(location: LocationInput, stay: StaySearch): Promise<SearchResponse> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    assertValid(validateStayDates(stay.checkin, stay.checkout, this.today()));
    return this.search(apiKey, location, stay, {});
  }

  async searchSpecificAccommodations(
    location: LocationInput,
    stay: StaySearch,
    filters: StayFilters
  ): Promise<string> {
    const data = await this.searchSpecificAccommodationsData(location, stay, filters);
    return formatSpecificSearchResults(formatLocation(location), data, filters);
  }

  async searchSpecificAccommodationsData(
    location: LocationInput,
    stay: StaySearch,
    filters: StayFilters
  ): Promise<SearchResponse> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    assertValid(validateStayDates(stay.checkin, stay.checkout, this.today()));
    assertValid(validateStayFilters(filters));
    return this.search(apiKey, location, stay, filters);
  }

  async getAccommodationDetails(hotelId: string): Promise<string> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    const params = {
      hotel_id: hotelId,
      platform: DEFAULT_PLATFORM,
      country: DEFAULT_COUNTRY,
      currency: DEFAULT_CURRENCY,
    };

    let details: DetailsResponse;
    try {
      details = await this.post(apiKey, ENDPOINTS.details, params, DetailsResponseSchema);
    } catch (err) {
      throw upstreamError('Error fetching accommodation details', err);
    }

    // details are returned even when reviews fail
    let reviews: ReviewsResponse | undefined;
    try {
      reviews = await this.post(apiKey, ENDPOINTS.reviews, params, ReviewsResponseSchema);
    } catch (err) {
      this.log.warn(`reviews unavailable for ${hotelId}: ${errorMessage(err)}`);
    }

    return formatAccommodationDetails(details, reviews);
  }

  private async search(
    apiKey: string,
    location: LocationInput,
    stay: StaySearch,
    filters: StayFilters
  ): Promise<SearchResponse> {
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${formatLocation(location)}`);

    const params: Record<string, unknown> = {
      latitude: coords.latitude,
      longitude: coords.longitude,
      checkin: stay.checkin,
      checkout: stay.checkout,
      adults: stay.adults ?? DEFAULT_ADULTS,
      rooms: stay.rooms ?? DEFAULT_ROOMS,
      rows: clampRows(stay.rows ?? DEFAULT_ROWS),
      extras: SEARCH_EXTRAS.join(','),
      platform: DEFAULT_PLATFORM,
      country: DEFAULT_COUNTRY,
      currency: DEFAULT_CURRENCY,
    };
    if (filters.starRating) params.star_rating = filters.starRating;
    if (filters.priceMin) params.price_min = filters.priceMin;
    if (filters.priceMax) params.price_max = filters.priceMax;
    const typeId = filters.accommodationType ? accommodationTypeId(filters.accommodationType) : undefined;
    if (typeId !== undefined) params.accommodation_type = typeId;

    try {
      return await this.post(apiKey, ENDPOINTS.search, params, SearchResponseSchema);
    } catch (err) {
      throw upstreamError('Error searching accommodations', err);
    }
  }

  private post<T>(
    apiKey: string,
    endpoint: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    return this.requestJson(`${BOOKING_API_BASE_URL}${endpoint}`, schema, {
      method: 'POST',
      params,
      headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
    });
  }
}

// ---------- validation ----------

export function validateStayDates(checkin: string, checkout: string, today: Date): string | null {
  const checkinDate = parseIsoDate(checkin);
  const checkoutDate = parseIsoDate(checkout);
  if (!checkinDate || !checkoutDate) {
    return 'Invalid date format. Please use YYYY-MM-DD format';
  }
  if (checkinDate < today) {
    return 'Check-in date cannot be in the past';
  }
  if (checkoutDate <= checkinDate) {
    return 'Checkout date must be after check-in date';
  }
  if (diffDays(today, checkinDate) > MAX_DAYS_IN_FUTURE) {
    return `Check-in date cannot be more than ${MAX_DAYS_IN_FUTURE} days in the future`;
  }
  if (diffDays(checkinDate, checkoutDate) > MAX_STAY_DURATION) {
    return `Stay duration cannot exceed ${MAX_STAY_DURATION} days`;
  }
  return null;
}

export function validateStayFilters(filters: StayFilters): string | null {
  const { starRating, priceMin, priceMax, accommodationType } = filters;

  if (starRating !== undefined && (starRating < 1 || starRating > 5)) {
    return 'Star rating must be between 1 and 5';
  }
  if (priceMin !== undefined && (priceMin < MIN_PRICE || priceMin > MAX_PRICE)) {
    return `Minimum price must be between ${MIN_PRICE} and ${MAX_PRICE}`;
  }
  if (priceMax !== undefined && (priceMax < MIN_PRICE || priceMax > MAX_PRICE)) {
    return `Maximum price must be between ${MIN_PRICE} and ${MAX_PRICE}`;
  }
  if (priceMin !== undefined && priceMax !== undefined && priceMin >= priceMax) {
    return 'Minimum price must be less than maximum price';
  }
  if (accommodationType !== undefined && accommodationTypeId(accommodationType) === undefined) {
    return `Invalid accommodation type. Available types: ${Object.keys(ACCOMMODATION_TYPES).join(', ')}`;
  }
  return null;
}

export function accommodationTypeId(name: string): number | undefined {
  const key = name.toLowerCase();
  return isKeyOf(ACCOMMODATION_TYPES, key) ? ACCOMMODATION_TYPES[key] : undefined;
}

export function clampRows(rows: number): number {
  return Math.min(Math.max(rows, MIN_ROWS), MAX_ROWS);
}

function assertValid(problem: string | null): void {
  if (problem) throw new TravelAgentError(problem, ErrorCodes.INVALID_INPUT);
}

function upstreamError(prefix: string, err: unknown): TravelAgentError {
  const details = err instanceof TravelAgentError ? err.details : undefined;
  return new TravelAgentError(`${prefix}: ${errorMessage(err)}`, ErrorCodes.EXTERNAL_API_ERROR, details);
}

// ---------- formatting ----------

function formatListing(header: string, data: SearchResponse, renderType: boolean): string {
  let result = header;

  data.results.slice(0, MAX_LISTED).forEach((stay, i) => {
    result += `${i + 1}. ${displayValue(stay.name)}\n`;
    if (renderType) result += `   Type: ${displayValue(stay.accommodation_type_name)}\n`;
    result += `   Star Rating: ${displayValue(stay.star_rating)} stars\n`;
    result += `   Price: ${priceOf(stay)} per night\n`;
    result += `   Hotel ID: ${displayValue(stay.hotel_id)}\n\n`;
  });

  const total = data.total_results ?? data.results.length;
  if (total > MAX_LISTED) {
    result += `... and ${total - MAX_LISTED} more results\n`;
  }
  return result;
}

function priceOf(stay: Accommodation): string {
  return `${displayValue(stay.price?.amount)} ${stay.price?.currency ?? ''}`;
}

export function formatSearchResults(location: string, data: SearchResponse): string {
  if (data.results.length === 0) {
    return `No accommodations found for ${location}`;
  }
  return formatListing(`Accommodation search results for ${location}:\n\n`, data, false);
}

export function formatSpecificSearchResults(location: string, data: SearchResponse, filters: StayFilters): string {
  if (data.results.length === 0) {
    return `No accommodations found for ${location} with the specified criteria`;
  }

  const applied: string[] = [];
  if (filters.starRating) applied.push(`${filters.starRating} stars`);
  if (filters.priceMin) applied.push(`min price: $${filters.priceMin}`);
  if (filters.priceMax) applied.push(`max price: $${filters.priceMax}`);
  if (filters.accommodationType) applied.push(`type: ${filters.accommodationType}`);
  const filterText = applied.length ? ` (filters: ${applied.join(', ')})` : '';

  return formatListing(`Specific accommodation search results for ${location}${filterText}:\n\n`, data, true);
}

export function formatAccommodationDetails(details: DetailsResponse, reviews?: ReviewsResponse): string {
  const stay = details.result;
  if (!stay) return 'No accommodation details found';

  let result = 'Accommodation Details:\n\n';
  result += `Name: ${displayValue(stay.name)}\n`;
  result += `Star Rating: ${displayValue(stay.star_rating)} stars\n`;
  result += `Type: ${displayValue(stay.accommodation_type_name)}\n`;

  if (stay.address) {
    const { address_line_1, city, country } = stay.address;
    result += `Address: ${address_line_1 ?? ''}, ${city ?? ''}, ${country ?? ''}\n`;
  }
  if (stay.contact?.phone) {
    result += `Phone: ${stay.contact.phone}\n`;
  }
  if (stay.description?.short_description) {
    result += `Description: ${stay.description.short_description}\n`;
  }
  if (stay.amenities.length) {
    result += `Amenities: ${stay.amenities
      .slice(0, MAX_AMENITIES)
      .map((a) => a.name ?? '')
      .join(', ')}\n`;
  }
  if (stay.photos.length) {
    result += `Photos: ${stay.photos.length} photos available\n`;
    result += 'Photo URLs:\n';
    stay.photos.slice(0, MAX_PHOTOS).forEach((photo, i) => {
      if (photo.url_original) result += `  ${i + 1}. ${photo.url_original}\n`;
    });
  }
  if (stay.url) {
    result += `Booking URL: ${stay.url}\n`;
  }

  const summary = reviews?.result;
  if (summary) {
    if (summary.average_score && summary.review_count) {
      result += `Reviews: ${summary.average_score}/10 based on ${summary.review_count} reviews\n`;
    }
    if (summary.reviews.length) {
      result += 'Recent Reviews:\n';
      summary.reviews.slice(0, MAX_REVIEWS).forEach((review, i) => {
        const comment = (review.positive ?? '').slice(0, REVIEW_EXCERPT_LENGTH);
        if (comment) result += `  ${i + 1}. Score: ${displayValue(review.score)}/10 - ${comment}...\n`;
      });
    }
  }

  return result;
}
