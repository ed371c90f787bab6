import {
  BaseService,
  displayValue,
  formatErrorResponse,
  formatLocation,
  haversineKm,
  isKeyOf,
  requireApiKey,
  titleCase,
  validateCoordinates,
  type ServiceDeps,
} from '../base-service';
import {
  DEFAULT_GEOCODE_LIMIT,
  DEFAULT_LANGUAGE,
  DEFAULT_RADIUS,
  DEFAULT_RESULTS_LIMIT,
  DISTANCE_CATEGORIES,
  ENDPOINTS,
  GOOGLE_PLACES_API_BASE_URL,
  MAX_RESULTS_LIMIT,
  MAX_SEARCH_RADIUS,
  MIN_RESULTS_LIMIT,
  PER_TYPE_DISTANCE,
  PER_TYPE_WEATHER,
  PHOTON_API_BASE_URL,
  PLACE_TYPES,
  PRICE_LEVELS,
  WEATHER_PLACE_MAPPING,
  type PlaceTypeKey,
} from './constants';
import {
  NearbySearchResponseSchema,
  PhotonResponseSchema,
  type GeocodedPlace,
  type PhotonResponse,
  type Place,
  type RecommendedPlace,
} from './schemas';
import {
  ErrorCodes,
  TravelAgentError,
  errorMessage,
  type Coordinates,
  type LocationInput,
} from '../../types/types';

export interface PlaceSearch {
  placeType?: string;
  radius?: number;
  limit?: number;
  minRating?: number;
  priceLevel?: string;
}

const SERVICE_NAME = 'Google Places API';

export class PlacesService extends BaseService {
  constructor(
    private readonly apiKey: string | undefined,
    deps: ServiceDeps = {}
  ) {
    super('places', deps);
  }

  async searchPlaces(location: LocationInput, search: PlaceSearch = {}): Promise<string> {
    const places = await this.searchPlacesData(location, search);
    return formatPlacesResults(formatLocation(location), places, search.placeType);
  }

  /** Nearby places filtered by rating and cut to the limit; the trip planner builds days from these. */
  async searchPlacesData(location: LocationInput, search: PlaceSearch = {}): Promise<Place[]> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    assertValid(validatePlaceSearch(search));
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${formatLocation(location)}`);

    const radius = search.radius ?? DEFAULT_RADIUS;
    const params: Record<string, unknown> = {
      location: `${coords.latitude},${coords.longitude}`,
      radius: Math.min(radius, MAX_SEARCH_RADIUS),
    };
    if (search.placeType && isKeyOf(PLACE_TYPES, search.placeType)) {
      params.type = PLACE_TYPES[search.placeType];
    }
    if (search.priceLevel && isKeyOf(PRICE_LEVELS, search.priceLevel)) {
      params.minprice = 0;
      params.maxprice = PRICE_LEVELS[search.priceLevel];
    }

    let places: Place[];
    try {
      places = await this.nearby(apiKey, params);
    } catch (err) {
      throw new TravelAgentError(formatErrorResponse(errorMessage(err), 'places search'), ErrorCodes.EXTERNAL_API_ERROR);
    }

    const { minRating } = search;
    if (minRating !== undefined) {
      places = places.filter((p) => (p.rating ?? 0) >= minRating);
    }
    return places.slice(0, search.limit ?? DEFAULT_RESULTS_LIMIT);
  }

  async recommendPlacesByWeather(
    location: LocationInput,
    weatherCondition: string,
    maxDistance = DEFAULT_RADIUS,
    limit = DEFAULT_RESULTS_LIMIT
  ): Promise<string> {
    const recommendations = await this.recommendPlacesByWeatherData(location, weatherCondition, maxDistance, limit);
    return formatWeatherRecommendations(formatLocation(location), recommendations, weatherCondition);
  }

  async recommendPlacesByWeatherData(
    location: LocationInput,
    weatherCondition: string,
    maxDistance = DEFAULT_RADIUS,
    limit = DEFAULT_RESULTS_LIMIT
  ): Promise<RecommendedPlace[]> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    const condition = weatherCondition.toLowerCase();
    if (!isKeyOf(WEATHER_PLACE_MAPPING, condition)) {
      throw new TravelAgentError(
        `Weather condition '${weatherCondition}' not supported. Available: ${Object.keys(WEATHER_PLACE_MAPPING).join(', ')}`,
        ErrorCodes.INVALID_INPUT
      );
    }
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${formatLocation(location)}`);

    const found = await this.collectByType(apiKey, coords, WEATHER_PLACE_MAPPING[condition], maxDistance, PER_TYPE_WEATHER);
    return byRating(found).slice(0, limit);
  }

  async recommendPlacesByDistance(
    location: LocationInput,
    travelMode = 'walking',
    limit = DEFAULT_RESULTS_LIMIT
  ): Promise<string> {
    const recommendations = await this.recommendPlacesByDistanceData(location, travelMode, limit);
    return formatDistanceRecommendations(formatLocation(location), recommendations, travelMode);
  }

  async recommendPlacesByDistanceData(
    location: LocationInput,
    travelMode = 'walking',
    limit = DEFAULT_RESULTS_LIMIT
  ): Promise<RecommendedPlace[]> {
    const apiKey = requireApiKey(this.apiKey, SERVICE_NAME);
    if (!isKeyOf(DISTANCE_CATEGORIES, travelMode)) {
      throw new TravelAgentError(
        `Travel mode '${travelMode}' not supported. Available: ${Object.keys(DISTANCE_CATEGORIES).join(', ')}`,
        ErrorCodes.INVALID_INPUT
      );
    }
    const coords = await this.resolveLocation(location, `Could not find coordinates for ${formatLocation(location)}`);
    const { radius, types } = DISTANCE_CATEGORIES[travelMode];

    const found = await this.collectByType(apiKey, coords, types, radius, PER_TYPE_DISTANCE);
    const withDistance = found.map((place) => {
      const at = place.geometry?.location;
      const target: Coordinates = at ? { latitude: at.lat, longitude: at.lng } : coords;
      return { ...place, distanceKm: roundKm(haversineKm(coords, target)) };
    });
    return byRating(withDistance).slice(0, limit);
  }

  async geocodeLocation(
    location: string,
    language = DEFAULT_LANGUAGE,
    limit = DEFAULT_GEOCODE_LIMIT
  ): Promise<string> {
    const features = await this.geocodeLocationData(location, language, limit);
    return formatGeocodeResults(location, features);
  }

  async geocodeLocationData(
    location: string,
    language = DEFAULT_LANGUAGE,
    limit = DEFAULT_GEOCODE_LIMIT
  ): Promise<GeocodedPlace[]> {
    let data: PhotonResponse;
    try {
      data = await this.requestJson(`${PHOTON_API_BASE_URL}${ENDPOINTS.photonSearch}`, PhotonResponseSchema, {
        params: { q: location, limit, lang: language },
      });
    } catch (err) {
      throw new TravelAgentError(`Error geocoding location: ${errorMessage(err)}`, ErrorCodes.EXTERNAL_API_ERROR);
    }
    if (data.type !== 'FeatureCollection') {
      throw new TravelAgentError('Invalid response format from geocoding service', ErrorCodes.EXTERNAL_API_ERROR);
    }
    return data.features;
  }

  async reverseGeocode(latitude: number, longitude: number, language = DEFAULT_LANGUAGE): Promise<string> {
    if (!validateCoordinates(latitude, longitude)) {
      throw new TravelAgentError(
        `Invalid coordinates (${latitude}, ${longitude}). Latitude must be between -90 and 90, longitude between -180 and 180`,
        ErrorCodes.INVALID_INPUT
      );
    }

    let data: PhotonResponse;
    try {
      data = await this.requestJson(`${PHOTON_API_BASE_URL}${ENDPOINTS.photonReverse}`, PhotonResponseSchema, {
        params: { lat: latitude, lon: longitude, lang: language },
      });
    } catch (err) {
      throw new TravelAgentError(`Error reverse geocoding: ${errorMessage(err)}`, ErrorCodes.EXTERNAL_API_ERROR);
    }
    if (data.type !== 'FeatureCollection') {
      throw new TravelAgentError('Invalid response format from reverse geocoding service', ErrorCodes.EXTERNAL_API_ERROR);
    }

    const [place] = data.features;
    if (!place) {
      throw new TravelAgentError(`No place found at coordinates (${latitude}, ${longitude})`, ErrorCodes.NOT_FOUND);
    }
    return formatReverseGeocode(latitude, longitude, place);
  }

  private async nearby(apiKey: string, params: Record<string, unknown>): Promise<Place[]> {
    const data = await this.requestJson(
      `${GOOGLE_PLACES_API_BASE_URL}${ENDPOINTS.nearbySearch}`,
      NearbySearchResponseSchema,
      { params: { ...params, key: apiKey, language: DEFAULT_LANGUAGE } }
    );
    if (data.status && data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
      const detail = data.error_message ? ` - ${data.error_message}` : '';
      throw new TravelAgentError(`Google Places API error: ${data.status}${detail}`, ErrorCodes.EXTERNAL_API_ERROR);
    }
    return data.results;
  }

  // One nearby search per type; a type that fails is skipped.
  private async collectByType(
    apiKey: string,
    coords: Coordinates,
    types: readonly PlaceTypeKey[],
    radius: number,
    perType: number
  ): Promise<RecommendedPlace[]> {
    const found: RecommendedPlace[] = [];
    for (const category of types) {
      try {
        const places = await this.nearby(apiKey, {
          location: `${coords.latitude},${coords.longitude}`,
          radius,
          type: PLACE_TYPES[category],
        });
        found.push(...places.slice(0, perType).map((place) => ({ ...place, category })));
      } catch (err) {
        this.log.warn(`skipping ${category}: ${errorMessage(err)}`);
      }
    }
    return found;
  }
}

// ---------- validation ----------

export function validatePlaceSearch(search: PlaceSearch): string | null {
  const { placeType, radius = DEFAULT_RADIUS, limit = DEFAULT_RESULTS_LIMIT, minRating, priceLevel } = search;

  if (placeType && !isKeyOf(PLACE_TYPES, placeType)) {
    return `Invalid place type '${placeType}'. Available types: ${Object.keys(PLACE_TYPES).join(', ')}`;
  }
  if (radius < 0 || radius > MAX_SEARCH_RADIUS) {
    return `Radius must be between 0 and ${MAX_SEARCH_RADIUS} meters`;
  }
  if (limit < MIN_RESULTS_LIMIT || limit > MAX_RESULTS_LIMIT) {
    return `Limit must be between ${MIN_RESULTS_LIMIT} and ${MAX_RESULTS_LIMIT}`;
  }
  if (minRating !== undefined && (minRating < 0 || minRating > 5)) {
    return 'Minimum rating must be between 0 and 5';
  }
  if (priceLevel && !isKeyOf(PRICE_LEVELS, priceLevel)) {
    return `Invalid price level '${priceLevel}'. Available levels: ${Object.keys(PRICE_LEVELS).join(', ')}`;
  }
  return null;
}

function assertValid(problem: string | null): void {
  if (problem) throw new TravelAgentError(problem, ErrorCodes.INVALID_INPUT);
}

// highest rated first; equal ratings keep search order
function byRating<T extends Place>(places: T[]): T[] {
  return [...places].sort((a, b) => (b.rating ?? 0) - (a.rating ?? 0));
}

function roundKm(km: number): number {
  return Math.round(km * 100) / 100;
}

// ---------- formatting ----------

export function formatPlacesResults(location: string, places: Place[], placeType?: string): string {
  const typeFilter = placeType ? ` (${placeType})` : '';
  if (places.length === 0) {
    return `No places found for ${location}${typeFilter}`;
  }

  let result = `Places search results for ${location}${typeFilter}:\n\n`;
  places.forEach((place, i) => {
    result += `${i + 1}. ${displayValue(place.name)}\n`;
    result += `   Rating: ${displayValue(place.rating)}/5.0\n`;
    result += `   Price Level: ${displayValue(place.price_level)}/4\n`;
    result += `   Address: ${displayValue(place.vicinity)}\n`;
    result += `   Types: ${place.types.slice(0, 3).join(', ')}\n`;
    result += `   Place ID: ${displayValue(place.place_id)}\n\n`;
  });
  return result;
}

function groupedByCategory(
  header: string,
  recommendations: RecommendedPlace[],
  line: (place: RecommendedPlace, n: number) => string
): string {
  const groups = new Map<string, RecommendedPlace[]>();
  for (const rec of recommendations) {
    const group = groups.get(rec.category) ?? [];
    group.push(rec);
    groups.set(rec.category, group);
  }

  const sections = [...groups].map(
    ([category, places]) => `📍 ${titleCase(category)}:\n` + places.map((p, i) => line(p, i + 1)).join('')
  );
  return header + sections.join('\n');
}

export function formatWeatherRecommendations(
  location: string,
  recommendations: RecommendedPlace[],
  weatherCondition: string
): string {
  if (recommendations.length === 0) {
    return `No places found for ${weatherCondition} weather in ${location}`;
  }
  return groupedByCategory(
    `Places recommended for ${weatherCondition} weather in ${location}:\n\n`,
    recommendations,
    (p, n) => `  ${n}. ${displayValue(p.name)} (Rating: ${displayValue(p.rating)}/5.0)\n     ${displayValue(p.vicinity)}\n`
  );
}

export function formatDistanceRecommendations(
  location: string,
  recommendations: RecommendedPlace[],
  travelMode: string
): string {
  const mode = titleCase(travelMode);
  if (recommendations.length === 0) {
    return `No places found for ${mode} from ${location}`;
  }
  return groupedByCategory(
    `Places recommended for ${mode} from ${location}:\n\n`,
    recommendations,
    (p, n) =>
      `  ${n}. ${displayValue(p.name)} (Rating: ${displayValue(p.rating)}/5.0, Distance: ${displayValue(p.distanceKm)}km)\n` +
      `     ${displayValue(p.vicinity)}\n`
  );
}

function addressOf(place: GeocodedPlace): string {
  const { street, housenumber, city, postcode, country } = place.properties;
  const streetLine = [street, housenumber].filter(Boolean).join(' ');
  const parts = [streetLine, city, postcode, country].filter(Boolean);
  return parts.length ? parts.join(', ') : 'N/A';
}

function featureLines(place: GeocodedPlace, indent: string): string {
  const [lng, lat] = place.geometry.coordinates;
  return (
    `${indent}Address: ${addressOf(place)}\n` +
    `${indent}Coordinates: ${lat.toFixed(4)}, ${lng.toFixed(4)}\n` +
    `${indent}OSM ID: ${displayValue(place.properties.osm_id)}\n`
  );
}

export function formatGeocodeResults(location: string, places: GeocodedPlace[]): string {
  if (places.length === 0) {
    return `No locations found for ${location}`;
  }
  let result = `Geocoding results for ${location}:\n\n`;
  places.forEach((place, i) => {
    result += `${i + 1}. ${displayValue(place.properties.name)}\n${featureLines(place, '   ')}\n`;
  });
  return result;
}

export function formatReverseGeocode(latitude: number, longitude: number, place: GeocodedPlace): string {
  return (
    `Place at coordinates (${latitude}, ${longitude}):\n\n` +
    `Name: ${displayValue(place.properties.name)}\n` +
    featureLines(place, '')
  );
}
