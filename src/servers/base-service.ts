/**
 * Common plumbing for the upstream-API services: geocoding, JSON requests
 * and the small formatting helpers every tool reply shares.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import {
  DEFAULT_TIMEOUT,
  EARTH_RADIUS_KM,
  GEOCODING_API_URL,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from './constants';
import { createHttpClient } from './http';
import { createLogger, type Logger } from '../utils/logger';
import { startOfUtcDay } from '../utils/dates';
import {
  ErrorCodes,
  TravelAgentError,
  errorMessage,
  isCoordinates,
  type Coordinates,
  type LocationInput,
} from '../types/types';

export const GeocodingResponseSchema = z.object({
  results: z
    .array(
      z.object({
        latitude: z.number(),
        longitude: z.number(),
        name: z.string().optional(),
        country: z.string().optional(),
      })
    )
    .optional(),
});

export interface RequestOptions {
  /** Query string for GET, JSON body for POST. */
  params?: Record<string, unknown>;
  headers?: Record<string, string>;
  method?: string;
}

export interface ServiceDeps {
  http?: AxiosInstance;
  now?: () => Date;
  logger?: Logger;
}

export abstract class BaseService {
  protected readonly http: AxiosInstance;
  protected readonly now: () => Date;
  protected readonly log: Logger;

  constructor(scope: string, deps: ServiceDeps = {}) {
    this.http = deps.http ?? createHttpClient();
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createLogger(scope);
  }

  protected today(): Date {
    return startOfUtcDay(this.now());
  }

  /** Top Open-Meteo geocoding hit for a place name, or null when nothing matches. */
  async getCoordinates(location: string): Promise<Coordinates | null> {
    try {
      const data = await this.requestJson(GEOCODING_API_URL, GeocodingResponseSchema, {
        params: { name: location, count: 1, language: 'en', format: 'json' },
      });
      const first = data.results?.[0];
      return first ? { latitude: first.latitude, longitude: first.longitude } : null;
    } catch (err) {
      this.log.warn(`Error in geocoding: ${errorMessage(err)}`);
      return null;
    }
  }

  protected async resolveLocation(location: LocationInput, notFoundMessage: string): Promise<Coordinates> {
    if (isCoordinates(location)) return location;
    const coords = await this.getCoordinates(location);
    if (!coords) {
      throw new TravelAgentError(notFoundMessage, ErrorCodes.LOCATION_NOT_FOUND, { location });
    }
    return coords;
  }

  async requestJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const method = (options.method ?? 'GET').toUpperCase();
    if (method !== 'GET' && method !== 'POST') {
      throw new TravelAgentError(`Unsupported HTTP method: ${options.method}`, ErrorCodes.INVALID_INPUT);
    }

    let response: AxiosResponse<unknown>;
    try {
      response =
        method === 'GET'
          ? await this.http.get<unknown>(url, {
              params: options.params,
              headers: options.headers,
              timeout: DEFAULT_TIMEOUT * 1000,
            })
          : await this.http.post<unknown>(url, options.params ?? {}, {
              headers: options.headers,
              timeout: DEFAULT_TIMEOUT * 1000,
            });
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        throw new TravelAgentError(`HTTP error ${err.response.status}`, ErrorCodes.EXTERNAL_API_ERROR, {
          url,
          status: err.response.status,
        });
      }
      throw new TravelAgentError(`Unexpected error: ${errorMessage(err)}`, ErrorCodes.EXTERNAL_API_ERROR, { url });
    }

    if (response.status !== 200) {
      throw new TravelAgentError(`HTTP error ${response.status}`, ErrorCodes.EXTERNAL_API_ERROR, {
        url,
        status: response.status,
      });
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      this.log.debug('response failed validation', parsed.error.issues);
      throw new TravelAgentError('Unexpected error: malformed response', ErrorCodes.EXTERNAL_API_ERROR, { url });
    }
    return parsed.data;
  }
}

// ---------- helpers ----------

const LAT_LNG = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

/** "48.85, 2.35" becomes coordinates; anything else stays a place name. */
export function parseLocationInput(raw: string): LocationInput {
  const m = LAT_LNG.exec(raw);
  if (!m) return raw;
  return { latitude: Number(m[1]), longitude: Number(m[2]) };
}

export function formatLocation(location: LocationInput): string {
  if (isCoordinates(location)) {
    return `coordinates (${location.latitude.toFixed(4)}, ${location.longitude.toFixed(4)})`;
  }
  return location;
}

export function validateCoordinates(lat: number | null | undefined, lng: number | null | undefined): boolean {
  if (lat == null || lng == null) return false;
  return lat >= MIN_LATITUDE && lat <= MAX_LATITUDE && lng >= MIN_LONGITUDE && lng <= MAX_LONGITUDE;
}

export function formatErrorResponse(message: string, context = ''): string {
  return context ? `Error in ${context}: ${message}` : `Error: ${message}`;
}

export function checkApiKeyRequired(apiKey: string | undefined, serviceName: string): string | null {
  if (!apiKey) {
    return `API key is required for ${serviceName} operations. Please configure your ${serviceName} API key.`;
  }
  return null;
}

export function requireApiKey(apiKey: string | undefined, serviceName: string): string {
  const missing = checkApiKeyRequired(apiKey, serviceName);
  if (missing || !apiKey) {
    throw new TravelAgentError(missing ?? serviceName, ErrorCodes.MISSING_API_KEY, { service: serviceName });
  }
  return apiKey;
}

export function haversineKm(a: Coordinates, b: Coordinates): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.latitude - a.latitude);
  const dLng = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.asin(Math.sqrt(h));
}

export function isKeyOf<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.hasOwn(table, key);
}

/** Title-cases a snake_case key: "short_drive" -> "Short Drive". */
export function titleCase(key: string): string {
  return key
    .replace(/_/g, ' ')
    .split(' ')
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(' ');
}

export function displayValue(value: number | string | null | undefined, fallback = 'N/A'): string {
  return value == null ? fallback : String(value);
}
