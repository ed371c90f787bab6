/** Shared constants across all MCP servers */

export const GEOCODING_API_URL = 'https://geocoding-api.open-meteo.com/v1/search';

// seconds
export const DEFAULT_TIMEOUT = 30;

export const EARTH_RADIUS_KM = 6371.0;

export const MIN_LATITUDE = -90.0;
export const MAX_LATITUDE = 90.0;
export const MIN_LONGITUDE = -180.0;
export const MAX_LONGITUDE = 180.0;
