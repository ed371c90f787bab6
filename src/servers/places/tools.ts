import { z } from 'zod';
import { parseLocationInput } from '../base-service';
import { runTool, type McpToolServer } from '../mcp';
import { DEFAULT_GEOCODE_LIMIT, DEFAULT_LANGUAGE, DEFAULT_RADIUS, DEFAULT_RESULTS_LIMIT } from './constants';
import { PlacesService } from './service';
import { getConfig } from '../../config/config';
import { createLogger } from '../../utils/logger';

const location = z.string().min(1).describe('Location to search (city name, address, etc.) or coordinates as "lat,lng"');
const limit = z.number().int().default(DEFAULT_RESULTS_LIMIT).describe('Maximum number of results (max 60)');

export function placesToolServer(
  service = new PlacesService(getConfig().GOOGLE_PLACES_API_KEY),
  logger = createLogger('places')
): McpToolServer {
  return {
    name: 'places',
    title: 'Places Server',
    tools: [
      'search_places',
      'recommend_places_by_weather',
      'recommend_places_by_distance',
      'geocode_location',
      'reverse_geocode',
    ],
    register(server) {
      server.registerTool(
        'search_places',
        {
          description: 'Search for places near a location, filtered by type, rating and price level',
          inputSchema: {
            location,
            place_type: z.string().optional().describe('Type of place (restaurant, tourist_attraction, museum, ...)'),
            radius: z.number().int().default(DEFAULT_RADIUS).describe('Search radius in meters (max 50000)'),
            limit,
            min_rating: z.number().optional().describe('Minimum rating (0-5)'),
            price_level: z
              .string()
              .optional()
              .describe('free, inexpensive, moderate, expensive or very_expensive'),
          },
        },
        ({ location: loc, place_type, radius, limit: max, min_rating, price_level }) =>
          runTool('search_places', logger, () =>
            service.searchPlaces(parseLocationInput(loc), {
              placeType: place_type,
              radius,
              limit: max,
              minRating: min_rating,
              priceLevel: price_level,
            })
          )
      );

      server.registerTool(
        'recommend_places_by_weather',
        {
          description: 'Recommend places that suit the weather (sunny, rainy, cloudy, snowy, windy, hot, cold)',
          inputSchema: {
            location,
            weather_condition: z.string().describe('sunny, rainy, cloudy, snowy, windy, hot or cold'),
            max_distance: z.number().int().default(DEFAULT_RADIUS).describe('Maximum distance in meters'),
            limit,
          },
        },
        ({ location: loc, weather_condition, max_distance, limit: max }) =>
          runTool('recommend_places_by_weather', logger, () =>
            service.recommendPlacesByWeather(parseLocationInput(loc), weather_condition, max_distance, max)
          )
      );

      server.registerTool(
        'recommend_places_by_distance',
        {
          description: 'Recommend places reachable with a travel mode (walking, short_drive, day_trip, extended)',
          inputSchema: {
            location,
            travel_mode: z.string().default('walking').describe('walking, short_drive, day_trip or extended'),
            limit,
          },
        },
        ({ location: loc, travel_mode, limit: max }) =>
          runTool('recommend_places_by_distance', logger, () =>
            service.recommendPlacesByDistance(parseLocationInput(loc), travel_mode, max)
          )
      );

      server.registerTool(
        'geocode_location',
        {
          description: 'Find the coordinates, address and OpenStreetMap id of a place name',
          inputSchema: {
            location: z.string().min(1).describe('Place name or address'),
            language: z.string().default(DEFAULT_LANGUAGE),
            limit: z.number().int().min(1).default(DEFAULT_GEOCODE_LIMIT),
          },
        },
        ({ location: loc, language, limit: max }) =>
          runTool('geocode_location', logger, () => service.geocodeLocation(loc, language, max))
      );

      server.registerTool(
        'reverse_geocode',
        {
          description: 'Describe the place at a latitude/longitude',
          inputSchema: {
            latitude: z.number(),
            longitude: z.number(),
            language: z.string().default(DEFAULT_LANGUAGE),
          },
        },
        ({ latitude, longitude, language }) =>
          runTool('reverse_geocode', logger, () => service.reverseGeocode(latitude, longitude, language))
      );
    },
  };
}
