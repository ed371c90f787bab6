import { z } from 'zod';
import { parseLocationInput } from '../base-service';
import { runTool, type McpToolServer } from '../mcp';
import { BookingService } from '../booking/service';
import { PlacesService } from '../places/service';
import { WeatherService } from '../weather/service';
import { DEFAULT_BUDGET, DEFAULT_TRIP_STYLE } from './constants';
import { TripPlannerService } from './service';
import { getConfig, type AppConfig } from '../../config/config';
import { createLogger } from '../../utils/logger';

const location = z.string().min(1).describe('Destination (city name, address, etc.) or coordinates as "lat,lng"');
const duration = z
  .union([z.number().int(), z.string()])
  .optional()
  .describe('Number of days (1-30) or a preset: weekend, short, week, extended, month');
const tripStyle = z
  .string()
  .default(DEFAULT_TRIP_STYLE)
  .describe('relaxed, balanced, adventure, cultural or food_focused');
const weatherCondition = z
  .string()
  .describe('clear, sunny, partly_cloudy, cloudy, overcast, rainy or snowy');

/** Planner wired to the same upstream APIs as the other servers; lodging only when a booking key is set. */
export function createTripPlanner(config: AppConfig = getConfig()): TripPlannerService {
  return new TripPlannerService({
    weather: new WeatherService(),
    places: new PlacesService(config.GOOGLE_PLACES_API_KEY),
    booking: config.BOOKING_API_KEY ? new BookingService(config.BOOKING_API_KEY) : undefined,
  });
}

export function tripPlannerToolServer(
  service = createTripPlanner(),
  logger = createLogger('trip-planner')
): McpToolServer {
  return {
    name: 'trip_planner',
    title: 'Trip Planner Server',
    tools: ['plan_complete_trip', 'plan_weather_optimized_trip', 'suggest_daily_activities'],
    register(server) {
      server.registerTool(
        'plan_complete_trip',
        {
          description:
            'Plan a complete trip: picks the best-weather dates (or uses start_date), builds a daily itinerary and suggests accommodation',
          inputSchema: {
            location,
            start_date: z.string().optional().describe('Trip start date in YYYY-MM-DD format'),
            duration,
            trip_style: tripStyle,
            budget: z.string().default(DEFAULT_BUDGET).describe('budget, mid_range or luxury'),
            include_accommodation: z.boolean().default(true),
          },
        },
        ({ location: loc, start_date, duration: days, trip_style, budget, include_accommodation }) =>
          runTool('plan_complete_trip', logger, () =>
            service.planCompleteTrip(parseLocationInput(loc), {
              startDate: start_date,
              duration: days,
              tripStyle: trip_style,
              budget,
              includeAccommodation: include_accommodation,
            })
          )
      );

      server.registerTool(
        'plan_weather_optimized_trip',
        {
          description: 'Plan a trip whose activities suit an expected weather condition',
          inputSchema: { location, weather_condition: weatherCondition, duration, trip_style: tripStyle },
        },
        ({ location: loc, weather_condition, duration: days, trip_style }) =>
          runTool('plan_weather_optimized_trip', logger, () =>
            service.planWeatherOptimizedTrip(parseLocationInput(loc), weather_condition, {
              duration: days,
              tripStyle: trip_style,
            })
          )
      );

      server.registerTool(
        'suggest_daily_activities',
        {
          description: 'Suggest morning, afternoon and evening activities for one day in a given weather',
          inputSchema: {
            location,
            weather_condition: weatherCondition,
            date: z.string().optional().describe('Date in YYYY-MM-DD format (default: today)'),
            trip_style: tripStyle,
          },
        },
        ({ location: loc, weather_condition, date, trip_style }) =>
          runTool('suggest_daily_activities', logger, () =>
            service.suggestDailyActivities(parseLocationInput(loc), weather_condition, { date, tripStyle: trip_style })
          )
      );
    },
  };
}
