import { z } from 'zod';
import { parseLocationInput } from '../base-service';
import { runTool, type McpToolServer } from '../mcp';
import { DEFAULT_FORECAST_DAYS } from './constants';
import { WeatherService } from './service';
import { createLogger } from '../../utils/logger';

const location = z.string().min(1).describe('Location to check: a city, an address, or coordinates as "lat,lng"');

export function weatherToolServer(service = new WeatherService(), logger = createLogger('weather')): McpToolServer {
  return {
    name: 'weather',
    title: 'Weather Server',
    tools: ['check_weather', 'get_weather_forecast', 'get_best_trip_days', 'get_weather_events'],
    register(server) {
      server.registerTool(
        'check_weather',
        {
          description: 'Check the current weather in a location, with a short outlook for the next days',
          inputSchema: { location },
        },
        ({ location: loc }) => runTool('check_weather', logger, () => service.getCurrentWeather(parseLocationInput(loc)))
      );

      server.registerTool(
        'get_weather_forecast',
        {
          description: 'Get a day-by-day weather forecast (up to 16 days) for a location',
          inputSchema: {
            location,
            days: z.number().int().min(1).default(DEFAULT_FORECAST_DAYS).describe('Number of days to forecast'),
          },
        },
        ({ location: loc, days }) =>
          runTool('get_weather_forecast', logger, () => service.getForecast(parseLocationInput(loc), days))
      );

      server.registerTool(
        'get_best_trip_days',
        {
          description: 'Find the best days for a trip in the coming week, ranked by weather',
          inputSchema: { location },
        },
        ({ location: loc }) =>
          runTool('get_best_trip_days', logger, () => service.getTripRecommendations(parseLocationInput(loc)))
      );

      server.registerTool(
        'get_weather_events',
        {
          description: 'List severe weather events (heavy rain, strong winds, storms, snow) expected in the next 3 days',
          inputSchema: { location },
        },
        ({ location: loc }) =>
          runTool('get_weather_events', logger, () => service.getSevereWeatherEvents(parseLocationInput(loc)))
      );
    },
  };
}
