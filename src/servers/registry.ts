import type { McpToolServer } from './mcp';
import { BookingService } from './booking/service';
import { bookingToolServer } from './booking/tools';
import { PlacesService } from './places/service';
import { placesToolServer } from './places/tools';
import { createTripPlanner, tripPlannerToolServer } from './trip-planner/tools';
import { weatherToolServer } from './weather/tools';
import type { AppConfig } from '../config/config';

export const SERVER_NAMES = ['weather', 'booking', 'places', 'trip_planner'] as const;

export type ServerName = (typeof SERVER_NAMES)[number];

export function isServerName(value: string): value is ServerName {
  return SERVER_NAMES.some((name) => name === value);
}

// factories, so a server's services are only built when it is started
export const SERVER_FACTORIES: Record<ServerName, (config: AppConfig) => McpToolServer> = {
  weather: () => weatherToolServer(),
  booking: (config) => bookingToolServer(new BookingService(config.BOOKING_API_KEY)),
  places: (config) => placesToolServer(new PlacesService(config.GOOGLE_PLACES_API_KEY)),
  trip_planner: (config) => tripPlannerToolServer(createTripPlanner(config)),
};

export function defaultPort(name: ServerName, config: AppConfig): number {
  switch (name) {
    case 'weather':
      return config.WEATHER_PORT;
    case 'booking':
      return config.BOOKING_PORT;
    case 'places':
      return config.PLACES_PORT;
    case 'trip_planner':
      return config.PLANNER_PORT;
  }
}
