import { z } from 'zod';
import { parseLocationInput } from '../base-service';
import { runTool, type McpToolServer } from '../mcp';
import { DEFAULT_ADULTS, DEFAULT_ROOMS, DEFAULT_ROWS } from './constants';
import { BookingService } from './service';
import { getConfig } from '../../config/config';
import { createLogger } from '../../utils/logger';

const stayShape = {
  location: z.string().min(1).describe('Location to search (city name, address, or "lat,lng")'),
  checkin: z.string().describe('Check-in date in YYYY-MM-DD format'),
  checkout: z.string().describe('Checkout date in YYYY-MM-DD format'),
  adults: z.number().int().min(1).default(DEFAULT_ADULTS).describe('Number of adults'),
  rooms: z.number().int().min(1).default(DEFAULT_ROOMS).describe('Number of rooms'),
  rows: z.number().int().default(DEFAULT_ROWS).describe('Number of results to return (10-100)'),
};

export function bookingToolServer(
  service = new BookingService(getConfig().BOOKING_API_KEY),
  logger = createLogger('booking')
): McpToolServer {
  return {
    name: 'booking',
    title: 'Booking Server',
    tools: ['search_availability', 'search_specific_accommodations', 'get_accommodation_details'],
    register(server) {
      server.registerTool(
        'search_availability',
        {
          description: 'Search for accommodation availability based on location and dates',
          inputSchema: stayShape,
        },
        ({ location, ...stay }) =>
          runTool('search_availability', logger, () =>
            service.searchAccommodations(parseLocationInput(location), stay)
          )
      );

      server.registerTool(
        'search_specific_accommodations',
        {
          description:
            'Search for accommodations with specific criteria like star rating, price range and accommodation type',
          inputSchema: {
            ...stayShape,
            star_rating: z.number().int().optional().describe('Hotel star rating (1-5)'),
            price_min: z.number().optional().describe('Minimum price per night'),
            price_max: z.number().optional().describe('Maximum price per night'),
            accommodation_type: z
              .string()
              .optional()
              .describe('hotel, apartment, resort, villa, hostel, bed_and_breakfast or guesthouse'),
          },
        },
        ({ location, star_rating, price_min, price_max, accommodation_type, ...stay }) =>
          runTool('search_specific_accommodations', logger, () =>
            service.searchSpecificAccommodations(parseLocationInput(location), stay, {
              starRating: star_rating,
              priceMin: price_min,
              priceMax: price_max,
              accommodationType: accommodation_type,
            })
          )
      );

      server.registerTool(
        'get_accommodation_details',
        {
          description:
            'Get detailed information about an accommodation: photos, reviews, contact details and booking URL',
          inputSchema: {
            hotel_id: z.string().min(1).describe('Hotel identifier from search results'),
          },
        },
        ({ hotel_id }) => runTool('get_accommodation_details', logger, () => service.getAccommodationDetails(hotel_id))
      );
    },
  };
}
