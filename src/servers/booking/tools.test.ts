import { afterEach, describe, expect, it } from 'vitest';
import { BookingService } from './service';
import { bookingToolServer } from './tools';
import { routeHttp } from '../../test/fake-http';
import { startMcpHarness, type McpHarness } from '../../test/mcp-client';

describe('booking MCP server', () => {
  let harness: McpHarness | undefined;

  afterEach(async () => {
    await harness?.close();
    harness = undefined;
  });

  it('exposes the booking tools', async () => {
    harness = await startMcpHarness(bookingToolServer(new BookingService('test-secret', { http: routeHttp([]).http })));

    expect(await harness.listTools()).toEqual([
      'get_accommodation_details',
      'search_availability',
      'search_specific_accommodations',
    ]);
  });

  it('reports a missing API key as a tool error', async () => {
    harness = await startMcpHarness(bookingToolServer(new BookingService(undefined, { http: routeHttp([]).http })));

    const result = await harness.call('search_availability', {
      location: 'Rome',
      checkin: '2030-06-01',
      checkout: '2030-06-02',
    });

    expect(result).toEqual({
      text: 'API key is required for Booking.com operations. Please configure your Booking.com API key.',
      isError: true,
    });
  });

  it('fetches details by hotel id', async () => {
    const fake = routeHttp([
      ['https://demandapi.booking.com/3.1/accommodations/details', { body: { result: { name: 'Tiny Inn', star_rating: 2 } } }],
    ]);
    harness = await startMcpHarness(bookingToolServer(new BookingService('test-secret', { http: fake.http })));

    const result = await harness.call('get_accommodation_details', { hotel_id: '42' });

    expect(result).toEqual({
      text: 'Accommodation Details:\n\nName: Tiny Inn\nStar Rating: 2 stars\nType: N/A\n',
      isError: false,
    });
  });
});
