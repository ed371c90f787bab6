import { afterEach, describe, expect, it } from 'vitest';
import { PlacesService } from './service';
import { placesToolServer } from './tools';
import { routeHttp } from '../../test/fake-http';
import { startMcpHarness, type McpHarness } from '../../test/mcp-client';

describe('places MCP server', () => {
  let harness: McpHarness | undefined;

  afterEach(async () => {
    await harness?.close();
    harness = undefined;
  });

  async function serve() {
    const fake = routeHttp([
      ['https://maps.googleapis.com/maps/api/place/nearbysearch/json', { body: { status: 'ZERO_RESULTS', results: [] } }],
    ]);
    harness = await startMcpHarness(placesToolServer(new PlacesService('test-secret', { http: fake.http })));
    return harness;
  }

  it('exposes search, recommendation and geocoding tools', async () => {
    const mcp = await serve();

    expect(await mcp.listTools()).toEqual([
      'geocode_location',
      'recommend_places_by_distance',
      'recommend_places_by_weather',
      'reverse_geocode',
      'search_places',
    ]);
  });

  it('searches around "lat,lng" input', async () => {
    const mcp = await serve();

    expect(await mcp.call('search_places', { location: '0,0' })).toEqual({
      text: 'No places found for coordinates (0.0000, 0.0000)',
      isError: false,
    });
  });

  it('reports validation failures as tool errors', async () => {
    const mcp = await serve();

    expect(await mcp.call('search_places', { location: 'Rome', radius: 90000 })).toEqual({
      text: 'Radius must be between 0 and 50000 meters',
      isError: true,
    });
  });
});
