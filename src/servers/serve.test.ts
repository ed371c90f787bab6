import type { Server } from 'node:http';
import { afterEach, describe, expect, it } from 'vitest';
import { USAGE, parseServeArgs, startServers } from './serve';
import { defaultPort, isServerName } from './registry';
import { loadConfig } from '../config/config';
import { closeServer } from '../utils/http-server';

describe('parseServeArgs', () => {
  it('reads one server with overrides', () => {
    expect(parseServeArgs(['places', '--port', '6002', '--host', '0.0.0.0'])).toEqual({
      targets: ['places'],
      port: 6002,
      host: '0.0.0.0',
    });
  });

  it('expands "all" in port order of the registry', () => {
    expect(parseServeArgs(['all'])).toEqual({
      targets: ['weather', 'booking', 'places', 'trip_planner'],
      host: undefined,
    });
  });

  it('rejects bad invocations', () => {
    expect(() => parseServeArgs([])).toThrow(USAGE);
    expect(() => parseServeArgs(['weather', 'places'])).toThrow(USAGE);
    expect(() => parseServeArgs(['flights'])).toThrow(`Unknown server "flights". ${USAGE}`);
    expect(() => parseServeArgs(['weather', '--port', 'http'])).toThrow('Invalid port: http');
    expect(() => parseServeArgs(['all', '--port', '5000'])).toThrow('--port cannot be combined with "all"');
  });
});

describe('registry', () => {
  it('maps each server to its configured port', () => {
    const config = loadConfig({ PLANNER_PORT: '6003' });

    expect(defaultPort('booking', config)).toBe(5001);
    expect(defaultPort('places', config)).toBe(5002);
    expect(defaultPort('trip_planner', config)).toBe(6003);
    expect(defaultPort('weather', config)).toBe(5004);
    expect(isServerName('trip_planner')).toBe(true);
    expect(isServerName('all')).toBe(false);
  });
});

describe('startServers', () => {
  let servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.map((s) => closeServer(s)));
    servers = [];
  });

  it('serves the chosen tool server', async () => {
    servers = await startServers({ targets: ['trip_planner'], port: 0, host: '127.0.0.1' }, loadConfig({}));
    const address = servers[0]?.address();
    if (!address || typeof address === 'string') throw new Error('not listening');

    const res = await fetch(`http://127.0.0.1:${address.port}/health`);

    expect(await res.json()).toEqual({
      ok: true,
      server: 'Trip Planner Server',
      tools: ['plan_complete_trip', 'plan_weather_optimized_trip', 'suggest_daily_activities'],
    });
  });
});
