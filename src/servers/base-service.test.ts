import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  BaseService,
  formatErrorResponse,
  formatLocation,
  haversineKm,
  parseLocationInput,
  requireApiKey,
  titleCase,
  validateCoordinates,
  type ServiceDeps,
} from './base-service';
import { ErrorCodes, type LocationInput } from '../types/types';
import { GEOCODE_URL, fakeHttp, fixedClock, geocodeReply, routeHttp, type FakeReply } from '../test/fake-http';

class SampleService extends BaseService {
  constructor(deps: ServiceDeps) {
    super('probe', deps);
  }

  locate(location: LocationInput) {
    return this.resolveLocation(location, 'nowhere to be found');
  }

  currentDay() {
    return this.today();
  }
}

const Echo = z.object({ ok: z.boolean() });

describe('BaseService.requestJson', () => {
  it('sends GET params as a query string', async () => {
    const fake = fakeHttp(() => ({ body: { ok: true } }));
    const probe = new SampleService({ http: fake.http });

    expect(await probe.requestJson('https://api.test/echo', Echo, { params: { q: 'x' } })).toEqual({ ok: true });
    expect(fake.requests).toEqual([
      { method: 'GET', url: 'https://api.test/echo', params: { q: 'x' }, body: undefined, authorization: '' },
    ]);
  });

  it('sends POST params as a JSON body with the given headers', async () => {
    const fake = fakeHttp(() => ({ body: { ok: true } }));
    const probe = new SampleService({ http: fake.http });

    await probe.requestJson('https://api.test/echo', Echo, {
      method: 'post',
      params: { rows: 10 },
      headers: { Authorization: 'Bearer test-secret' },
    });

    expect(fake.requests[0]).toMatchObject({ method: 'POST', body: { rows: 10 }, authorization: 'Bearer test-secret' });
  });

  it('rejects methods other than GET and POST', async () => {
    const probe = new SampleService({ http: fakeHttp(() => ({ body: {} })).http });

    await expect(probe.requestJson('https://api.test/echo', Echo, { method: 'PUT' })).rejects.toMatchObject({
      message: 'Unsupported HTTP method: PUT',
      code: ErrorCodes.INVALID_INPUT,
    });
  });

  it('maps HTTP, network and shape failures to upstream errors', async () => {
    const cases: Array<{ reply: FakeReply; message: string }> = [
      { reply: { status: 429, body: {} }, message: 'HTTP error 429' },
      { reply: { status: 204 }, message: 'HTTP error 204' },
      { reply: { networkError: 'socket hang up' }, message: 'Unexpected error: socket hang up' },
      { reply: { body: { ok: 'yes' } }, message: 'Unexpected error: malformed response' },
    ];

    for (const { reply, message } of cases) {
      const probe = new SampleService({ http: fakeHttp(() => reply).http });
      await expect(probe.requestJson('https://api.test/echo', Echo)).rejects.toMatchObject({
        message,
        code: ErrorCodes.EXTERNAL_API_ERROR,
      });
    }
  });
});

describe('BaseService location handling', () => {
  it('returns the first geocoding hit', async () => {
    const fake = routeHttp([[GEOCODE_URL, geocodeReply(38.72, -9.14)]]);
    const probe = new SampleService({ http: fake.http });

    expect(await probe.getCoordinates('Lisbon')).toEqual({ latitude: 38.72, longitude: -9.14 });
  });

  it('passes coordinates through without a lookup', async () => {
    const fake = routeHttp([]);
    const probe = new SampleService({ http: fake.http });

    expect(await probe.locate({ latitude: 1, longitude: 2 })).toEqual({ latitude: 1, longitude: 2 });
    expect(fake.requests).toHaveLength(0);
  });

  it('throws the caller-supplied message when nothing matches', async () => {
    const probe = new SampleService({ http: routeHttp([[GEOCODE_URL, { body: {} }]]).http });

    await expect(probe.locate('Atlantis')).rejects.toMatchObject({
      message: 'nowhere to be found',
      code: ErrorCodes.LOCATION_NOT_FOUND,
      details: { location: 'Atlantis' },
    });
  });

  it('derives today from the injected clock at UTC midnight', () => {
    const probe = new SampleService({ http: routeHttp([]).http, now: fixedClock('2030-03-05T22:15:00Z') });

    expect(probe.currentDay().toISOString()).toBe('2030-03-05T00:00:00.000Z');
  });
});

describe('helpers', () => {
  it('parses "lat,lng" strings and leaves names alone', () => {
    expect(parseLocationInput(' 48.85 , 2.35 ')).toEqual({ latitude: 48.85, longitude: 2.35 });
    expect(parseLocationInput('-33.9,151.2')).toEqual({ latitude: -33.9, longitude: 151.2 });
    expect(parseLocationInput('Paris')).toBe('Paris');
    expect(parseLocationInput('48.85')).toBe('48.85');
  });

  it('formats coordinates to four decimals', () => {
    expect(formatLocation({ latitude: 48.8566, longitude: 2.3522 })).toBe('coordinates (48.8566, 2.3522)');
    expect(formatLocation('Paris')).toBe('Paris');
  });

  it('validates coordinate ranges', () => {
    expect(validateCoordinates(90, -180)).toBe(true);
    expect(validateCoordinates(90.1, 0)).toBe(false);
    expect(validateCoordinates(0, 180.5)).toBe(false);
    expect(validateCoordinates(null, 0)).toBe(false);
  });

  it('formats errors with an optional context', () => {
    expect(formatErrorResponse('boom')).toBe('Error: boom');
    expect(formatErrorResponse('boom', 'places search')).toBe('Error in places search: boom');
  });

  it('requires API keys', () => {
    expect(requireApiKey('test-secret', 'Booking.com')).toBe('test-secret');
    expect(() => requireApiKey(undefined, 'Booking.com')).toThrow(
      'API key is required for Booking.com operations. Please configure your Booking.com API key.'
    );
  });

  it('measures great-circle distance in km', () => {
    expect(haversineKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111.195, 3);
    expect(haversineKm({ latitude: 10, longitude: 10 }, { latitude: 10, longitude: 10 })).toBe(0);
  });

  it('title-cases snake_case keys', () => {
    expect(titleCase('short_drive')).toBe('Short Drive');
    expect(titleCase('bed_and_breakfast')).toBe('Bed And Breakfast');
  });
});
