import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';
import { AirportRegistry } from '../services/airports.js';
import { createDayTripFinder } from '../services/day-trips.js';
import { SearchStore } from '../services/search-store.js';
import { FakeFareApi, makeFare } from '../test/fare-api.js';

const outbound = [
  makeFare({ to: 'BCN', toName: 'Barcelona', departure: '2025-08-20T06:00:00', arrival: '2025-08-20T09:30:00', price: 30 }),
  makeFare({ to: 'DUB', toName: 'Dublin', departure: '2025-08-20T07:00:00', arrival: '2025-08-20T08:15:00', price: 15 })
];

const api = new FakeFareApi(query => {
  if (!query.destination) {
    return outbound;
  }
  return [
    makeFare({
      from: query.origin,
      to: 'STN',
      departure: '2025-08-20T19:00:00',
      arrival: '2025-08-20T21:00:00',
      price: 25,
      currency: 'GBP'
    })
  ];
});

const airports = new AirportRegistry(
  [
    { code: 'STN', name: 'London Stansted Airport', city: 'London', country: 'GB' },
    { code: 'BCN', name: 'Barcelona International Airport', city: 'Barcelona', country: 'ES' }
  ],
  ['STN', 'BCN']
);

const pageBodySchema = z.object({
  success: z.boolean(),
  data: z.object({
    searchId: z.string(),
    page: z.number(),
    perPage: z.number(),
    totalPages: z.number(),
    totalResults: z.number(),
    results: z.array(z.object({ key: z.string(), price: z.number() }).passthrough())
  })
});

const errorBodySchema = z.object({
  success: z.literal(false),
  error: z.string(),
  details: z.record(z.array(z.string())).optional(),
  suggestions: z.array(z.object({ code: z.string() }).passthrough()).optional()
});

const airportsBodySchema = z.object({
  data: z.array(z.object({ code: z.string() }).passthrough())
});

const lookupBodySchema = z.object({
  data: z.object({ code: z.string(), name: z.string() })
});

const readBody = async <T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> =>
  schema.parse(await response.json());

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({
    finder: createDayTripFinder(api, { concurrency: 1 }),
    store: new SearchStore({ perPage: 1 }),
    airports
  });
  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

const post = (body: unknown) =>
  fetch(`${baseUrl}/api/day-trips`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });

describe('POST /api/day-trips', () => {
  it('runs a search and returns the first page with a search id', async () => {
    const response = await post({ origin: 'stn', budget: '100', dateStart: '2025-08-20', dateEnd: '2025-08-20' });
    const body = await readBody(response, pageBodySchema);

    expect(response.status).toBe(201);
    expect(body.success).toBe(true);
    expect(body.data).toMatchObject({ page: 1, perPage: 1, totalPages: 2, totalResults: 2 });
    expect(body.data.results[0]).toMatchObject({ key: 'Dublin', price: 40 });
    expect(typeof body.data.searchId).toBe('string');
  });

  it('resolves the origin from its airport name', async () => {
    const response = await post({
      originName: 'London Stansted Airport',
      budget: 50,
      dateStart: '2025-08-20',
      dateEnd: '2025-08-20'
    });
    const body = await readBody(response, pageBodySchema);

    expect(response.status).toBe(201);
    expect(body.data.totalResults).toBe(1);
  });

  it('answers 404 with suggestions for an unknown airport name', async () => {
    const response = await post({ originName: 'Stansted', budget: 50, dateStart: '2025-08-20', dateEnd: '2025-08-20' });
    const body = await readBody(response, errorBodySchema);

    expect(response.status).toBe(404);
    expect(body.suggestions?.[0].code).toBe('STN');
  });

  it('rejects a budget that is not a number', async () => {
    const response = await post({ origin: 'STN', budget: 'lots', dateStart: '2025-08-20', dateEnd: '2025-08-20' });
    const body = await readBody(response, errorBodySchema);

    expect(response.status).toBe(400);
    expect(body.error).toBe('Could not convert budget to a number: "lots"');
  });

  it('answers 400 for a body that is not valid JSON', async () => {
    const response = await fetch(`${baseUrl}/api/day-trips`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"budget": '
    });
    const body = await readBody(response, errorBodySchema);

    expect(response.status).toBe(400);
    expect(body.error).toBe('Request body is not valid JSON');
  });

  it('rejects a request without an origin', async () => {
    const response = await post({ budget: 50, dateStart: '2025-08-20', dateEnd: '2025-08-20' });
    const body = await readBody(response, errorBodySchema);

    expect(response.status).toBe(400);
    expect(body.details?.origin).toEqual(['Either origin or originName is required']);
  });
});

describe('GET /api/day-trips/:searchId', () => {
  it('returns later pages of a stored search', async () => {
    const created = await readBody(
      await post({ origin: 'STN', budget: '100', dateStart: '2025-08-20', dateEnd: '2025-08-20' }),
      pageBodySchema
    );

    const response = await fetch(`${baseUrl}/api/day-trips/${created.data.searchId}?page=2`);
    const body = await readBody(response, pageBodySchema);

    expect(response.status).toBe(200);
    expect(body.data.page).toBe(2);
    expect(body.data.results[0]).toMatchObject({ key: 'Barcelona', price: 55 });
  });

  it('answers 404 for an unknown search', async () => {
    const response = await fetch(`${baseUrl}/api/day-trips/00000000-0000-0000-0000-000000000000`);
    expect(response.status).toBe(404);
  });

  it('rejects an invalid page', async () => {
    const response = await fetch(`${baseUrl}/api/day-trips/anything?page=0`);
    expect(response.status).toBe(400);
  });
});

describe('airport routes', () => {
  it('lists served airports', async () => {
    const body = await readBody(await fetch(`${baseUrl}/api/airports`), airportsBodySchema);
    expect(body.data.map(airport => airport.code)).toEqual(['STN', 'BCN']);
  });

  it('looks up a code by name', async () => {
    const url = `${baseUrl}/api/airports/lookup?name=${encodeURIComponent('Barcelona International Airport')}`;
    const body = await readBody(await fetch(url), lookupBodySchema);
    expect(body.data).toEqual({ code: 'BCN', name: 'Barcelona International Airport' });
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);
    expect(response.status).toBe(200);
  });
});
