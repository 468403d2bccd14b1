/**
 * Google Places client tests
 * global fetch is mocked; no request leaves the process
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { GooglePlacesClient } from '../google-places.client.js';

interface CapturedRequest {
  url: string;
  method?: string;
  apiKey: string | null;
  fieldMask: string | null;
  body: unknown;
}

function captureFetch(respond: () => Response): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const headers = new Headers(init?.headers);
    captured.push({
      url: String(input),
      method: init?.method,
      apiKey: headers.get('X-Goog-Api-Key'),
      fieldMask: headers.get('X-Goog-FieldMask'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null
    });
    return respond();
  });
  return captured;
}

const ORIGIN = { lat: 40.7128, lng: -74.006 };

describe('GooglePlacesClient', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('posts a biased text search and returns raw places', async () => {
    const captured = captureFetch(() => Response.json({ places: [{ id: 'a' }, { id: 'b' }] }));
    const client = new GooglePlacesClient('test-secret');

    const outcome = await client.searchText({ query: '  cozy ramen  ', location: ORIGIN, radiusMeters: 3218 });

    assert.deepEqual(outcome, { ok: true, results: [{ id: 'a' }, { id: 'b' }] });
    assert.equal(captured.length, 1);
    const request = captured[0];
    assert.ok(request);
    assert.equal(request.url, 'https://places.googleapis.com/v1/places:searchText');
    assert.equal(request.method, 'POST');
    assert.equal(request.apiKey, 'test-secret');
    assert.ok(request.fieldMask?.startsWith('places.id,places.displayName'));
    assert.deepEqual(request.body, {
      textQuery: 'cozy ramen',
      maxResultCount: 20,
      locationBias: {
        circle: {
          center: { latitude: 40.7128, longitude: -74.006 },
          radius: 3218
        }
      }
    });
  });

  it('caps the bias radius at 50 km', async () => {
    const captured = captureFetch(() => Response.json({}));
    const client = new GooglePlacesClient('test-secret');

    const outcome = await client.searchText({ query: 'bar', location: ORIGIN, radiusMeters: 160_934 });

    assert.deepEqual(outcome, { ok: true, results: [] });
    assert.deepEqual(captured[0]?.body, {
      textQuery: 'bar',
      maxResultCount: 20,
      locationBias: {
        circle: {
          center: { latitude: 40.7128, longitude: -74.006 },
          radius: 50_000
        }
      }
    });
  });

  it('does not call out without an API key', async () => {
    const captured = captureFetch(() => Response.json({ places: [] }));
    const client = new GooglePlacesClient(undefined);

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'NOT_CONFIGURED' }
    );
    assert.equal(captured.length, 0);
  });

  it('rejects a blank query locally', async () => {
    const captured = captureFetch(() => Response.json({ places: [] }));
    const client = new GooglePlacesClient('test-secret');

    assert.deepEqual(
      await client.searchText({ query: '   ', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'EMPTY_QUERY' }
    );
    assert.equal(captured.length, 0);
  });

  it('reports HTTP errors with their status', async () => {
    captureFetch(() => new Response('denied', { status: 403 }));
    const client = new GooglePlacesClient('test-secret');

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'HTTP_ERROR', status: 403 }
    );
  });

  it('reports a payload with the wrong shape as BAD_RESPONSE', async () => {
    captureFetch(() => Response.json({ places: 'nope' }));
    const client = new GooglePlacesClient('test-secret');

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'BAD_RESPONSE' }
    );
  });

  it('reports an undecodable body as BAD_RESPONSE', async () => {
    captureFetch(() => new Response('{"places": [', { status: 200 }));
    const client = new GooglePlacesClient('test-secret');

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'BAD_RESPONSE' }
    );
  });

  it('maps transport failures to their fetch error kind', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new Error('getaddrinfo ENOTFOUND places.googleapis.com');
    });
    const client = new GooglePlacesClient('test-secret');

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'DNS_FAIL' }
    );
  });

  it('times out when the response body stalls after the headers', async () => {
    mock.method(globalThis, 'fetch', async () =>
      new Response(new ReadableStream<Uint8Array>({ start() { } }), { status: 200 })
    );
    const client = new GooglePlacesClient('test-secret', 30);

    assert.deepEqual(
      await client.searchText({ query: 'cafe', location: ORIGIN, radiusMeters: 1000 }),
      { ok: false, reason: 'TIMEOUT' }
    );
  });
});
