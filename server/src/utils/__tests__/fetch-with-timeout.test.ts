/**
 * fetchWithTimeout Tests
 * global fetch is mocked; the mock honors the abort signal like the real one
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { fetchWithTimeout, readJsonWithinBudget, UpstreamFetchError } from '../fetch-with-timeout.js';
import { isTimeoutError } from '../../lib/reliability/timeout-guard.js';

const URL_UNDER_TEST = 'https://upstream.test/v1/thing';

function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}

async function expectFetchError(promise: Promise<Response>): Promise<UpstreamFetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamFetchError) return error;
    throw error;
  }
  throw new Error('expected fetchWithTimeout to reject');
}

describe('fetchWithTimeout', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('returns HTTP error responses instead of throwing', async () => {
    mock.method(globalThis, 'fetch', async () => new Response('nope', { status: 503 }));
    const response = await fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 100 });
    assert.equal(response.status, 503);
  });

  it('aborts and reports TIMEOUT when the upstream hangs', async () => {
    mock.method(globalThis, 'fetch', hangingFetch);

    const error = await expectFetchError(
      fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 10, provider: 'test_provider', stage: 'unit' })
    );

    assert.equal(error.code, 'UPSTREAM_TIMEOUT');
    assert.equal(error.errorKind, 'TIMEOUT');
    assert.equal(error.provider, 'test_provider');
    assert.equal(error.stage, 'unit');
    assert.equal(error.host, 'upstream.test');
  });

  it('classifies DNS failures', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new Error('getaddrinfo ENOTFOUND upstream.test');
    });

    const error = await expectFetchError(fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 100 }));
    assert.equal(error.errorKind, 'DNS_FAIL');
  });

  it('classifies other failures as NETWORK_ERROR', async () => {
    mock.method(globalThis, 'fetch', async () => {
      throw new Error('socket hang up');
    });

    const error = await expectFetchError(fetchWithTimeout(URL_UNDER_TEST, {}, { timeoutMs: 100 }));
    assert.equal(error.errorKind, 'NETWORK_ERROR');
  });
});

describe('readJsonWithinBudget', () => {
  it('parses a body that arrives in time', async () => {
    const response = Response.json({ places: [] });
    assert.deepEqual(await readJsonWithinBudget(response, Date.now(), 100, 'body'), { places: [] });
  });

  it('rejects with TimeoutError when the body stalls', async () => {
    const stalled = new Response(new ReadableStream<Uint8Array>({ start() { } }), { status: 200 });

    await assert.rejects(
      readJsonWithinBudget(stalled, Date.now(), 20, 'stalled_body'),
      (error: unknown) => {
        assert.ok(isTimeoutError(error));
        assert.equal(error.operation, 'stalled_body');
        return true;
      }
    );
  });

  it('gives the body only what is left of the budget', async () => {
    const stalled = new Response(new ReadableStream<Uint8Array>({ start() { } }), { status: 200 });

    await assert.rejects(
      readJsonWithinBudget(stalled, Date.now() - 500, 100, 'late_body'),
      (error: unknown) => {
        assert.ok(isTimeoutError(error));
        assert.equal(error.timeoutMs, 1);
        return true;
      }
    );
  });
});
