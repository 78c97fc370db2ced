import test from 'node:test';
import assert from 'node:assert/strict';

import { buildRequestAbortError, ProviderError } from '../server/lib/errors.js';
import type { ProviderErrorKind } from '../server/lib/errors.js';
import type { FetchRequest } from '../server/services/dataProvider.js';
import { HttpDataProvider } from '../server/services/httpDataProvider.js';

const REQUEST: FetchRequest = {
  instrument: 'AAA.N',
  granularity: 'hourly',
  start: new Date('2024-01-01T00:00:00Z'),
  end: new Date('2024-02-01T00:00:00Z'),
};

function respondWith(body: unknown, status = 200): typeof fetch {
  return async () =>
    new Response(status === 204 ? null : typeof body === 'string' ? body : JSON.stringify(body), { status });
}

function providerWith(fetchImpl: typeof fetch, timeoutMs = 1_000): HttpDataProvider {
  return new HttpDataProvider({ baseUrl: 'http://provider.test/api/', apiKey: 'test-secret', timeoutMs, fetchImpl });
}

async function expectKind(promise: Promise<unknown>, kind: ProviderErrorKind, httpStatus?: number): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(err instanceof ProviderError);
    assert.equal(err.kind, kind);
    if (httpStatus !== undefined) assert.equal(err.httpStatus, httpStatus);
    return true;
  });
}

// ---------------------------------------------------------------------------
// buildUrl
// ---------------------------------------------------------------------------

test('buildUrl encodes the instrument, interval and period bounds', () => {
  const provider = providerWith(respondWith([]));
  assert.equal(
    provider.buildUrl(REQUEST),
    'http://provider.test/api/series/AAA.N?interval=hourly&start=2024-01-01T00%3A00%3A00.000Z&end=2024-02-01T00%3A00%3A00.000Z',
  );
  assert.equal(
    provider.buildUrl({ ...REQUEST, instrument: 'BRK/B', end: null }),
    'http://provider.test/api/series/BRK%2FB?interval=hourly&start=2024-01-01T00%3A00%3A00.000Z',
  );
});

test('buildUrl without a base URL fails as transient', () => {
  const provider = new HttpDataProvider({ baseUrl: '' });
  assert.throws(
    () => provider.buildUrl(REQUEST),
    (err: unknown) => err instanceof ProviderError && err.kind === 'transient',
  );
});

// ---------------------------------------------------------------------------
// Successful responses
// ---------------------------------------------------------------------------

test('fetch maps result rows into timestamp plus values', async () => {
  const provider = providerWith(
    respondWith({ results: [{ timestamp: '2024-01-02T00:00:00Z', close: 1.5, bid: { price: 1 } }], message: 'ok' }),
  );
  const rows = await provider.fetch(REQUEST);
  assert.deepEqual(rows, [{ timestamp: '2024-01-02T00:00:00Z', values: { close: 1.5, bid: { price: 1 } } }]);
});

test('fetch accepts a bare array payload', async () => {
  const provider = providerWith(respondWith([{ timestamp: 1704153600000, close: 2 }]));
  assert.deepEqual(await provider.fetch(REQUEST), [{ timestamp: 1704153600000, values: { close: 2 } }]);
});

test('fetch sends the api key and accept headers', async () => {
  let seenUrl = '';
  let seenHeaders: unknown = null;
  const fetchImpl: typeof fetch = async (input, init) => {
    seenUrl = String(input);
    seenHeaders = init?.headers ?? null;
    return new Response(JSON.stringify([{ timestamp: '2024-01-02T00:00:00Z', close: 1 }]), { status: 200 });
  };
  await providerWith(fetchImpl).fetch(REQUEST);
  assert.equal(seenUrl, providerWith(fetchImpl).buildUrl(REQUEST));
  assert.deepEqual(seenHeaders, { accept: 'application/json', 'x-api-key': 'test-secret' });
});

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

test('HTTP statuses map onto provider error kinds', async () => {
  await expectKind(providerWith(respondWith({ error: 'slow down' }, 429)).fetch(REQUEST), 'throttled', 429);
  await expectKind(providerWith(respondWith('', 404)).fetch(REQUEST), 'invalid-instrument', 404);
  await expectKind(providerWith(respondWith(null, 204)).fetch(REQUEST), 'not-found', 204);
  await expectKind(providerWith(respondWith({ error: 'rate limit exceeded' }, 503)).fetch(REQUEST), 'throttled', 503);
  await expectKind(providerWith(respondWith('upstream exploded', 500)).fetch(REQUEST), 'transient', 500);
});

test('API errors inside a 2xx body are classified by message', async () => {
  await expectKind(
    providerWith(respondWith({ status: 'ERROR', error: 'Unknown symbol XYZ' })).fetch(REQUEST),
    'invalid-instrument',
  );
  await expectKind(providerWith(respondWith({ error: 'No data for range' })).fetch(REQUEST), 'not-found');
  await expectKind(providerWith(respondWith({ status: 'ERROR' })).fetch(REQUEST), 'transient');
});

test('empty and malformed payloads', async () => {
  await expectKind(providerWith(respondWith({ results: [] })).fetch(REQUEST), 'not-found');
  await expectKind(providerWith(respondWith({ results: [{ close: 1 }] })).fetch(REQUEST), 'transient');
  await expectKind(providerWith(respondWith('not json')).fetch(REQUEST), 'transient');
});

test('network failures and timeouts are transient', async () => {
  const failing: typeof fetch = async () => {
    throw new TypeError('fetch failed');
  };
  await expectKind(providerWith(failing).fetch(REQUEST), 'transient');

  const hanging: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(buildRequestAbortError()), { once: true });
    });
  await expectKind(providerWith(hanging, 5).fetch(REQUEST), 'transient', 504);
});
