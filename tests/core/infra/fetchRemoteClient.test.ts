import assert from 'node:assert/strict';
import test from 'node:test';

import { FetchRemoteClient, classifyStatus } from '../../../src';

type RecordedCall = { url: string; method: string | undefined; headers: Headers; body: string | null };

const respondWith = (response: () => Response) => {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : null,
    });
    return response();
  };

  return { calls, fetchImpl };
};

const json = (body: unknown, status = 200, statusText = '') =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });

test('sends JSON with the bearer token to the joined URL', async () => {
  const { calls, fetchImpl } = respondWith(() => json({ RAI_ID: 5 }, 201));
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test/', fetchImpl });

  const result = await client.request({
    method: 'POST',
    path: '/raids',
    authToken: 'test-token',
    body: { RAI_NAME: 'Raid' },
  });

  assert.deepEqual(result, { ok: true, status: 201, data: { RAI_ID: 5 } });
  assert.equal(calls[0]?.url, 'https://api.example.test/raids');
  assert.equal(calls[0]?.method, 'POST');
  assert.equal(calls[0]?.headers.get('authorization'), 'Bearer test-token');
  assert.equal(calls[0]?.headers.get('content-type'), 'application/json');
  assert.equal(calls[0]?.headers.get('accept'), 'application/json');
  assert.equal(calls[0]?.body, '{"RAI_NAME":"Raid"}');
});

test('reads without a token or body send neither header', async () => {
  const { calls, fetchImpl } = respondWith(() => json([]));
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });

  await client.request({ method: 'GET', path: '/raids', authToken: null });

  assert.equal(calls[0]?.headers.get('authorization'), null);
  assert.equal(calls[0]?.headers.get('content-type'), null);
  assert.equal(calls[0]?.body, null);
});

test('empty and 204 responses carry null data', async () => {
  const noContent = new FetchRemoteClient({
    baseUrl: 'https://api.example.test',
    fetchImpl: respondWith(() => new Response(null, { status: 204 })).fetchImpl,
  });
  const empty = new FetchRemoteClient({
    baseUrl: 'https://api.example.test',
    fetchImpl: respondWith(() => new Response('', { status: 200 })).fetchImpl,
  });

  assert.deepEqual(await noContent.request({ method: 'DELETE', path: '/raids/1' }), {
    ok: true,
    status: 204,
    data: null,
  });
  assert.deepEqual(await empty.request({ method: 'GET', path: '/raids' }), {
    ok: true,
    status: 200,
    data: null,
  });
});

test('validation responses expose their message and field errors', async () => {
  const { fetchImpl } = respondWith(() =>
    json(
      { message: 'The given data was invalid.', errors: { RAI_NAME: ['The name is required.'] } },
      422,
    ),
  );
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });

  assert.deepEqual(await client.request({ method: 'POST', path: '/raids', body: {} }), {
    ok: false,
    failure: {
      kind: 'client',
      status: 422,
      message: 'The given data was invalid.',
      fieldErrors: { RAI_NAME: ['The name is required.'] },
    },
  });
});

test('server errors without a readable body get a status message', async () => {
  const { fetchImpl } = respondWith(
    () => new Response('<html>oops</html>', { status: 500, statusText: 'Internal Server Error' }),
  );
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });

  assert.deepEqual(await client.request({ method: 'GET', path: '/raids' }), {
    ok: false,
    failure: {
      kind: 'server',
      status: 500,
      message: 'Request failed with status 500 Internal Server Error.',
    },
  });
});

test('statuses are classified into transient and refused', () => {
  assert.equal(classifyStatus(503), 'server');
  assert.equal(classifyStatus(408), 'server');
  assert.equal(classifyStatus(429), 'server');
  assert.equal(classifyStatus(401), 'client');
  assert.equal(classifyStatus(404), 'client');
  assert.equal(classifyStatus(422), 'client');
});

test('a successful response with a broken body is a server failure', async () => {
  const { fetchImpl } = respondWith(() => new Response('{"RAI_ID":', { status: 200 }));
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });

  const result = await client.request({ method: 'GET', path: '/raids/1' });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.failure.kind, 'server');
    assert.equal(result.failure.status, 200);
    assert.equal(result.failure.message, 'Response body was not valid JSON.');
  }
});

test('network errors are connectivity failures', async () => {
  const fetchImpl: typeof fetch = async () => {
    throw new TypeError('fetch failed');
  };
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });

  const result = await client.request({ method: 'GET', path: '/raids' });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.failure.kind, 'connectivity');
    assert.equal(result.failure.status, null);
    assert.equal(result.failure.message, 'Network request failed.');
  }
});

const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

test('requests exceeding the timeout are connectivity failures', async () => {
  const client = new FetchRemoteClient({
    baseUrl: 'https://api.example.test',
    timeoutMs: 5,
    fetchImpl: hangingFetch,
  });

  const result = await client.request({ method: 'GET', path: '/raids' });

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.failure.kind, 'connectivity');
    assert.equal(result.failure.message, 'Request timed out after 5 ms.');
  }
});

test('caller aborts are reported as cancelled', async () => {
  const client = new FetchRemoteClient({
    baseUrl: 'https://api.example.test',
    fetchImpl: hangingFetch,
  });
  const controller = new AbortController();

  const pending = client.request({ method: 'GET', path: '/raids', signal: controller.signal });
  controller.abort();
  const result = await pending;

  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.failure.kind, 'cancelled');
  }
});

test('an already aborted signal never reaches the network', async () => {
  const { calls, fetchImpl } = respondWith(() => json([]));
  const client = new FetchRemoteClient({ baseUrl: 'https://api.example.test', fetchImpl });
  const controller = new AbortController();
  controller.abort();

  const result = await client.request({ method: 'GET', path: '/raids', signal: controller.signal });

  assert.deepEqual(result, {
    ok: false,
    failure: { kind: 'cancelled', status: null, message: 'Request aborted.' },
  });
  assert.equal(calls.length, 0);
});
