import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { HttpFetch, HttpRequestInit, HttpResponse } from '../src/http';

setTestEnv();

interface RecordedCall {
  url: string;
  init: HttpRequestInit;
}

function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers({ 'content-type': 'application/json' }),
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function scriptedFetch(...responses: Array<HttpResponse | Error>): { fetchImpl: HttpFetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: HttpFetch = async (url, init) => {
    calls.push({ url, init });
    const next = responses.shift() ?? jsonResponse(200, { data: {} });
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchImpl, calls };
}

function parseBody(call: RecordedCall | undefined): unknown {
  return call?.init.body ? JSON.parse(call.init.body) : undefined;
}

async function client(fetchImpl: HttpFetch, sleeps: number[] = []) {
  const { TelnyxCallControlClient } = await import('../src/telnyx/telnyxClient');
  return new TelnyxCallControlClient({
    apiKey: 'test-key',
    fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

test('answer opens a bidirectional PCMU stream and carries client state', async () => {
  const { fetchImpl, calls } = scriptedFetch();

  await (await client(fetchImpl)).answerWithStream('call-1', {
    streamUrl: 'wss://voice.example.test/v1/telnyx/media/call-1?token=test-token',
    clientState: { restaurant_id: 'bella-cucina', call_id: 'call-1' },
  });

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'https://api.telnyx.com/v2/calls/call-1/actions/answer');
  assert.equal(calls[0].init.method, 'POST');
  assert.equal(calls[0].init.headers.Authorization, 'Bearer test-key');
  assert.equal(calls[0].init.headers['Content-Type'], 'application/json');

  const body = parseBody(calls[0]);
  assert.ok(body !== null && typeof body === 'object' && 'client_state' in body && typeof body.client_state === 'string');
  assert.deepEqual(JSON.parse(Buffer.from(body.client_state, 'base64').toString('utf8')), {
    restaurant_id: 'bella-cucina',
    call_id: 'call-1',
  });
  assert.deepEqual({ ...body, client_state: undefined }, {
    stream_url: 'wss://voice.example.test/v1/telnyx/media/call-1?token=test-token',
    stream_track: 'inbound_track',
    stream_bidirectional_mode: 'rtp',
    stream_bidirectional_codec: 'PCMU',
    client_state: undefined,
  });
});

test('transfer, reject and hangup post their call-control actions', async () => {
  const { fetchImpl, calls } = scriptedFetch();
  const telnyx = await client(fetchImpl);

  await telnyx.transfer('call-1', '+15550002222');
  await telnyx.reject('call-2');
  await telnyx.hangup('call-3');

  assert.deepEqual(
    calls.map((call) => call.url),
    [
      'https://api.telnyx.com/v2/calls/call-1/actions/transfer',
      'https://api.telnyx.com/v2/calls/call-2/actions/reject',
      'https://api.telnyx.com/v2/calls/call-3/actions/hangup',
    ],
  );
  assert.deepEqual(parseBody(calls[0]), { to: '+15550002222' });
  assert.deepEqual(parseBody(calls[1]), { cause: 'CALL_REJECTED' });
  assert.equal(calls[2].init.body, undefined);
  assert.equal(calls[2].init.headers['Content-Type'], undefined);
});

test('rate limits and server errors are retried', async () => {
  const sleeps: number[] = [];
  const { fetchImpl, calls } = scriptedFetch(
    jsonResponse(503, { errors: [{ detail: 'unavailable' }] }),
    jsonResponse(429, { errors: [{ detail: 'slow down' }] }),
    jsonResponse(200, { data: {} }),
  );

  await (await client(fetchImpl, sleeps)).hangup('call-1');

  assert.equal(calls.length, 3);
  assert.equal(sleeps.length, 2);
  assert.ok(sleeps[0] >= 250 && sleeps[0] < 370);
  assert.ok(sleeps[1] >= 500 && sleeps[1] < 620);
});

test('a transfer aborted while waiting to retry is not sent again', async () => {
  const { TelnyxCallControlClient } = await import('../src/telnyx/telnyxClient');
  const { TelephonyActionError } = await import('../src/errors');
  const { fetchImpl, calls } = scriptedFetch(jsonResponse(503, { errors: [{ detail: 'unavailable' }] }));
  const controller = new AbortController();
  const telnyx = new TelnyxCallControlClient({
    apiKey: 'test-key',
    fetchImpl,
    sleep: async () => {
      controller.abort();
    },
  });

  await assert.rejects(
    telnyx.transfer('call-1', '+15550002222', controller.signal),
    (error: unknown) =>
      error instanceof TelephonyActionError && error.message === 'Telnyx call-control transfer aborted',
  );
  assert.equal(calls.length, 1);
});

test('a client error fails without retrying', async () => {
  const { TelephonyActionError } = await import('../src/errors');
  const { fetchImpl, calls } = scriptedFetch(jsonResponse(400, { errors: [{ detail: 'invalid to number' }] }));

  await assert.rejects((await client(fetchImpl)).transfer('call-1', 'nowhere'), (error: unknown) => {
    assert.ok(error instanceof TelephonyActionError);
    assert.equal(error.action, 'transfer');
    assert.equal(error.status, 400);
    return true;
  });
  assert.equal(calls.length, 1);
});

test('acting on a call that already ended is not an error', async () => {
  const { fetchImpl } = scriptedFetch(
    jsonResponse(422, { errors: [{ detail: 'Call has already ended' }] }),
  );

  await (await client(fetchImpl)).hangup('call-1');
});

test('network errors are retried until the budget runs out', async () => {
  const { TelephonyActionError } = await import('../src/errors');
  const sleeps: number[] = [];
  const { fetchImpl, calls } = scriptedFetch(
    new TypeError('fetch failed'),
    new TypeError('fetch failed'),
    new TypeError('fetch failed'),
  );

  await assert.rejects((await client(fetchImpl, sleeps)).reject('call-1'), TelephonyActionError);
  assert.equal(calls.length, 3);
  assert.equal(sleeps.length, 2);
});

test('stream urls are logged without their token', async () => {
  const { redactStreamUrl } = await import('../src/telnyx/telnyxClient');

  assert.equal(
    redactStreamUrl('wss://voice.example.test/v1/telnyx/media/call-1?token=test-token'),
    'wss://voice.example.test/v1/telnyx/media/call-1?token=%5Bredacted%5D',
  );
});
