import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { CallSummary } from '../src/calls/types';

setTestEnv();

function summary(overrides: Partial<CallSummary> = {}): CallSummary {
  return {
    callId: 'call-1',
    restaurantId: 'bella-cucina',
    restaurantName: 'Bella Cucina',
    from: '+15559990000',
    to: '+15550001111',
    conversationId: 'conv-1',
    startedAt: '2026-10-19T22:00:00.000Z',
    endedAt: '2026-10-19T22:02:05.000Z',
    durationMs: 125_000,
    finalState: 'FORWARDED',
    handledBy: 'forwarded',
    endReason: 'agent_forward',
    forwardingTarget: '+15550002222',
    transcript: [
      { role: 'agent', text: 'Good evening', offsetMs: 900 },
      { role: 'user', text: 'Can I speak to someone?', offsetMs: 4100 },
    ],
    toolLog: [],
    audio: { inboundFrames: 10, inboundDropped: 0, outboundFrames: 8, outboundDropped: 0, conversationDropped: 0 },
    ...overrides,
  };
}

test('formats durations as minutes and seconds', async () => {
  const { formatDuration } = await import('../src/notifications/callSummaryNotifier');

  assert.equal(formatDuration(0), '0m 0s');
  assert.equal(formatDuration(59_999), '0m 59s');
  assert.equal(formatDuration(125_000), '2m 5s');
});

test('renders the summary email', async () => {
  const { renderCallSummary } = await import('../src/notifications/callSummaryNotifier');

  const rendered = renderCallSummary(summary());

  assert.equal(rendered.subject, 'Call Summary - +15559990000 - 2m 5s');
  assert.equal(
    rendered.body,
    [
      'Call Summary',
      '============',
      '',
      'Restaurant: Bella Cucina',
      'Caller: +15559990000',
      'Time: 2026-10-19 22:00:00 UTC',
      'Duration: 2m 5s',
      'Handled by: forwarded',
      'Forwarded: Yes, to +15550002222',
      '',
      'Transcript:',
      'Agent: Good evening',
      'Caller: Can I speak to someone?',
      '',
    ].join('\n'),
  );
});

test('renders an unanswered call without a transcript', async () => {
  const { renderCallSummary } = await import('../src/notifications/callSummaryNotifier');

  const rendered = renderCallSummary(
    summary({
      from: undefined,
      restaurantName: undefined,
      restaurantId: undefined,
      handledBy: 'unhandled',
      forwardingTarget: undefined,
      transcript: [],
      durationMs: 800,
    }),
  );

  assert.equal(rendered.subject, 'Call Summary - unknown caller - 0m 0s');
  assert.equal(rendered.body.endsWith('Handled by: unhandled\nForwarded: No\n'), true);
  assert.equal(rendered.body.includes('Restaurant: unknown\n'), true);
});

test('webhook notifier posts the rendered summary', async () => {
  const { WebhookCallNotifier } = await import('../src/notifications/callSummaryNotifier');
  const posted: Array<{ url: string; method: string; body?: string }> = [];
  const notifier = new WebhookCallNotifier('https://hooks.example.test/call-summary', async (url, init) => {
    posted.push({ url, method: init.method, body: init.body });
    return {
      ok: true,
      status: 202,
      headers: new Headers(),
      json: async () => ({}),
      text: async () => '',
    };
  });

  await notifier.notify(summary(), 'owner@example.test');

  assert.equal(posted.length, 1);
  assert.equal(posted[0].url, 'https://hooks.example.test/call-summary');
  assert.equal(posted[0].method, 'POST');
  const body: unknown = JSON.parse(posted[0].body ?? '{}');
  assert.ok(body !== null && typeof body === 'object');
  assert.equal('to' in body ? body.to : undefined, 'owner@example.test');
  assert.equal('subject' in body ? body.subject : undefined, 'Call Summary - +15559990000 - 2m 5s');
});

test('webhook notifier surfaces a failed delivery', async () => {
  const { WebhookCallNotifier } = await import('../src/notifications/callSummaryNotifier');
  const notifier = new WebhookCallNotifier('https://hooks.example.test/call-summary', async () => ({
    ok: false,
    status: 503,
    headers: new Headers({ 'content-type': 'text/plain' }),
    json: async () => ({}),
    text: async () => 'try later',
  }));

  await assert.rejects(notifier.notify(summary()), /notify webhook failed: 503 try later/);
});

test('call log delivery retries with exponential backoff', async () => {
  const { deliverCallLog } = await import('../src/observability/callLogs');
  const waits: number[] = [];
  let attempts = 0;
  const flaky = {
    write: async () => {
      attempts += 1;
      if (attempts < 3) throw new Error('redis timeout');
    },
  };

  const delivered = await deliverCallLog(flaky, summary(), {
    maxAttempts: 5,
    retryBaseMs: 100,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });

  assert.equal(delivered, true);
  assert.equal(attempts, 3);
  assert.deepEqual(waits, [100, 200]);
});

test('call log delivery gives up after the last attempt', async () => {
  const { deliverCallLog } = await import('../src/observability/callLogs');
  const waits: number[] = [];

  const delivered = await deliverCallLog(
    {
      write: async () => {
        throw new Error('redis down');
      },
    },
    summary(),
    { maxAttempts: 3, retryBaseMs: 10, sleep: async (ms) => void waits.push(ms) },
  );

  assert.equal(delivered, false);
  assert.deepEqual(waits, [10, 20]);
});

test('redis sink upserts the record and indexes it by restaurant', async () => {
  const { RedisCallLogSink } = await import('../src/observability/callLogs');
  const sets: Array<[string, string]> = [];
  const zadds: Array<[string, number, string]> = [];
  const sink = new RedisCallLogSink({
    set: async (key, value) => {
      sets.push([key, value]);
      return 'OK';
    },
    zadd: async (key, score, member) => {
      zadds.push([key, score, member]);
      return 1;
    },
  });

  await sink.write(summary());
  await sink.write(summary({ restaurantId: undefined, callId: 'call-2' }));

  assert.deepEqual(
    sets.map(([key]) => key),
    ['calllog:call:call-1', 'calllog:call:call-2'],
  );
  assert.deepEqual(zadds, [['calllog:restaurant:bella-cucina', Date.parse('2026-10-19T22:00:00.000Z'), 'call-1']]);
  assert.equal(JSON.parse(sets[0][1]).endReason, 'agent_forward');
});
