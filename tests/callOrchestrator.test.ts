import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import {
  FakeConnector,
  FakeConversationSession,
  FakeTelephony,
  holdOpen,
  InMemoryRestaurantStore,
  RecordingCallLogSink,
  RecordingNotifier,
  restaurantDocument,
  tick,
} from './fakes';
import type { RestaurantLookup } from '../src/restaurants/restaurantResolver';

setTestEnv();

// 22:00 UTC is 18:00 in New York.
const EVENING = new Date('2026-10-19T22:00:00Z');

interface HarnessOptions {
  document?: Record<string, unknown>;
  connector?: FakeConnector;
  resolver?: RestaurantLookup;
  now?: Date;
  maxCallDurationMs?: number;
  forwardAckTimeoutMs?: number;
}

async function harness(options: HarnessOptions = {}) {
  const { CallOrchestrator } = await import('../src/calls/callOrchestrator');
  const { SessionRegistry } = await import('../src/calls/sessionRegistry');
  const { RestaurantConfigResolver } = await import('../src/restaurants/restaurantResolver');
  const { ToolDispatcher } = await import('../src/tools/toolDispatcher');

  const now = options.now ?? EVENING;
  const store = InMemoryRestaurantStore.with(options.document ?? restaurantDocument());
  const telephony = new FakeTelephony();
  const callLog = new RecordingCallLogSink();
  const notifier = new RecordingNotifier();
  const connector = options.connector ?? new FakeConnector();
  const registry = new SessionRegistry<InstanceType<typeof CallOrchestrator>>();
  const released: string[] = [];

  const orchestrator = new CallOrchestrator(
    { callId: 'call-1', from: '+15559990000', to: '+15550001111' },
    {
      resolver: options.resolver ?? new RestaurantConfigResolver(store, () => now),
      connector,
      telephony,
      dispatcher: new ToolDispatcher(),
      callLog,
      notifier,
      registry,
      settings: {
        mediaStreamUrl: (callId) => `wss://voice.example.test/v1/telnyx/media/${callId}?token=test-token`,
        maxCallDurationMs: options.maxCallDurationMs ?? 60_000,
        forwardAckTimeoutMs: options.forwardAckTimeoutMs ?? 1000,
        telephonyOutboundQueueMax: 50,
        callLogMaxAttempts: 1,
        callLogRetryBaseMs: 1,
      },
      onReleased: (owner) => released.push(owner.callId),
    },
  );
  registry.claim('call-1', orchestrator);

  return { orchestrator, telephony, callLog, notifier, connector, registry, released };
}

async function waitForState(orchestrator: { getState(): string }, state: string): Promise<void> {
  for (let i = 0; i < 200; i += 1) {
    if (orchestrator.getState() === state) return;
    await tick();
  }
  assert.fail(`call never reached ${state}; stuck in ${orchestrator.getState()}`);
}

test('a restaurant with the agent disabled is forwarded without opening a conversation', async () => {
  const { orchestrator, telephony, connector, callLog, notifier, registry, released } = await harness({
    document: restaurantDocument({ aiEnabled: false }),
  });

  const summary = await orchestrator.start();
  await tick();

  assert.equal(summary.finalState, 'FORWARDED');
  assert.equal(summary.handledBy, 'forwarded');
  assert.equal(summary.endReason, 'ai_disabled');
  assert.equal(summary.forwardingTarget, '+15550002222');
  assert.deepEqual(telephony.actions, [{ action: 'transfer', callId: 'call-1', to: '+15550002222' }]);
  assert.equal(connector.opened.length, 0);
  assert.equal(callLog.written.length, 1);
  assert.equal(notifier.sent.length, 1);
  assert.equal(registry.has('call-1'), false);
  assert.deepEqual(released, ['call-1']);
});

test('a call outside call hours bypasses the agent', async () => {
  const { orchestrator, telephony, connector } = await harness({
    document: restaurantDocument({ callHours: { start: '09:00', end: '21:00' } }),
    // 22:00 in New York
    now: new Date('2026-10-20T02:00:00Z'),
  });

  const summary = await orchestrator.start();

  assert.equal(summary.finalState, 'FORWARDED');
  assert.equal(summary.endReason, 'outside_call_hours');
  assert.equal(connector.opened.length, 0);
  assert.deepEqual(telephony.names(), ['transfer']);
});

test('forwarding without a configured number ends in an error', async () => {
  const { orchestrator, telephony } = await harness({
    document: restaurantDocument({ aiEnabled: false, forwardingNumber: null }),
  });

  const summary = await orchestrator.start();

  assert.equal(summary.finalState, 'ERROR_TERMINATED');
  assert.equal(summary.endReason, 'no_forwarding_number');
  assert.equal(summary.handledBy, 'unhandled');
  assert.deepEqual(telephony.names(), ['reject']);
});

test('an unknown dialed number is rejected', async () => {
  const { orchestrator, telephony } = await harness({
    document: restaurantDocument({ phoneNumbers: ['+15550007777'] }),
  });

  const summary = await orchestrator.start();

  assert.equal(summary.finalState, 'ERROR_TERMINATED');
  assert.equal(summary.endReason, 'restaurant_not_found');
  assert.equal(summary.restaurantId, undefined);
  assert.deepEqual(telephony.names(), ['reject']);
});

test('the agent answers, converses and ends the call once', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony, connector } = await harness({ connector: new FakeConnector(conversation) });

  const done = orchestrator.start();
  assert.equal(orchestrator.start(), done);
  await waitForState(orchestrator, 'AI_ACTIVE');

  conversation.emit({ type: 'agent_text', text: 'Good evening, Bella Cucina.' });
  conversation.emit({ type: 'user_transcript', text: 'Are you open late?' });
  conversation.emit({ type: 'tool_call', toolCallId: 'tc-1', name: 'end_call', parameters: {} });
  conversation.emit({ type: 'tool_call', toolCallId: 'tc-2', name: 'end_call', parameters: {} });

  const summary = await done;

  assert.equal(summary.finalState, 'ENDED_BY_TOOL');
  assert.equal(summary.endReason, 'agent_end_call');
  assert.equal(summary.handledBy, 'ai');
  assert.equal(summary.conversationId, 'conv-test');
  assert.deepEqual(
    summary.transcript.map((turn) => [turn.role, turn.text]),
    [
      ['agent', 'Good evening, Bella Cucina.'],
      ['user', 'Are you open late?'],
    ],
  );
  assert.deepEqual(
    summary.toolLog.map((entry) => entry.result),
    [{ ended: true }, { noop: true }],
  );
  assert.deepEqual(conversation.toolResults[0], { toolCallId: 'tc-1', result: '{"ended":true}', isError: false });
  assert.deepEqual(telephony.names(), ['answer', 'hangup']);
  assert.deepEqual(telephony.actions[0], {
    action: 'answer',
    callId: 'call-1',
    streamUrl: 'wss://voice.example.test/v1/telnyx/media/call-1?token=test-token',
    restaurantId: 'bella-cucina',
  });
  assert.equal(conversation.closed, true);
  assert.ok(Date.parse(summary.endedAt) >= Date.parse(summary.startedAt));

  const opened = connector.opened[0];
  assert.equal(opened.agentId, 'agent-test');
  assert.deepEqual(opened.enabledTools, ['end_call', 'get_address']);
  assert.deepEqual(opened.dynamicVariables, {
    restaurant_name: 'Bella Cucina',
    time_of_day: 'evening',
    greeting: 'Good evening',
    caller_number: '+15559990000',
  });
});

test('a tool outside the allow-list is refused and the call carries on', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony } = await harness({ connector: new FakeConnector(conversation) });

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  conversation.emit({ type: 'tool_call', toolCallId: 'tc-1', name: 'forward_call', parameters: {} });
  for (let i = 0; i < 5; i += 1) await tick();

  assert.equal(orchestrator.getState(), 'AI_ACTIVE');
  assert.deepEqual(conversation.toolResults, [
    { toolCallId: 'tc-1', result: '{"error":"tool disabled for this restaurant"}', isError: true },
  ]);

  orchestrator.onCallerHangup('normal_clearing');
  const summary = await done;

  assert.equal(summary.finalState, 'ENDED_BY_CALLER');
  assert.equal(summary.endReason, 'normal_clearing');
  assert.equal(summary.handledBy, 'ai');
  assert.equal(summary.toolLog[0].status, 'rejected');
  assert.deepEqual(telephony.names(), ['answer']);
});

test('the agent can hand the caller to staff', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony } = await harness({
    document: restaurantDocument({ enabledTools: ['forward_call'] }),
    connector: new FakeConnector(conversation),
  });

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  conversation.emit({ type: 'tool_call', toolCallId: 'tc-1', name: 'forward_call', parameters: {} });
  const summary = await done;

  assert.equal(summary.finalState, 'FORWARDED');
  assert.equal(summary.endReason, 'agent_forward');
  assert.equal(summary.handledBy, 'forwarded');
  assert.deepEqual(telephony.names(), ['answer', 'transfer']);
  assert.equal(conversation.closed, true);
});

test('a conversation that cannot be opened falls back to forwarding', async () => {
  const { orchestrator, telephony, connector } = await harness({
    connector: new FakeConnector(new Error('upstream busy'), new Error('upstream busy')),
  });

  const summary = await orchestrator.start();

  assert.equal(connector.opened.length, 2);
  assert.equal(summary.finalState, 'FORWARDED');
  assert.equal(summary.endReason, 'conversation_unavailable');
  assert.deepEqual(telephony.names(), ['transfer']);
});

test('one failed open is retried before giving up', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, connector } = await harness({
    connector: new FakeConnector(new Error('upstream busy'), conversation),
  });

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  assert.equal(connector.opened.length, 2);

  orchestrator.onCallerHangup();
  const summary = await done;
  assert.equal(summary.endReason, 'caller_hangup');
});

test('losing the conversation transport mid-call forwards the caller', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony } = await harness({ connector: new FakeConnector(conversation) });

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  conversation.emit({ type: 'error', kind: 'protocol_error', message: 'bad frame' });
  conversation.emit({ type: 'error', kind: 'transport_closed', message: 'code=1006' });
  const summary = await done;

  assert.equal(summary.finalState, 'FORWARDED');
  assert.equal(summary.endReason, 'conversation_lost');
  assert.equal(summary.handledBy, 'forwarded');
  assert.deepEqual(telephony.names(), ['answer', 'transfer']);
});

test('an unacknowledged transfer times out', async () => {
  const { orchestrator, telephony } = await harness({
    document: restaurantDocument({ aiEnabled: false }),
    forwardAckTimeoutMs: 20,
  });
  telephony.transferGate = new Promise<void>(() => undefined);

  const summary = await holdOpen(orchestrator.start());

  assert.equal(summary.finalState, 'ERROR_TERMINATED');
  assert.equal(summary.endReason, 'forward_timeout');
  assert.deepEqual(telephony.names(), ['transfer', 'reject']);
  assert.equal(telephony.transferSignals.length, 1);
  assert.equal(telephony.transferSignals[0].aborted, true);
});

test('a caller hangup cancels a transfer still in flight', async () => {
  const { orchestrator, telephony } = await harness({
    document: restaurantDocument({ aiEnabled: false }),
    forwardAckTimeoutMs: 60_000,
  });
  telephony.transferGate = new Promise<void>(() => undefined);

  const done = orchestrator.start();
  await waitForState(orchestrator, 'FORWARDING');
  for (let i = 0; i < 200 && telephony.transferSignals.length === 0; i += 1) await tick();
  assert.equal(telephony.transferSignals[0].aborted, false);

  orchestrator.onCallerHangup('normal_clearing');
  const summary = await done;

  assert.equal(summary.finalState, 'ENDED_BY_CALLER');
  assert.equal(telephony.transferSignals[0].aborted, true);
  assert.deepEqual(telephony.names(), ['transfer']);
});

test('a failed answer rejects the call and closes the conversation', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony } = await harness({ connector: new FakeConnector(conversation) });
  telephony.answerError = new Error('422 call not ringing');

  const summary = await orchestrator.start();

  assert.equal(summary.finalState, 'ERROR_TERMINATED');
  assert.equal(summary.endReason, 'answer_failed');
  assert.equal(summary.handledBy, 'unhandled');
  assert.deepEqual(telephony.names(), ['answer', 'reject']);
  assert.equal(conversation.closed, true);
});

test('a caller who hangs up during lookup leaves nothing to clean up on the carrier', async () => {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const { RestaurantConfigResolver } = await import('../src/restaurants/restaurantResolver');
  const inner = new RestaurantConfigResolver(InMemoryRestaurantStore.with(restaurantDocument()), () => EVENING);
  const slowResolver: RestaurantLookup = {
    resolve: async (lookup) => {
      await gate;
      return inner.resolve(lookup);
    },
  };
  const { orchestrator, telephony, connector } = await harness({ resolver: slowResolver });

  const done = orchestrator.start();
  await tick();
  orchestrator.onCallerHangup('normal_clearing');
  release();
  const summary = await done;

  assert.equal(summary.finalState, 'ENDED_BY_CALLER');
  assert.equal(summary.handledBy, 'unhandled');
  assert.deepEqual(telephony.actions, []);
  assert.equal(connector.opened.length, 0);
});

test('the call is hung up when it reaches the maximum duration', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator, telephony } = await harness({
    connector: new FakeConnector(conversation),
    maxCallDurationMs: 30,
  });

  const summary = await holdOpen(orchestrator.start());

  assert.equal(summary.finalState, 'ENDED_BY_TOOL');
  assert.equal(summary.endReason, 'max_duration');
  assert.deepEqual(telephony.names(), ['answer', 'hangup']);
});

test('media flows both ways and barge-in clears queued agent audio', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator } = await harness({ connector: new FakeConnector(conversation) });
  const frames: Buffer[] = [];
  let clears = 0;
  const sink = {
    canAccept: () => true,
    sendFrame: (frame: Buffer) => {
      frames.push(frame);
    },
    clear: () => {
      clears += 1;
    },
  };

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  orchestrator.onMediaStart('stream-1', sink);
  await tick();

  orchestrator.onMediaFrame({ streamId: 'stream-1', sequence: 1, payload: Buffer.alloc(160, 0xff) });
  orchestrator.onMediaFrame({ streamId: 'stream-1', sequence: 1, payload: Buffer.alloc(160, 0xff) });
  assert.equal(conversation.audio.length, 1);
  assert.equal(conversation.audio[0].length, 640);

  conversation.emit({ type: 'agent_audio', audio: Buffer.alloc(640), eventId: 1 });
  await tick();
  await tick();
  assert.equal(frames.length, 1);
  assert.equal(frames[0].length, 160);

  orchestrator.requestBargeIn();
  assert.equal(conversation.interrupts, 1);
  conversation.emit({ type: 'interruption', source: 'local' });
  await tick();
  await tick();
  assert.equal(clears, 1);

  orchestrator.onCallerHangup();
  const summary = await done;
  assert.equal(summary.audio.inboundFrames, 1);
  assert.equal(summary.audio.inboundDropped, 1);
  assert.equal(summary.audio.outboundFrames, 1);
});

test('a keypress after the agent session has ended does not interrupt it', async () => {
  const conversation = new FakeConversationSession();
  const { orchestrator } = await harness({ connector: new FakeConnector(conversation) });

  const done = orchestrator.start();
  await waitForState(orchestrator, 'AI_ACTIVE');
  orchestrator.onCallerHangup('normal_clearing');
  await done;

  orchestrator.requestBargeIn();
  assert.equal(conversation.interrupts, 0);
});
