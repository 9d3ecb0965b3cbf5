import type { AudioFormat } from '../src/audio/g711';
import { AsyncChannel } from '../src/calls/channel';
import type { CallSummary } from '../src/calls/types';
import type {
  ConversationConnector,
  ConversationEvent,
  ConversationOpenParams,
  ConversationSession,
  ToolResultMessage,
} from '../src/convai/types';
import type { CallNotifier } from '../src/notifications/callSummaryNotifier';
import type { CallLogSink } from '../src/observability/callLogs';
import {
  StoredRestaurantConfigSchema,
  toRestaurantConfig,
  type RestaurantConfig,
} from '../src/restaurants/restaurantConfig';
import type { RestaurantStore } from '../src/restaurants/restaurantStore';
import type { AnswerWithStreamOptions, TelephonyControl } from '../src/telnyx/types';

export function restaurantDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    contractVersion: 'v1',
    restaurantId: 'bella-cucina',
    name: 'Bella Cucina',
    address: '12 Harbor Street, Springfield',
    timezone: 'America/New_York',
    phoneNumbers: ['+15550001111'],
    aiEnabled: true,
    callHours: { start: '00:00', end: '00:00' },
    forwardingNumber: '+15550002222',
    agent: { agentId: 'agent-test', voiceId: 'voice-test' },
    enabledTools: ['end_call', 'get_address'],
    ...overrides,
  };
}

export function restaurantConfig(overrides: Record<string, unknown> = {}): RestaurantConfig {
  return toRestaurantConfig(StoredRestaurantConfigSchema.parse(restaurantDocument(overrides)));
}

export class InMemoryRestaurantStore implements RestaurantStore {
  public readonly numbers = new Map<string, string>();
  public readonly documents = new Map<string, string>();

  public static with(document: Record<string, unknown>): InMemoryRestaurantStore {
    const store = new InMemoryRestaurantStore();
    store.put(document);
    return store;
  }

  public put(document: Record<string, unknown>): void {
    const parsed = StoredRestaurantConfigSchema.parse(document);
    this.documents.set(parsed.restaurantId, JSON.stringify(document));
    for (const number of parsed.phoneNumbers) {
      this.numbers.set(number, parsed.restaurantId);
    }
  }

  public async findRestaurantIdByNumber(e164: string): Promise<string | null> {
    return this.numbers.get(e164) ?? null;
  }

  public async loadConfigDocument(restaurantId: string): Promise<string | null> {
    return this.documents.get(restaurantId) ?? null;
  }
}

const PCM_16K: AudioFormat = { encoding: 'pcm16', sampleRateHz: 16000 };

export class FakeConversationSession implements ConversationSession {
  public conversationId: string | null = 'conv-test';
  public inputFormat: AudioFormat = PCM_16K;
  public outputFormat: AudioFormat = PCM_16K;
  public droppedFrames = 0;
  public readonly events = new AsyncChannel<ConversationEvent>();
  public readonly audio: Buffer[] = [];
  public readonly toolResults: ToolResultMessage[] = [];
  public interrupts = 0;
  public closed = false;

  public emit(event: ConversationEvent): void {
    this.events.push(event);
  }

  public sendAudio(frame: Buffer): void {
    this.audio.push(frame);
  }

  public interrupt(): void {
    this.interrupts += 1;
  }

  public sendToolResult(message: ToolResultMessage): void {
    this.toolResults.push(message);
  }

  public close(): void {
    this.closed = true;
    this.events.close();
  }
}

export class FakeConnector implements ConversationConnector {
  public readonly opened: ConversationOpenParams[] = [];
  private readonly outcomes: Array<FakeConversationSession | Error>;

  constructor(...outcomes: Array<FakeConversationSession | Error>) {
    this.outcomes = outcomes;
  }

  public async open(params: ConversationOpenParams): Promise<ConversationSession> {
    this.opened.push(params);
    const outcome = this.outcomes.shift() ?? new Error('no conversation scripted');
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

export type TelephonyAction =
  | { action: 'answer'; callId: string; streamUrl: string; restaurantId: string }
  | { action: 'transfer'; callId: string; to: string }
  | { action: 'reject'; callId: string }
  | { action: 'hangup'; callId: string };

export class FakeTelephony implements TelephonyControl {
  public readonly actions: TelephonyAction[] = [];
  public answerError: Error | null = null;
  public transferError: Error | null = null;
  /** When set, transfer waits on this promise before resolving. */
  public transferGate: Promise<void> | null = null;
  public readonly transferSignals: AbortSignal[] = [];

  public async answerWithStream(callId: string, options: AnswerWithStreamOptions): Promise<void> {
    this.actions.push({
      action: 'answer',
      callId,
      streamUrl: options.streamUrl,
      restaurantId: options.clientState.restaurant_id,
    });
    if (this.answerError) throw this.answerError;
  }

  public async transfer(callId: string, to: string, signal?: AbortSignal): Promise<void> {
    this.actions.push({ action: 'transfer', callId, to });
    if (signal) this.transferSignals.push(signal);
    if (this.transferGate) await this.transferGate;
    if (this.transferError) throw this.transferError;
  }

  public async reject(callId: string): Promise<void> {
    this.actions.push({ action: 'reject', callId });
  }

  public async hangup(callId: string): Promise<void> {
    this.actions.push({ action: 'hangup', callId });
  }

  public names(): string[] {
    return this.actions.map((entry) => entry.action);
  }
}

export class RecordingCallLogSink implements CallLogSink {
  public readonly written: CallSummary[] = [];

  public async write(summary: CallSummary): Promise<void> {
    this.written.push(summary);
  }
}

export class RecordingNotifier implements CallNotifier {
  public readonly sent: Array<{ summary: CallSummary; recipient?: string }> = [];

  public async notify(summary: CallSummary, recipient?: string): Promise<void> {
    this.sent.push({ summary, recipient });
  }
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Keeps the event loop alive while code under test waits on unref'd timers. */
export async function holdOpen<T>(work: Promise<T>): Promise<T> {
  const keepAlive = setInterval(() => undefined, 1000);
  try {
    return await work;
  } finally {
    clearInterval(keepAlive);
  }
}
