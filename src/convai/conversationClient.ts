import WebSocket from 'ws';
import { z } from 'zod';
import { BoundedFrameQueue } from '../audio/frameQueue';
import { AudioFormat, parseAudioFormat } from '../audio/g711';
import { AsyncChannel } from '../calls/channel';
import type { ToolParameters, ToolParamValue } from '../calls/types';
import { ConnectFailureKind, ConversationConnectError } from '../errors';
import type { HttpFetch } from '../http';
import { log } from '../log';
import { incAudioFramesDropped } from '../metrics';
import { fetchSignedConversationUrl } from './signedUrl';
import type {
  ConversationConnector,
  ConversationErrorKind,
  ConversationEvent,
  ConversationOpenParams,
  ConversationSession,
  ToolResultMessage,
} from './types';

const DEFAULT_FORMAT: AudioFormat = { encoding: 'pcm16', sampleRateHz: 16000 };
const FLUSH_RETRY_MS = 10;

const InitiationMetadataSchema = z.object({
  type: z.literal('conversation_initiation_metadata'),
  conversation_initiation_metadata_event: z
    .object({
      conversation_id: z.string().optional(),
      agent_output_audio_format: z.string().optional(),
      user_input_audio_format: z.string().optional(),
    })
    .default({}),
});

const AudioMessageSchema = z.object({
  type: z.literal('audio'),
  audio_event: z.object({
    audio_base_64: z.string(),
    event_id: z.coerce.number().int(),
  }),
});

const AgentResponseSchema = z.object({
  type: z.literal('agent_response'),
  agent_response_event: z.object({ agent_response: z.string() }),
});

const UserTranscriptSchema = z.object({
  type: z.literal('user_transcript'),
  user_transcription_event: z.object({ user_transcript: z.string() }),
});

const InterruptionSchema = z.object({
  type: z.literal('interruption'),
  interruption_event: z.object({ event_id: z.coerce.number().int() }).optional(),
});

const PingSchema = z.object({
  type: z.literal('ping'),
  ping_event: z.object({ event_id: z.coerce.number().int(), ping_ms: z.number().nullish() }),
});

const ClientToolCallSchema = z.object({
  type: z.literal('client_tool_call'),
  client_tool_call: z.object({
    tool_name: z.string().min(1),
    tool_call_id: z.string().min(1),
    parameters: z.record(z.unknown()).default({}),
  }),
});

const ServerErrorSchema = z.object({
  type: z.literal('error'),
  message: z.string().optional(),
  error: z.unknown().optional(),
});

const ServerMessageSchema = z.discriminatedUnion('type', [
  InitiationMetadataSchema,
  AudioMessageSchema,
  AgentResponseSchema,
  UserTranscriptSchema,
  InterruptionSchema,
  PingSchema,
  ClientToolCallSchema,
  ServerErrorSchema,
]);

type ServerMessage = z.infer<typeof ServerMessageSchema>;

const KNOWN_TYPES: ReadonlySet<string> = new Set(ServerMessageSchema.options.map((option) => option.shape.type.value));

type ParsedFrame =
  | { kind: 'message'; message: ServerMessage }
  | { kind: 'ignored'; type: string }
  | { kind: 'invalid'; detail: string };

function parseServerFrame(raw: string): ParsedFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: 'invalid', detail: 'malformed json' };
  }

  const typeField =
    typeof parsed === 'object' && parsed !== null && 'type' in parsed && typeof parsed.type === 'string'
      ? parsed.type
      : null;
  if (!typeField) {
    return { kind: 'invalid', detail: 'missing type' };
  }
  if (!KNOWN_TYPES.has(typeField)) {
    return { kind: 'ignored', type: typeField };
  }

  const result = ServerMessageSchema.safeParse(parsed);
  if (!result.success) {
    return { kind: 'invalid', detail: `${typeField}: ${result.error.issues[0]?.message ?? 'invalid'}` };
  }
  return { kind: 'message', message: result.data };
}

function toToolParameters(raw: Record<string, unknown>): ToolParameters {
  const out: Record<string, ToolParamValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      out[key] = value;
    } else if (value !== undefined) {
      out[key] = JSON.stringify(value);
    }
  }
  return out;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function buildInitiationMessage(params: ConversationOpenParams): Record<string, unknown> {
  const agentOverride: Record<string, string> = {};
  if (params.firstMessage) agentOverride.first_message = params.firstMessage;
  if (params.language) agentOverride.language = params.language;

  const override: Record<string, unknown> = {};
  if (Object.keys(agentOverride).length > 0) override.agent = agentOverride;
  if (params.voiceId) override.tts = { voice_id: params.voiceId };

  return {
    type: 'conversation_initiation_client_data',
    conversation_config_override: override,
    dynamic_variables: {
      ...params.dynamicVariables,
      call_id: params.callId,
      enabled_tools: [...params.enabledTools].sort().join(','),
    },
  };
}

export interface ElevenLabsConnectorOptions {
  wsUrl: string;
  apiBaseUrl: string;
  apiKey?: string;
  connectTimeoutMs: number;
  outboundQueueMax: number;
  highWaterBytes: number;
  fetchImpl?: HttpFetch;
}

export interface SessionLimits {
  outboundQueueMax: number;
  highWaterBytes: number;
}

export class ElevenLabsConversationSession implements ConversationSession {
  public conversationId: string | null = null;
  public inputFormat: AudioFormat = DEFAULT_FORMAT;
  public outputFormat: AudioFormat = DEFAULT_FORMAT;
  public readonly events: AsyncChannel<ConversationEvent> = new AsyncChannel<ConversationEvent>();

  private readonly ws: WebSocket;
  private readonly callId: string;
  private readonly outbound: BoundedFrameQueue<string>;
  private readonly highWaterBytes: number;
  private flushTimer: NodeJS.Timeout | null = null;
  private ready = false;
  private closedLocally = false;
  private ended = false;
  private newestAudioEventId = -1;
  private interruptedThroughEventId = -1;

  constructor(ws: WebSocket, callId: string, limits: SessionLimits) {
    this.ws = ws;
    this.callId = callId;
    this.outbound = new BoundedFrameQueue<string>(limits.outboundQueueMax);
    this.highWaterBytes = limits.highWaterBytes;
  }

  public get droppedFrames(): number {
    return this.outbound.dropped;
  }

  public markReady(metadata: z.infer<typeof InitiationMetadataSchema>): void {
    const event = metadata.conversation_initiation_metadata_event;
    this.conversationId = event.conversation_id ?? null;
    this.inputFormat = parseAudioFormat(event.user_input_audio_format) ?? DEFAULT_FORMAT;
    this.outputFormat = parseAudioFormat(event.agent_output_audio_format) ?? DEFAULT_FORMAT;
    this.ready = true;
    this.flush();
  }

  public sendAudio(frame: Buffer): void {
    if (this.ended || frame.length === 0) return;
    const dropped = this.outbound.push(JSON.stringify({ user_audio_chunk: frame.toString('base64') }));
    if (dropped > 0) {
      incAudioFramesDropped('uplink', 'queue_overflow', dropped);
    }
    this.flush();
  }

  public interrupt(): void {
    if (this.ended) return;
    this.interruptedThroughEventId = Math.max(this.interruptedThroughEventId, this.newestAudioEventId);
    this.sendControl({ type: 'user_activity' });
    this.events.push({ type: 'interruption', source: 'local' });
  }

  public sendToolResult(message: ToolResultMessage): void {
    this.sendControl({
      type: 'client_tool_result',
      tool_call_id: message.toolCallId,
      result: message.result,
      is_error: message.isError,
    });
  }

  public close(): void {
    if (this.closedLocally) return;
    this.closedLocally = true;
    this.end();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, 'call_ended');
    }
  }

  /** Remote close after the session was ready. */
  public handleRemoteClose(code: number): void {
    if (this.closedLocally || this.ended) return;
    this.events.push({ type: 'error', kind: 'transport_closed', message: `code ${code}` });
    this.end();
  }

  public handleMessage(message: ServerMessage): void {
    if (this.ended) return;

    switch (message.type) {
      case 'conversation_initiation_metadata':
        return;
      case 'audio': {
        const eventId = message.audio_event.event_id;
        this.newestAudioEventId = Math.max(this.newestAudioEventId, eventId);
        if (eventId <= this.interruptedThroughEventId) {
          return;
        }
        this.events.push({
          type: 'agent_audio',
          audio: Buffer.from(message.audio_event.audio_base_64, 'base64'),
          eventId,
        });
        return;
      }
      case 'agent_response':
        this.events.push({ type: 'agent_text', text: message.agent_response_event.agent_response });
        return;
      case 'user_transcript':
        this.events.push({ type: 'user_transcript', text: message.user_transcription_event.user_transcript });
        return;
      case 'interruption': {
        const eventId = message.interruption_event?.event_id ?? this.newestAudioEventId;
        this.interruptedThroughEventId = Math.max(this.interruptedThroughEventId, eventId);
        this.events.push({ type: 'interruption', source: 'remote' });
        return;
      }
      case 'ping':
        this.sendControl({ type: 'pong', event_id: message.ping_event.event_id });
        return;
      case 'client_tool_call':
        this.events.push({
          type: 'tool_call',
          toolCallId: message.client_tool_call.tool_call_id,
          name: message.client_tool_call.tool_name,
          parameters: toToolParameters(message.client_tool_call.parameters),
        });
        return;
      case 'error':
        this.emitError('server_error', message.message ?? 'server error');
        return;
    }
  }

  public emitError(kind: ConversationErrorKind, message: string): void {
    if (this.ended) return;
    log.warn({ event: 'convai_error', call_id: this.callId, kind, message }, 'conversation error');
    this.events.push({ type: 'error', kind, message });
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.outbound.clear();
    this.events.close();
  }

  private sendControl(payload: Record<string, unknown>): void {
    if (this.ended || this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(JSON.stringify(payload));
  }

  private flush(): void {
    if (!this.ready || this.ended) return;

    while (
      this.outbound.length > 0 &&
      this.ws.readyState === WebSocket.OPEN &&
      this.ws.bufferedAmount < this.highWaterBytes
    ) {
      const next = this.outbound.shift();
      if (next === undefined) break;
      this.ws.send(next);
    }

    if (this.outbound.length > 0 && !this.flushTimer) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.flush();
      }, FLUSH_RETRY_MS);
      this.flushTimer.unref();
    }
  }
}

export class ElevenLabsConversationConnector implements ConversationConnector {
  private readonly options: ElevenLabsConnectorOptions;

  constructor(options: ElevenLabsConnectorOptions) {
    this.options = options;
  }

  /** One connect timeout bounds the whole attempt, signed url included. */
  public async open(params: ConversationOpenParams, signal?: AbortSignal): Promise<ConversationSession> {
    if (signal?.aborted) {
      throw new ConversationConnectError('aborted');
    }

    const deadline = Date.now() + this.options.connectTimeoutMs;
    const url = this.options.apiKey
      ? await this.signedUrl(this.options.apiKey, params, signal)
      : `${this.options.wsUrl}?agent_id=${encodeURIComponent(params.agentId)}`;

    return this.connect(url, params, Math.max(0, deadline - Date.now()), signal);
  }

  private async signedUrl(apiKey: string, params: ConversationOpenParams, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.connectTimeoutMs);
    timer.unref();

    try {
      return await fetchSignedConversationUrl({
        apiBaseUrl: this.options.apiBaseUrl,
        apiKey,
        agentId: params.agentId,
        signal: controller.signal,
        fetchImpl: this.options.fetchImpl,
      });
    } catch (error) {
      if (signal?.aborted) throw new ConversationConnectError('aborted');
      if (controller.signal.aborted) {
        log.warn(
          { event: 'convai_connect_failed', call_id: params.callId, kind: 'connect_timeout', detail: 'signed url' },
          'conversation connect failed',
        );
        throw new ConversationConnectError('connect_timeout', 'signed url');
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private connect(
    url: string,
    params: ConversationOpenParams,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ConversationSession> {
    return new Promise<ConversationSession>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConversationConnectError('aborted'));
        return;
      }

      const ws = new WebSocket(url);
      const session = new ElevenLabsConversationSession(ws, params.callId, {
        outboundQueueMax: this.options.outboundQueueMax,
        highWaterBytes: this.options.highWaterBytes,
      });
      let settled = false;

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const fail = (kind: ConnectFailureKind, detail?: string): void => {
        if (settled) return;
        settled = true;
        cleanup();
        if (ws.readyState !== WebSocket.CLOSED) {
          ws.terminate();
        }
        session.close();
        log.warn(
          { event: 'convai_connect_failed', call_id: params.callId, kind, detail },
          'conversation connect failed',
        );
        reject(new ConversationConnectError(kind, detail));
      };

      const onAbort = (): void => fail('aborted');
      const timer = setTimeout(() => fail('connect_timeout'), timeoutMs);
      timer.unref();
      signal?.addEventListener('abort', onAbort, { once: true });

      ws.on('unexpected-response', (_request, response) => {
        fail('upgrade_rejected', `status ${response.statusCode ?? 'unknown'}`);
      });

      ws.on('open', () => {
        if (settled) return;
        ws.send(JSON.stringify(buildInitiationMessage(params)));
      });

      ws.on('message', (data, isBinary) => {
        if (isBinary) {
          session.emitError('protocol_error', 'unexpected binary frame');
          return;
        }
        const frame = parseServerFrame(rawDataToString(data));
        if (frame.kind === 'ignored') {
          return;
        }
        if (frame.kind === 'invalid') {
          if (settled) session.emitError('protocol_error', frame.detail);
          return;
        }

        if (!settled) {
          if (frame.message.type !== 'conversation_initiation_metadata') {
            return;
          }
          settled = true;
          cleanup();
          session.markReady(frame.message);
          log.info(
            {
              event: 'convai_session_ready',
              call_id: params.callId,
              conversation_id: session.conversationId,
              input_format: frame.message.conversation_initiation_metadata_event.user_input_audio_format,
              output_format: frame.message.conversation_initiation_metadata_event.agent_output_audio_format,
            },
            'conversation session ready',
          );
          resolve(session);
          return;
        }

        session.handleMessage(frame.message);
      });

      ws.on('error', (error) => {
        if (!settled) {
          fail('socket_error', error.message);
          return;
        }
        log.warn({ event: 'convai_socket_error', call_id: params.callId, err: error }, 'conversation socket error');
      });

      ws.on('close', (code) => {
        if (!settled) {
          fail('closed_before_ready', `code ${code}`);
          return;
        }
        session.handleRemoteClose(code);
      });
    });
  }
}
