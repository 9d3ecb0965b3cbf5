import { z } from 'zod';
import type { TelephonySink } from './audioBridge';

const ConnectedMessageSchema = z.object({
  event: z.literal('connected'),
  version: z.string().optional(),
});

const StartMessageSchema = z.object({
  event: z.literal('start'),
  sequence_number: z.coerce.number().int().optional(),
  stream_id: z.string().min(1),
  start: z
    .object({
      call_control_id: z.string().min(1).optional(),
      client_state: z.string().optional(),
      media_format: z
        .object({
          encoding: z.string().optional(),
          sample_rate: z.coerce.number().int().optional(),
          channels: z.coerce.number().int().optional(),
        })
        .optional(),
    })
    .default({}),
});

const MediaMessageSchema = z.object({
  event: z.literal('media'),
  sequence_number: z.coerce.number().int().nonnegative(),
  stream_id: z.string().min(1),
  media: z.object({
    track: z.string().optional(),
    chunk: z.coerce.number().int().optional(),
    timestamp: z.coerce.number().optional(),
    payload: z.string(),
  }),
});

const StopMessageSchema = z.object({
  event: z.literal('stop'),
  stream_id: z.string().min(1).optional(),
});

const TelnyxMediaMessageSchema = z.discriminatedUnion('event', [
  ConnectedMessageSchema,
  StartMessageSchema,
  MediaMessageSchema,
  StopMessageSchema,
]);

export type TelnyxMediaMessage = z.infer<typeof TelnyxMediaMessageSchema>;

/** Returns null for malformed or unrecognised frames (e.g. `mark`, `dtmf`). */
export function parseTelnyxMediaMessage(raw: string): TelnyxMediaMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = TelnyxMediaMessageSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export interface MediaSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
}

const WS_OPEN = 1;

/** Outbound half of a Telnyx bidirectional media stream. */
export class TelnyxMediaSink implements TelephonySink {
  private readonly socket: MediaSocket;
  private readonly highWaterBytes: number;

  constructor(socket: MediaSocket, highWaterBytes: number) {
    this.socket = socket;
    this.highWaterBytes = highWaterBytes;
  }

  public canAccept(): boolean {
    return this.socket.readyState === WS_OPEN && this.socket.bufferedAmount < this.highWaterBytes;
  }

  public sendFrame(frame: Buffer): void {
    if (this.socket.readyState !== WS_OPEN) return;
    this.socket.send(JSON.stringify({ event: 'media', media: { payload: frame.toString('base64') } }));
  }

  public clear(): void {
    if (this.socket.readyState !== WS_OPEN) return;
    this.socket.send(JSON.stringify({ event: 'clear' }));
  }
}
