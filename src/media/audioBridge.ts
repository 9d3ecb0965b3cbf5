import { BoundedFrameQueue } from '../audio/frameQueue';
import { AudioFormat, TELEPHONY_FORMAT, transcode } from '../audio/g711';
import { incAudioFramesDropped } from '../metrics';

/** 20 ms of PCMU at 8 kHz. */
export const TELEPHONY_FRAME_BYTES = 160;
const PUMP_RETRY_MS = 20;

export interface TelephonySink {
  canAccept(): boolean;
  sendFrame(frame: Buffer): void;
  clear(): void;
}

export interface AudioUplink {
  sendAudio(frame: Buffer): void;
}

export interface InboundFrame {
  streamId: string;
  sequence: number;
  payload: Buffer;
}

export interface AudioBridgeStats {
  inboundFrames: number;
  inboundDropped: number;
  outboundFrames: number;
  outboundDropped: number;
}

export interface TelephonyAudioBridgeOptions {
  uplink: AudioUplink;
  /** Format the conversation session expects from the caller. */
  uplinkFormat: AudioFormat;
  /** Format the conversation session produces for the agent. */
  agentFormat: AudioFormat;
  outboundQueueMax: number;
}

export class TelephonyAudioBridge {
  private readonly uplink: AudioUplink;
  private readonly uplinkFormat: AudioFormat;
  private readonly agentFormat: AudioFormat;
  private readonly outbound: BoundedFrameQueue<Buffer>;
  private activeStreamId: string | null = null;
  private sink: TelephonySink | null = null;
  private lastSequence: number | null = null;
  private remainder: Buffer = Buffer.alloc(0);
  private pumpTimer: NodeJS.Timeout | null = null;
  private released = false;
  private readonly stats: AudioBridgeStats = {
    inboundFrames: 0,
    inboundDropped: 0,
    outboundFrames: 0,
    outboundDropped: 0,
  };

  constructor(options: TelephonyAudioBridgeOptions) {
    this.uplink = options.uplink;
    this.uplinkFormat = options.uplinkFormat;
    this.agentFormat = options.agentFormat;
    this.outbound = new BoundedFrameQueue<Buffer>(options.outboundQueueMax);
  }

  /** Replaces any previous leg; sequence tracking restarts with the new stream. */
  public attachStream(streamId: string, sink: TelephonySink): void {
    if (this.released) return;
    this.activeStreamId = streamId;
    this.sink = sink;
    this.lastSequence = null;
    this.pump();
  }

  public detachStream(streamId: string): void {
    if (this.activeStreamId !== streamId) return;
    this.activeStreamId = null;
    this.sink = null;
    this.lastSequence = null;
    this.cancelPumpRetry();
  }

  public get streamId(): string | null {
    return this.activeStreamId;
  }

  public onInboundFrame(frame: InboundFrame): void {
    if (this.released || frame.streamId !== this.activeStreamId) {
      this.dropInbound('inactive_stream');
      return;
    }
    if (this.lastSequence !== null && frame.sequence <= this.lastSequence) {
      this.dropInbound('duplicate_or_late');
      return;
    }
    this.lastSequence = frame.sequence;
    if (frame.payload.length === 0) {
      return;
    }

    this.stats.inboundFrames += 1;
    this.uplink.sendAudio(transcode(frame.payload, TELEPHONY_FORMAT, this.uplinkFormat));
  }

  public onAgentAudio(chunk: Buffer): void {
    if (this.released || chunk.length === 0) return;

    const encoded = transcode(chunk, this.agentFormat, TELEPHONY_FORMAT);
    let pending = this.remainder.length > 0 ? Buffer.concat([this.remainder, encoded]) : encoded;
    while (pending.length >= TELEPHONY_FRAME_BYTES) {
      const dropped = this.outbound.push(pending.subarray(0, TELEPHONY_FRAME_BYTES));
      if (dropped > 0) {
        this.stats.outboundDropped += dropped;
        incAudioFramesDropped('outbound', 'queue_overflow', dropped);
      }
      pending = pending.subarray(TELEPHONY_FRAME_BYTES);
    }
    this.remainder = Buffer.from(pending);
    this.pump();
  }

  /** Barge-in: discard queued agent audio and flush provider-side playback. */
  public clearOutbound(): void {
    const cleared = this.outbound.clear();
    this.remainder = Buffer.alloc(0);
    this.cancelPumpRetry();
    if (cleared > 0) {
      this.stats.outboundDropped += cleared;
      incAudioFramesDropped('outbound', 'barge_in', cleared);
    }
    this.sink?.clear();
  }

  public release(): void {
    if (this.released) return;
    this.released = true;
    this.outbound.clear();
    this.remainder = Buffer.alloc(0);
    this.cancelPumpRetry();
    this.sink = null;
    this.activeStreamId = null;
  }

  public get pendingOutboundFrames(): number {
    return this.outbound.length;
  }

  public getStats(): AudioBridgeStats {
    return { ...this.stats };
  }

  private pump(): void {
    const sink = this.sink;
    if (this.released || !sink) return;

    while (this.outbound.length > 0 && sink.canAccept()) {
      const frame = this.outbound.shift();
      if (!frame) break;
      sink.sendFrame(frame);
      this.stats.outboundFrames += 1;
    }

    if (this.outbound.length > 0) {
      this.schedulePumpRetry();
    }
  }

  private schedulePumpRetry(): void {
    if (this.pumpTimer) return;
    this.pumpTimer = setTimeout(() => {
      this.pumpTimer = null;
      this.pump();
    }, PUMP_RETRY_MS);
    this.pumpTimer.unref();
  }

  private cancelPumpRetry(): void {
    if (!this.pumpTimer) return;
    clearTimeout(this.pumpTimer);
    this.pumpTimer = null;
  }

  private dropInbound(reason: string): void {
    this.stats.inboundDropped += 1;
    incAudioFramesDropped('inbound', reason);
  }
}
