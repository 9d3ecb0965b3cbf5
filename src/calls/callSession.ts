import type { RestaurantConfig } from '../restaurants/restaurantConfig';
import type { CallSessionView } from '../tools/types';
import { assertTransition, isTerminalState } from './stateMachine';
import type {
  CallAudioStats,
  CallId,
  CallSessionConfig,
  CallState,
  CallSummary,
  HandledBy,
  SpeakerRole,
  TerminalCallState,
  ToolInvocation,
  Turn,
} from './types';

/**
 * Lifecycle record of one call. Only the orchestrator that owns it mutates it;
 * everything else reads it through {@link CallSession.view}.
 */
export class CallSession {
  public readonly callId: CallId;
  public readonly from?: string;
  public readonly to?: string;
  public readonly requestId?: string;
  public readonly startedAt: Date;

  public restaurant: RestaurantConfig | null = null;
  public conversationId: string | null = null;
  public forwardingTarget: string | null = null;
  public terminationRequested = false;
  public forwardingRequested = false;

  private state: CallState = 'INITIATED';
  private reachedAiActive = false;
  private endedAt: Date | null = null;
  private endReason: string | null = null;
  private handledBy: HandledBy | null = null;
  private readonly transcript: Turn[] = [];
  private readonly toolLog: ToolInvocation[] = [];
  private readonly clock: () => Date;

  constructor(config: CallSessionConfig, clock: () => Date = () => new Date()) {
    this.callId = config.callId;
    this.from = config.from;
    this.to = config.to;
    this.requestId = config.requestId;
    this.clock = clock;
    this.startedAt = clock();
  }

  public getState(): CallState {
    return this.state;
  }

  public isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  /** Throws InvalidTransitionError for anything the transition table forbids. */
  public transition(to: CallState, reason?: string): CallState {
    const from = this.state;
    assertTransition(from, to);
    this.state = to;

    if (to === 'AI_ACTIVE') {
      this.reachedAiActive = true;
    }
    if (to === 'FORWARDING') {
      this.forwardingRequested = true;
    }
    if (isTerminalState(to)) {
      this.terminationRequested = true;
      this.endedAt = this.clock();
      this.endReason = reason ?? to.toLowerCase();
    }
    return from;
  }

  public appendTurn(role: SpeakerRole, text: string): Turn | null {
    const trimmed = text.trim();
    if (!trimmed) return null;
    const turn: Turn = Object.freeze({
      role,
      text: trimmed,
      offsetMs: Math.max(0, this.clock().getTime() - this.startedAt.getTime()),
    });
    this.transcript.push(turn);
    return turn;
  }

  public recordToolInvocation(invocation: ToolInvocation): void {
    this.toolLog.push(invocation);
  }

  public view(): CallSessionView {
    return {
      callId: this.callId,
      state: this.state,
      terminationRequested: this.terminationRequested || this.isTerminal(),
      forwardingRequested: this.forwardingRequested,
    };
  }

  /** Idempotent; fixes the handled-by classification once terminal. */
  public finalize(): HandledBy {
    if (!isTerminalState(this.state)) {
      throw new Error(`cannot finalize call ${this.callId} in state ${this.state}`);
    }
    if (this.handledBy) return this.handledBy;

    if (!this.endedAt || this.endedAt.getTime() < this.startedAt.getTime()) {
      this.endedAt = new Date(this.startedAt.getTime());
    }
    if (this.state === 'FORWARDED') {
      this.handledBy = 'forwarded';
    } else if (this.reachedAiActive) {
      this.handledBy = 'ai';
    } else {
      this.handledBy = 'unhandled';
    }
    return this.handledBy;
  }

  public toSummary(audio: CallAudioStats): CallSummary {
    const handledBy = this.finalize();
    const finalState: CallState = this.state;
    const endedAt = this.endedAt ?? this.startedAt;

    return {
      callId: this.callId,
      restaurantId: this.restaurant?.restaurantId,
      restaurantName: this.restaurant?.name,
      from: this.from,
      to: this.to,
      conversationId: this.conversationId ?? undefined,
      startedAt: this.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - this.startedAt.getTime(),
      finalState: toTerminal(finalState),
      handledBy,
      endReason: this.endReason ?? 'unknown',
      forwardingTarget: this.forwardingTarget ?? undefined,
      transcript: this.transcript.map((turn) => ({ ...turn })),
      toolLog: this.toolLog.map((entry) => ({
        ...entry,
        parameters: { ...entry.parameters },
        result: { ...entry.result },
        invokedAt: entry.invokedAt.toISOString(),
      })),
      audio: { ...audio },
    };
  }
}

function toTerminal(state: CallState): TerminalCallState {
  if (!isTerminalState(state)) {
    throw new Error(`call state ${state} is not terminal`);
  }
  return state;
}
