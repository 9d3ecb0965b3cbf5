import type { ConversationConnector, ConversationEvent, ConversationSession } from '../convai/types';
import { errorMessage, RestaurantNotFoundError } from '../errors';
import { log } from '../log';
import { TelephonyAudioBridge, type InboundFrame, type TelephonySink } from '../media/audioBridge';
import { recordCallMetrics, startConversationOpenTimer } from '../metrics';
import type { CallNotifier } from '../notifications/callSummaryNotifier';
import { CallLogSink, deliverCallLog, logCallEvent } from '../observability/callLogs';
import { timeOfDay } from '../restaurants/callHours';
import type { RestaurantConfig } from '../restaurants/restaurantConfig';
import type { ResolvedRestaurant, RestaurantLookup } from '../restaurants/restaurantResolver';
import type { TelephonyControl } from '../telnyx/types';
import type { ToolDispatcher } from '../tools/toolDispatcher';
import type { ToolCall } from '../tools/types';
import { AsyncChannel } from './channel';
import { CallSession } from './callSession';
import type { SessionRegistry } from './sessionRegistry';
import type { CallAudioStats, CallSessionConfig, CallState, CallSummary, TerminalCallState } from './types';

const CONVERSATION_OPEN_ATTEMPTS = 2;

export interface OrchestratorSettings {
  mediaStreamUrl(callId: string): string;
  maxCallDurationMs: number;
  forwardAckTimeoutMs: number;
  telephonyOutboundQueueMax: number;
  callLogMaxAttempts: number;
  callLogRetryBaseMs: number;
}

export interface OrchestratorDeps {
  resolver: RestaurantLookup;
  connector: ConversationConnector;
  telephony: TelephonyControl;
  dispatcher: ToolDispatcher;
  callLog: CallLogSink;
  notifier: CallNotifier;
  registry: SessionRegistry<CallOrchestrator>;
  settings: OrchestratorSettings;
  clock?: () => Date;
  /** Called once every owned resource is released. */
  onReleased?: (orchestrator: CallOrchestrator) => void;
}

type InboxEvent =
  | { type: 'conversation'; event: ConversationEvent }
  | { type: 'caller_hangup'; cause?: string }
  | { type: 'media_start'; streamId: string; sink: TelephonySink }
  | { type: 'media_stop'; streamId: string }
  | { type: 'max_duration' };

type TelephonyFollowUp = 'reject' | 'hangup' | 'none';

class ForwardTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`forward not acknowledged within ${timeoutMs}ms`);
    this.name = 'ForwardTimeoutError';
  }
}

/**
 * Runs `work` under its own signal, linked to `parent` and aborted when the
 * deadline passes. Settles as soon as that signal aborts, whether or not
 * `work` honours it.
 */
async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  parent: AbortSignal,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  const followParent = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', followParent, { once: true });
  }

  const stopped = new Promise<never>((_resolve, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason);
      return;
    }
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(() => controller.abort(new ForwardTimeoutError(timeoutMs)), timeoutMs);
  timer.unref();

  try {
    return await Promise.race([work(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', followParent);
  }
}

function settleTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Owns one call end to end. All state changes happen on the single task that
 * runs {@link CallOrchestrator.start}; other callers only enqueue events.
 */
export class CallOrchestrator {
  public readonly session: CallSession;

  private readonly deps: OrchestratorDeps;
  private readonly clock: () => Date;
  private readonly inbox = new AsyncChannel<InboxEvent>();
  private readonly abort = new AbortController();
  private readonly logContext: Record<string, unknown>;
  private conversation: ConversationSession | null = null;
  private bridge: TelephonyAudioBridge | null = null;
  private maxDurationTimer: NodeJS.Timeout | null = null;
  private answered = false;
  private followUp: TelephonyFollowUp = 'none';
  private running: Promise<CallSummary> | null = null;
  private released = false;

  constructor(config: CallSessionConfig, deps: OrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
    this.session = new CallSession(config, this.clock);
    this.logContext = { call_id: config.callId, requestId: config.requestId };
  }

  public get callId(): string {
    return this.session.callId;
  }

  public getState(): CallState {
    return this.session.getState();
  }

  /** Idempotent; every caller gets the same summary promise. */
  public start(): Promise<CallSummary> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  public onCallerHangup(cause?: string): void {
    if (this.session.isTerminal()) return;
    this.abort.abort();
    this.inbox.push({ type: 'caller_hangup', cause });
  }

  public onMediaStart(streamId: string, sink: TelephonySink): void {
    this.inbox.push({ type: 'media_start', streamId, sink });
  }

  public onMediaStop(streamId: string): void {
    this.inbox.push({ type: 'media_stop', streamId });
  }

  /** Hot path: frames bypass the inbox and go straight to the bridge. */
  public onMediaFrame(frame: InboundFrame): void {
    this.bridge?.onInboundFrame(frame);
  }

  /** Caller barge-in signalled from the telephony side (e.g. a keypress). */
  public requestBargeIn(): void {
    if (this.session.getState() !== 'AI_ACTIVE') return;
    this.conversation?.interrupt();
  }

  private async run(): Promise<CallSummary> {
    logCallEvent('call_started', { ...this.logContext, from: this.session.from, to: this.session.to });
    try {
      await this.lifecycle();
    } catch (error) {
      log.error({ err: error, ...this.logContext, state: this.session.getState() }, 'call orchestrator fault');
      if (!this.session.isTerminal()) {
        this.followUp = this.answered ? 'hangup' : 'reject';
        this.terminate('ERROR_TERMINATED', 'internal_error');
      }
    }
    return this.finish();
  }

  private async lifecycle(): Promise<void> {
    const resolved = await this.resolveRestaurant();
    if (!resolved || this.session.isTerminal()) return;

    const { config, withinCallHours } = resolved;
    this.session.restaurant = config;
    this.logContext.restaurant_id = config.restaurantId;
    this.transition('CONFIG_RESOLVED', 'config_resolved');

    if (this.callerGone()) return;

    if (!config.aiEnabled) {
      await this.forward('ai_disabled');
      return;
    }
    if (!withinCallHours) {
      await this.forward('outside_call_hours');
      return;
    }

    const conversation = await this.openConversation(config, resolved.resolvedAt);
    if (this.callerGone()) {
      conversation?.close();
      return;
    }
    if (!conversation) {
      await this.forward('conversation_unavailable');
      return;
    }
    this.conversation = conversation;
    this.session.conversationId = conversation.conversationId;

    try {
      await this.deps.telephony.answerWithStream(this.callId, {
        streamUrl: this.deps.settings.mediaStreamUrl(this.callId),
        clientState: { restaurant_id: config.restaurantId, call_id: this.callId },
        signal: this.abort.signal,
      });
      this.answered = true;
    } catch (error) {
      if (this.callerGone()) return;
      log.error({ err: error, ...this.logContext }, 'answer with stream failed');
      this.followUp = 'reject';
      this.terminate('ERROR_TERMINATED', 'answer_failed');
      return;
    }
    if (this.callerGone()) return;

    this.bridge = new TelephonyAudioBridge({
      uplink: conversation,
      uplinkFormat: conversation.inputFormat,
      agentFormat: conversation.outputFormat,
      outboundQueueMax: this.deps.settings.telephonyOutboundQueueMax,
    });
    this.transition('AI_ACTIVE', 'conversation_ready');
    this.armMaxDuration();

    void this.pumpConversation(conversation).catch((error: unknown) => {
      log.error({ err: error, ...this.logContext }, 'conversation pump failed');
    });

    await this.eventLoop();
  }

  private async resolveRestaurant(): Promise<ResolvedRestaurant | null> {
    const lookup = this.session.to ?? '';
    try {
      return await this.deps.resolver.resolve(lookup);
    } catch (error) {
      if (this.callerGone()) return null;
      if (error instanceof RestaurantNotFoundError) {
        log.warn({ ...this.logContext, lookup, reason: error.reason }, 'restaurant not found');
        this.followUp = 'reject';
        this.terminate('ERROR_TERMINATED', 'restaurant_not_found');
        return null;
      }
      log.error({ err: error, ...this.logContext, lookup }, 'restaurant resolution failed');
      this.followUp = 'reject';
      this.terminate('ERROR_TERMINATED', 'config_resolution_failed');
      return null;
    }
  }

  /** One immediate retry; null means the call must fall back to forwarding. */
  private async openConversation(config: RestaurantConfig, resolvedAt: Date): Promise<ConversationSession | null> {
    const greeting = timeOfDay(resolvedAt, config.timezone);
    for (let attempt = 1; attempt <= CONVERSATION_OPEN_ATTEMPTS; attempt += 1) {
      const stopTimer = startConversationOpenTimer();
      try {
        const conversation = await this.deps.connector.open(
          {
            callId: this.callId,
            agentId: config.agentId,
            voiceId: config.voiceId,
            enabledTools: [...config.enabledTools],
            firstMessage: config.firstMessage,
            language: config.language,
            dynamicVariables: {
              restaurant_name: config.name,
              time_of_day: greeting,
              greeting: `Good ${greeting}`,
              caller_number: this.session.from ?? 'unknown',
            },
          },
          this.abort.signal,
        );
        stopTimer('ok');
        return conversation;
      } catch (error) {
        if (this.abort.signal.aborted) {
          stopTimer('aborted');
          return null;
        }
        stopTimer('failed');
        log.warn(
          { ...this.logContext, attempt, error: errorMessage(error) },
          'conversation open failed',
        );
      }
    }
    return null;
  }

  private async pumpConversation(conversation: ConversationSession): Promise<void> {
    for await (const event of conversation.events) {
      this.inbox.push({ type: 'conversation', event });
    }
  }

  private async eventLoop(): Promise<void> {
    while (!this.session.isTerminal()) {
      const next = await this.inbox.next();
      if (next.done) return;
      await this.handleEvent(next.value);
    }
  }

  private async handleEvent(item: InboxEvent): Promise<void> {
    switch (item.type) {
      case 'caller_hangup':
        this.terminate('ENDED_BY_CALLER', item.cause ?? 'caller_hangup');
        return;
      case 'max_duration':
        log.warn({ ...this.logContext, max_ms: this.deps.settings.maxCallDurationMs }, 'max call duration reached');
        this.followUp = 'hangup';
        this.terminate('ENDED_BY_TOOL', 'max_duration');
        return;
      case 'media_start':
        this.bridge?.attachStream(item.streamId, item.sink);
        logCallEvent('media_stream_started', { ...this.logContext, stream_id: item.streamId });
        return;
      case 'media_stop':
        this.bridge?.detachStream(item.streamId);
        logCallEvent('media_stream_stopped', { ...this.logContext, stream_id: item.streamId });
        return;
      case 'conversation':
        await this.handleConversationEvent(item.event);
        return;
    }
  }

  private async handleConversationEvent(event: ConversationEvent): Promise<void> {
    switch (event.type) {
      case 'agent_audio':
        this.bridge?.onAgentAudio(event.audio);
        return;
      case 'agent_text':
        this.session.appendTurn('agent', event.text);
        return;
      case 'user_transcript':
        this.session.appendTurn('user', event.text);
        return;
      case 'interruption':
        this.bridge?.clearOutbound();
        return;
      case 'tool_call':
        await this.handleToolCall(event);
        return;
      case 'error':
        if (event.kind === 'transport_closed') {
          log.warn({ ...this.logContext, detail: event.message }, 'conversation transport lost');
          await this.forward('conversation_lost');
          return;
        }
        log.warn({ ...this.logContext, kind: event.kind, detail: event.message }, 'conversation error ignored');
        return;
    }
  }

  private async handleToolCall(call: ToolCall): Promise<void> {
    const restaurant = this.session.restaurant;
    if (!restaurant) return;

    const { invocation, effect } = await this.deps.dispatcher.dispatch(call, {
      session: this.session.view(),
      restaurant,
    });
    this.session.recordToolInvocation(invocation);
    this.conversation?.sendToolResult({
      toolCallId: invocation.toolCallId,
      result: JSON.stringify(invocation.result),
      isError: invocation.status !== 'executed',
    });
    logCallEvent('tool_invoked', {
      ...this.logContext,
      tool: invocation.name,
      status: invocation.status,
      reason: invocation.reason,
    });

    if (!effect || this.session.isTerminal()) return;
    if (effect.kind === 'end_call') {
      this.session.terminationRequested = true;
      this.followUp = 'hangup';
      this.terminate('ENDED_BY_TOOL', effect.reason);
      return;
    }
    await this.forward('agent_forward');
  }

  private async forward(reason: string): Promise<void> {
    this.transition('FORWARDING', reason);
    this.stopConversation();

    const target = this.session.restaurant?.forwardingNumber;
    if (!target) {
      this.followUp = this.answered ? 'hangup' : 'reject';
      this.terminate('ERROR_TERMINATED', 'no_forwarding_number');
      return;
    }
    this.session.forwardingTarget = target;
    if (this.callerGone()) return;

    try {
      await withDeadline(
        (signal) => this.deps.telephony.transfer(this.callId, target, signal),
        this.abort.signal,
        this.deps.settings.forwardAckTimeoutMs,
      );
      if (this.callerGone()) return;
      this.terminate('FORWARDED', reason);
    } catch (error) {
      if (this.callerGone()) return;
      log.error({ err: error, ...this.logContext, target }, 'call forward failed');
      this.followUp = this.answered ? 'hangup' : 'reject';
      this.terminate('ERROR_TERMINATED', error instanceof ForwardTimeoutError ? 'forward_timeout' : 'forward_failed');
    }
  }

  /** Settles a pending caller hangup; true when the call is already over. */
  private callerGone(): boolean {
    if (this.session.isTerminal()) return true;
    if (!this.abort.signal.aborted) return false;
    this.followUp = 'none';
    this.terminate('ENDED_BY_CALLER', 'caller_hangup');
    return true;
  }

  private transition(to: CallState, reason: string): void {
    const from = this.session.transition(to, reason);
    logCallEvent('call_state_changed', { ...this.logContext, from, to, reason });
  }

  private terminate(state: TerminalCallState, reason: string): void {
    if (this.session.isTerminal()) return;
    if (state === 'ENDED_BY_CALLER' || state === 'FORWARDED') {
      this.followUp = 'none';
    }
    this.transition(state, reason);
  }

  private armMaxDuration(): void {
    const elapsed = this.clock().getTime() - this.session.startedAt.getTime();
    const remaining = Math.max(0, this.deps.settings.maxCallDurationMs - elapsed);
    this.maxDurationTimer = setTimeout(() => {
      this.maxDurationTimer = null;
      this.inbox.push({ type: 'max_duration' });
    }, remaining);
    this.maxDurationTimer.unref();
  }

  private stopConversation(): void {
    this.conversation?.close();
    this.bridge?.release();
  }

  private async finish(): Promise<CallSummary> {
    // Let frames already read off the sockets land in the inbox before draining.
    await settleTick();
    await this.drainInbox();

    const summary = this.session.toSummary(this.audioStats());
    logCallEvent('call_ended', {
      ...this.logContext,
      state: summary.finalState,
      handled_by: summary.handledBy,
      reason: summary.endReason,
      duration_ms: summary.durationMs,
    });
    recordCallMetrics({
      restaurantId: summary.restaurantId,
      state: summary.finalState,
      handledBy: summary.handledBy,
      durationMs: summary.durationMs,
    });

    await this.performFollowUp();
    this.publish(summary);
    this.release();
    return summary;
  }

  private async drainInbox(): Promise<void> {
    for (const item of this.inbox.drain()) {
      if (item.type === 'conversation' && item.event.type === 'tool_call') {
        await this.handleToolCall(item.event);
      }
    }
  }

  private async performFollowUp(): Promise<void> {
    const action = this.followUp;
    if (action === 'none') return;
    try {
      if (action === 'reject') {
        await this.deps.telephony.reject(this.callId);
      } else {
        await this.deps.telephony.hangup(this.callId);
      }
    } catch (error) {
      log.warn({ err: error, ...this.logContext, action }, 'terminal telephony action failed');
    }
  }

  private publish(summary: CallSummary): void {
    const { settings } = this.deps;
    void deliverCallLog(this.deps.callLog, summary, {
      maxAttempts: settings.callLogMaxAttempts,
      retryBaseMs: settings.callLogRetryBaseMs,
    }).catch((error: unknown) => {
      log.error({ err: error, ...this.logContext }, 'call log delivery crashed');
    });

    void this.deps.notifier
      .notify(summary, this.session.restaurant?.notifyEmail)
      .catch((error: unknown) => {
        log.warn({ err: error, ...this.logContext }, 'call summary notification failed');
      });
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    if (this.maxDurationTimer) {
      clearTimeout(this.maxDurationTimer);
      this.maxDurationTimer = null;
    }
    this.stopConversation();
    this.inbox.close();
    this.deps.registry.release(this.callId, this);
    this.deps.onReleased?.(this);
  }

  private audioStats(): CallAudioStats {
    const bridgeStats = this.bridge?.getStats();
    return {
      inboundFrames: bridgeStats?.inboundFrames ?? 0,
      inboundDropped: bridgeStats?.inboundDropped ?? 0,
      outboundFrames: bridgeStats?.outboundFrames ?? 0,
      outboundDropped: bridgeStats?.outboundDropped ?? 0,
      conversationDropped: this.conversation?.droppedFrames ?? 0,
    };
  }
}
