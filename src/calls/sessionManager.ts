import { SessionConflictError } from '../errors';
import { log } from '../log';
import { TelnyxMediaSink, type MediaSocket, type TelnyxMediaMessage } from '../media/telnyxMediaStream';
import { setActiveCalls } from '../metrics';
import { CallOrchestrator, type OrchestratorDeps } from './callOrchestrator';
import { SessionRegistry } from './sessionRegistry';
import type { CallId, CallSessionConfig, CallSummary } from './types';

interface WorkItem {
  name: string;
  run: () => Promise<void> | void;
}

interface QueueState {
  items: WorkItem[];
  running: boolean;
}

export interface SessionLogContext {
  requestId?: string;
  restaurantId?: string;
}

export interface MediaConnection {
  close: (code?: number, reason?: string) => void;
}

export type SessionManagerDeps = Omit<OrchestratorDeps, 'registry' | 'onReleased'> & {
  telephonyHighWaterBytes: number;
};

export class SessionManager {
  private readonly registry = new SessionRegistry<CallOrchestrator>();
  private readonly queues = new Map<CallId, QueueState>();
  private readonly mediaConnections = new Map<CallId, Set<MediaConnection>>();
  private readonly completions = new Map<CallId, Promise<CallSummary>>();
  private readonly deps: SessionManagerDeps;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
  }

  public enqueue(callId: CallId, task: WorkItem): void {
    const queue = this.queues.get(callId) ?? { items: [], running: false };
    queue.items.push(task);
    this.queues.set(callId, queue);

    if (!queue.running) {
      queue.running = true;
      setImmediate(() => {
        void this.runQueue(callId, queue);
      });
    }
  }

  /** Returns null when a session for the call id is already active. */
  public handleInboundCall(config: CallSessionConfig, context: SessionLogContext = {}): CallOrchestrator | null {
    const orchestrator = new CallOrchestrator(
      { ...config, requestId: context.requestId ?? config.requestId },
      {
        ...this.deps,
        registry: this.registry,
        onReleased: (released) => this.onReleased(released),
      },
    );

    try {
      this.registry.claim(config.callId, orchestrator);
    } catch (error) {
      if (error instanceof SessionConflictError) {
        log.info(
          { event: 'call_session_exists', call_id: config.callId, requestId: context.requestId },
          'call session exists',
        );
        return null;
      }
      throw error;
    }
    setActiveCalls(this.registry.size);

    const completion = orchestrator.start();
    this.completions.set(config.callId, completion);
    void completion
      .catch((error: unknown) => {
        log.error({ err: error, call_id: config.callId }, 'call session crashed');
      })
      .finally(() => {
        if (this.completions.get(config.callId) === completion) {
          this.completions.delete(config.callId);
        }
      });

    log.info(
      {
        event: 'call_session_created',
        call_id: config.callId,
        from: config.from,
        to: config.to,
        requestId: context.requestId,
      },
      'call session created',
    );
    return orchestrator;
  }

  public onHangup(callId: CallId, cause?: string, context: SessionLogContext = {}): void {
    const orchestrator = this.registry.get(callId);
    if (!orchestrator) {
      log.info(
        {
          event: 'call_session_hangup_missing',
          call_id: callId,
          cause,
          restaurant_id: context.restaurantId,
          requestId: context.requestId,
        },
        'call session missing on hangup',
      );
      this.closeMediaConnections(callId, 'hangup');
      return;
    }

    orchestrator.onCallerHangup(cause);
    log.info(
      {
        event: 'call_session_hangup',
        call_id: callId,
        cause,
        state: orchestrator.getState(),
        requestId: context.requestId,
      },
      'call session hangup',
    );
  }

  public onDtmf(callId: CallId): void {
    this.registry.get(callId)?.requestBargeIn();
  }

  public isCallActive(callId: CallId): boolean {
    return this.registry.has(callId);
  }

  public getActiveCount(): number {
    return this.registry.size;
  }

  /** Resolves when the call's terminal side effects have run; undefined if unknown. */
  public whenFinished(callId: CallId): Promise<CallSummary> | undefined {
    return this.completions.get(callId);
  }

  /** Returns false when no active session owns the call id. */
  public handleMediaMessage(callId: CallId, message: TelnyxMediaMessage, socket: MediaSocket): boolean {
    const orchestrator = this.registry.get(callId);
    if (!orchestrator) {
      return false;
    }

    switch (message.event) {
      case 'connected':
        return true;
      case 'start':
        orchestrator.onMediaStart(
          message.stream_id,
          new TelnyxMediaSink(socket, this.deps.telephonyHighWaterBytes),
        );
        return true;
      case 'media':
        if (message.media.track && message.media.track !== 'inbound') {
          return true;
        }
        orchestrator.onMediaFrame({
          streamId: message.stream_id,
          sequence: message.sequence_number,
          payload: Buffer.from(message.media.payload, 'base64'),
        });
        return true;
      case 'stop':
        if (message.stream_id) {
          orchestrator.onMediaStop(message.stream_id);
        }
        return true;
    }
  }

  public registerMediaConnection(callId: CallId, connection: MediaConnection): void {
    const connections = this.mediaConnections.get(callId) ?? new Set<MediaConnection>();
    connections.add(connection);
    this.mediaConnections.set(callId, connections);
  }

  public unregisterMediaConnection(callId: CallId, connection: MediaConnection): void {
    const connections = this.mediaConnections.get(callId);
    if (!connections) {
      return;
    }

    connections.delete(connection);
    if (connections.size === 0) {
      this.mediaConnections.delete(callId);
    }
  }

  private onReleased(orchestrator: CallOrchestrator): void {
    setActiveCalls(this.registry.size);
    this.closeMediaConnections(orchestrator.callId, 'call_ended');
    this.clearQueue(orchestrator.callId);
  }

  private async runQueue(callId: CallId, queue: QueueState): Promise<void> {
    while (queue.items.length > 0) {
      const task = queue.items.shift();
      if (!task) {
        continue;
      }

      try {
        await task.run();
      } catch (error) {
        log.error(
          { err: error, call_id: callId, task: task.name, event: 'call_session_task_failed' },
          'session task failed',
        );
      }
    }

    queue.running = false;
    if (queue.items.length === 0) {
      this.queues.delete(callId);
    }
  }

  private clearQueue(callId: CallId): void {
    const queue = this.queues.get(callId);
    if (!queue) {
      return;
    }

    queue.items.length = 0;
    if (!queue.running) {
      this.queues.delete(callId);
    }
  }

  private closeMediaConnections(callId: CallId, reason: string): void {
    const connections = this.mediaConnections.get(callId);
    if (!connections) {
      return;
    }

    for (const connection of connections) {
      try {
        connection.close(1000, reason);
      } catch (error) {
        log.warn(
          { err: error, call_id: callId, event: 'media_connection_close_failed' },
          'media connection close failed',
        );
      }
    }

    this.mediaConnections.delete(callId);
  }
}
