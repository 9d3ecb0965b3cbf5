import type { CallState } from './calls/types';

export class RestaurantNotFoundError extends Error {
  public readonly lookup: string;
  public readonly reason: 'unknown_number' | 'unknown_restaurant' | 'config_missing' | 'config_invalid';

  constructor(lookup: string, reason: RestaurantNotFoundError['reason']) {
    super(`restaurant not found for "${lookup}" (${reason})`);
    this.name = 'RestaurantNotFoundError';
    this.lookup = lookup;
    this.reason = reason;
  }
}

export type ConnectFailureKind =
  | 'connect_timeout'
  | 'socket_error'
  | 'upgrade_rejected'
  | 'closed_before_ready'
  | 'signed_url_failed'
  | 'aborted';

export class ConversationConnectError extends Error {
  public readonly kind: ConnectFailureKind;

  constructor(kind: ConnectFailureKind, detail?: string) {
    super(detail ? `conversation connect failed: ${kind} (${detail})` : `conversation connect failed: ${kind}`);
    this.name = 'ConversationConnectError';
    this.kind = kind;
  }
}

export class SessionConflictError extends Error {
  public readonly callId: string;

  constructor(callId: string) {
    super(`call session already active for ${callId}`);
    this.name = 'SessionConflictError';
    this.callId = callId;
  }
}

export class InvalidTransitionError extends Error {
  public readonly from: CallState;
  public readonly to: CallState;

  constructor(from: CallState, to: CallState) {
    super(`invalid call state transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class TelephonyActionError extends Error {
  public readonly action: string;
  public readonly status?: number;
  public readonly responseBody?: unknown;

  constructor(action: string, message: string, details: { status?: number; responseBody?: unknown } = {}) {
    super(message);
    this.name = 'TelephonyActionError';
    this.action = action;
    this.status = details.status;
    this.responseBody = details.responseBody;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
