import type { CallId, CallState, ToolParameters } from '../calls/types';
import type { RestaurantConfig } from '../restaurants/restaurantConfig';

export interface ToolCall {
  toolCallId: string;
  name: string;
  parameters: ToolParameters;
}

/** What a tool may see of the call; tools never mutate the session. */
export interface CallSessionView {
  readonly callId: CallId;
  readonly state: CallState;
  readonly terminationRequested: boolean;
  readonly forwardingRequested: boolean;
}

export interface ToolContext {
  session: CallSessionView;
  restaurant: RestaurantConfig;
}

export type ToolEffect =
  | { kind: 'end_call'; reason: string }
  | { kind: 'forward_call'; target: string };

export type ToolOutcome =
  | { status: 'executed'; result: ToolParameters; effect?: ToolEffect }
  | { status: 'rejected'; reason: string; result?: ToolParameters };

export interface ExecutableTool {
  readonly name: string;
  execute(call: ToolCall, context: ToolContext): ToolOutcome | Promise<ToolOutcome>;
}
