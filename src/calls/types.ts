export type CallId = string;

export type CallState =
  | 'INITIATED'
  | 'CONFIG_RESOLVED'
  | 'AI_ACTIVE'
  | 'FORWARDING'
  | 'FORWARDED'
  | 'ENDED_BY_TOOL'
  | 'ENDED_BY_CALLER'
  | 'ERROR_TERMINATED';

export type TerminalCallState = Extract<
  CallState,
  'FORWARDED' | 'ENDED_BY_TOOL' | 'ENDED_BY_CALLER' | 'ERROR_TERMINATED'
>;

export type HandledBy = 'ai' | 'forwarded' | 'unhandled';

export type SpeakerRole = 'user' | 'agent';

export interface Turn {
  role: SpeakerRole;
  text: string;
  offsetMs: number;
}

export type ToolParamValue = string | number | boolean | null;
export type ToolParameters = Record<string, ToolParamValue>;

export type ToolResultStatus = 'executed' | 'rejected' | 'failed';

export interface ToolInvocation {
  readonly toolCallId: string;
  readonly name: string;
  readonly parameters: Readonly<ToolParameters>;
  readonly invokedAt: Date;
  readonly status: ToolResultStatus;
  readonly result: Readonly<ToolParameters>;
  readonly reason?: string;
}

export interface CallSessionConfig {
  callId: CallId;
  from?: string;
  to?: string;
  requestId?: string;
}

export interface CallAudioStats {
  inboundFrames: number;
  inboundDropped: number;
  outboundFrames: number;
  outboundDropped: number;
  conversationDropped: number;
}

export interface CallSummary {
  callId: CallId;
  restaurantId?: string;
  restaurantName?: string;
  from?: string;
  to?: string;
  conversationId?: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  finalState: TerminalCallState;
  handledBy: HandledBy;
  endReason: string;
  forwardingTarget?: string;
  transcript: Turn[];
  toolLog: Array<Omit<ToolInvocation, 'invokedAt'> & { invokedAt: string }>;
  audio: CallAudioStats;
}
