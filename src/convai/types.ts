import type { AudioFormat } from '../audio/g711';
import type { CallId, ToolParameters } from '../calls/types';

export type ConversationErrorKind = 'transport_closed' | 'protocol_error' | 'server_error';

export type ConversationEvent =
  | { type: 'agent_audio'; audio: Buffer; eventId: number }
  | { type: 'agent_text'; text: string }
  | { type: 'user_transcript'; text: string }
  | { type: 'tool_call'; toolCallId: string; name: string; parameters: ToolParameters }
  | { type: 'interruption'; source: 'local' | 'remote' }
  | { type: 'error'; kind: ConversationErrorKind; message?: string };

export type DynamicVariables = Record<string, string | number | boolean>;

export interface ConversationOpenParams {
  callId: CallId;
  agentId: string;
  voiceId?: string;
  enabledTools: readonly string[];
  firstMessage?: string;
  language?: string;
  dynamicVariables?: DynamicVariables;
}

export interface ToolResultMessage {
  toolCallId: string;
  result: string;
  isError: boolean;
}

export interface ConversationSession {
  readonly conversationId: string | null;
  /** Format the agent expects caller audio in. */
  readonly inputFormat: AudioFormat;
  /** Format of agent audio chunks. */
  readonly outputFormat: AudioFormat;
  readonly events: AsyncIterable<ConversationEvent>;
  readonly droppedFrames: number;
  sendAudio(frame: Buffer): void;
  interrupt(): void;
  sendToolResult(message: ToolResultMessage): void;
  close(): void;
}

export interface ConversationConnector {
  open(params: ConversationOpenParams, signal?: AbortSignal): Promise<ConversationSession>;
}
