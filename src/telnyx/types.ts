/** Opaque state carried through the answer action and echoed on the media stream. */
export interface CallClientState {
  restaurant_id: string;
  call_id: string;
}

export interface AnswerWithStreamOptions {
  streamUrl: string;
  clientState: CallClientState;
  signal?: AbortSignal;
}

/** Call-control actions the orchestrator drives. */
export interface TelephonyControl {
  answerWithStream(callId: string, options: AnswerWithStreamOptions): Promise<void>;
  transfer(callId: string, to: string, signal?: AbortSignal): Promise<void>;
  reject(callId: string): Promise<void>;
  hangup(callId: string): Promise<void>;
}

export function encodeClientState(state: CallClientState): string {
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64');
}
