import { TelephonyActionError } from '../errors';
import { defaultFetch, HttpFetch, isAbortError, safeReadBody, truncateForLog } from '../http';
import { log } from '../log';
import { AnswerWithStreamOptions, encodeClientState, TelephonyControl } from './types';

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2';
const TELNYX_TIMEOUT_MS = 8000;
const TELNYX_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call-control is latency-sensitive)
const TELNYX_RETRY_BASE_MS = 250;
const TELNYX_RETRY_MAX_MS = 1500;

const USER_AGENT = 'restaurant-voice-runtime/0.1.0';

export interface TelnyxClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  fetchImpl?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
  logContext?: Record<string, unknown>;
}

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(TELNYX_RETRY_MAX_MS, TELNYX_RETRY_BASE_MS * Math.pow(2, attempt));
  const jitter = Math.floor(Math.random() * 120);
  return exp + jitter;
}

export function isCallEndedResponse(status: number, body: unknown): boolean {
  if (status !== 422) {
    return false;
  }
  return /already ended|no longer active/i.test(truncateForLog(body, 4000));
}

export function redactStreamUrl(streamUrl: string): string {
  try {
    const parsed = new URL(streamUrl);
    if (parsed.searchParams.has('token')) {
      parsed.searchParams.set('token', '[redacted]');
    }
    return parsed.toString();
  } catch {
    return streamUrl.replace(/token=[^&]+/g, 'token=[redacted]');
  }
}

export class TelnyxCallControlClient implements TelephonyControl {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: HttpFetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logContext: Record<string, unknown>;

  constructor(options: TelnyxClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? TELNYX_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? TELNYX_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? TELNYX_MAX_RETRIES;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logContext = options.logContext ?? {};
  }

  /** Answers and opens the bidirectional PCMU media stream in one action. */
  public async answerWithStream(callId: string, options: AnswerWithStreamOptions): Promise<void> {
    const body = {
      stream_url: options.streamUrl,
      stream_track: 'inbound_track',
      stream_bidirectional_mode: 'rtp',
      stream_bidirectional_codec: 'PCMU',
      client_state: encodeClientState(options.clientState),
    };
    log.info(
      {
        event: 'telnyx_answer_request',
        call_id: callId,
        restaurant_id: options.clientState.restaurant_id,
        stream_url: redactStreamUrl(options.streamUrl),
        ...this.logContext,
      },
      'telnyx answer request',
    );
    await this.callControl(callId, 'answer', body, options.signal);
  }

  public async transfer(callId: string, to: string, signal?: AbortSignal): Promise<void> {
    await this.callControl(callId, 'transfer', { to }, signal);
  }

  public async reject(callId: string): Promise<void> {
    await this.callControl(callId, 'reject', { cause: 'CALL_REJECTED' });
  }

  public async hangup(callId: string): Promise<void> {
    await this.callControl(callId, 'hangup', undefined);
  }

  public async callControl(
    callId: string,
    action: string,
    body: Record<string, unknown> | undefined,
    signal?: AbortSignal,
  ): Promise<unknown> {
    return this.callControlRequest(callId, action, body, 0, signal);
  }

  private async callControlRequest(
    callId: string,
    action: string,
    body: Record<string, unknown> | undefined,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    if (signal?.aborted) {
      throw new TelephonyActionError(action, `Telnyx call-control ${action} aborted`);
    }

    const url = `${this.baseUrl}/calls/${encodeURIComponent(callId)}/actions/${action}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const startedAt = Date.now();

    log.info(
      {
        event: 'telnyx_call_control_request',
        action,
        call_id: callId,
        telnyx_api_key_fingerprint: maskTelnyxKey(this.apiKey),
        attempt,
        ...this.logContext,
      },
      'telnyx call-control request',
    );

    try {
      const headers: Record<string, string> = {
        Authorization: `Bearer ${this.apiKey}`,
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      };

      let payload: string | undefined;
      if (body && Object.keys(body).length > 0) {
        headers['Content-Type'] = 'application/json';
        payload = JSON.stringify(body);
      }

      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: payload,
        signal: controller.signal,
      });

      const responseBody = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        const logBody = truncateForLog(responseBody, 1000);

        if (isCallEndedResponse(response.status, responseBody)) {
          log.warn(
            {
              event: 'telnyx_call_control_ignored_post_end',
              action,
              call_id: callId,
              status: response.status,
              duration_ms: durationMs,
              body: logBody,
              ...this.logContext,
            },
            'telnyx call-control ignored post end',
          );
          return responseBody;
        }

        if (shouldRetry(response.status) && attempt < this.maxRetries && !signal?.aborted) {
          const waitMs = backoffMs(attempt);
          log.warn(
            {
              event: 'telnyx_call_control_retry',
              action,
              call_id: callId,
              status: response.status,
              duration_ms: durationMs,
              wait_ms: waitMs,
              attempt,
              body: logBody,
              ...this.logContext,
            },
            'telnyx call-control retry',
          );
          await this.sleep(waitMs);
          return this.callControlRequest(callId, action, body, attempt + 1, signal);
        }

        log.error(
          {
            event: 'telnyx_call_control_failed',
            action,
            call_id: callId,
            status: response.status,
            duration_ms: durationMs,
            body: logBody,
            ...this.logContext,
          },
          'telnyx call-control failed',
        );

        throw new TelephonyActionError(
          action,
          `Telnyx call-control ${action} failed: ${response.status} ${truncateForLog(responseBody, 1200)}`,
          { status: response.status, responseBody },
        );
      }

      log.info(
        {
          event: 'telnyx_call_control_completed',
          action,
          call_id: callId,
          status: response.status,
          duration_ms: durationMs,
          ...this.logContext,
        },
        'telnyx call-control completed',
      );

      return responseBody;
    } catch (error) {
      if (error instanceof TelephonyActionError) {
        throw error;
      }

      // Timeouts and aborts are not retried.
      if (!isAbortError(error) && attempt < this.maxRetries) {
        const waitMs = backoffMs(attempt);
        log.warn(
          {
            event: 'telnyx_call_control_error_retry',
            action,
            call_id: callId,
            attempt,
            wait_ms: waitMs,
            err: error,
            ...this.logContext,
          },
          'telnyx call-control error retry',
        );
        await this.sleep(waitMs);
        return this.callControlRequest(callId, action, body, attempt + 1, signal);
      }

      log.error(
        {
          event: 'telnyx_call_control_error',
          action,
          call_id: callId,
          err: error,
          ...this.logContext,
        },
        'telnyx call-control error',
      );
      throw new TelephonyActionError(
        action,
        signal?.aborted ? `Telnyx call-control ${action} aborted` : `Telnyx call-control ${action} error: ${String(error)}`,
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
