import type { CallSummary } from '../calls/types';
import { defaultFetch, HttpFetch, safeReadBody, truncateForLog } from '../http';
import { log } from '../log';

const NOTIFY_TIMEOUT_MS = 5000;

export interface RenderedCallSummary {
  subject: string;
  body: string;
}

export interface CallNotifier {
  notify(summary: CallSummary, recipient?: string): Promise<void>;
}

export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').replace(/\.\d+Z$/, ' UTC').replace(/Z$/, ' UTC');
}

export function renderCallSummary(summary: CallSummary): RenderedCallSummary {
  const caller = summary.from ?? 'unknown caller';
  const duration = formatDuration(summary.durationMs);

  const lines = [
    'Call Summary',
    '============',
    '',
    `Restaurant: ${summary.restaurantName ?? summary.restaurantId ?? 'unknown'}`,
    `Caller: ${caller}`,
    `Time: ${formatTimestamp(summary.startedAt)}`,
    `Duration: ${duration}`,
    `Handled by: ${summary.handledBy}`,
    summary.forwardingTarget ? `Forwarded: Yes, to ${summary.forwardingTarget}` : 'Forwarded: No',
  ];

  if (summary.transcript.length > 0) {
    lines.push('', 'Transcript:');
    for (const turn of summary.transcript) {
      lines.push(`${turn.role === 'agent' ? 'Agent' : 'Caller'}: ${turn.text}`);
    }
  }

  return {
    subject: `Call Summary - ${caller} - ${duration}`,
    body: `${lines.join('\n')}\n`,
  };
}

/** Posts the rendered summary to an HTTP hook that owns email delivery. */
export class WebhookCallNotifier implements CallNotifier {
  private readonly url: string;
  private readonly fetchImpl: HttpFetch;

  constructor(url: string, fetchImpl: HttpFetch = defaultFetch) {
    this.url = url;
    this.fetchImpl = fetchImpl;
  }

  public async notify(summary: CallSummary, recipient?: string): Promise<void> {
    const rendered = renderCallSummary(summary);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), NOTIFY_TIMEOUT_MS);
    timer.unref();

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({
          to: recipient ?? null,
          subject: rendered.subject,
          body: rendered.body,
          summary,
        }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const body = await safeReadBody(response);
        throw new Error(`notify webhook failed: ${response.status} ${truncateForLog(body, 300)}`);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

export class LogCallNotifier implements CallNotifier {
  public async notify(summary: CallSummary, recipient?: string): Promise<void> {
    const rendered = renderCallSummary(summary);
    log.info(
      {
        event: 'call_summary_notification',
        call_id: summary.callId,
        restaurant_id: summary.restaurantId,
        recipient,
        subject: rendered.subject,
      },
      'call summary notification',
    );
  }
}
