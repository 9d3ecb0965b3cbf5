import type { CallSummary } from '../calls/types';
import { env } from '../env';
import { errorMessage } from '../errors';
import { log } from '../log';
import { getRedisClient } from '../redis/client';

export function logCallEvent(event: string, payload: Record<string, unknown> = {}): void {
  log.info({ event, ...payload }, 'call event');
}

/** Consumers must be idempotent on `callId`; delivery may repeat. */
export interface CallLogSink {
  write(summary: CallSummary): Promise<void>;
}

export interface CallLogRedis {
  set(key: string, value: string): Promise<unknown>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
}

export function buildCallLogKey(callId: string, prefix: string = env.CALLLOG_PREFIX): string {
  return `${prefix}:call:${callId}`;
}

export function buildRestaurantCallIndexKey(restaurantId: string, prefix: string = env.CALLLOG_PREFIX): string {
  return `${prefix}:restaurant:${restaurantId}`;
}

/** Upsert by call id plus a per-restaurant index scored by start time. */
export class RedisCallLogSink implements CallLogSink {
  private readonly redis: CallLogRedis;

  constructor(redis: CallLogRedis = getRedisClient()) {
    this.redis = redis;
  }

  public async write(summary: CallSummary): Promise<void> {
    await this.redis.set(buildCallLogKey(summary.callId), JSON.stringify(summary));
    if (summary.restaurantId) {
      await this.redis.zadd(
        buildRestaurantCallIndexKey(summary.restaurantId),
        Date.parse(summary.startedAt),
        summary.callId,
      );
    }
  }
}

export interface DeliveryOptions {
  maxAttempts: number;
  retryBaseMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms).unref();
  });
}

/** Retries with exponential backoff; resolves false once attempts run out. */
export async function deliverCallLog(
  sink: CallLogSink,
  summary: CallSummary,
  options: DeliveryOptions,
): Promise<boolean> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      await sink.write(summary);
      log.info(
        { event: 'call_log_delivered', call_id: summary.callId, attempt },
        'call log delivered',
      );
      return true;
    } catch (error) {
      const finalAttempt = attempt === maxAttempts;
      log.warn(
        {
          event: finalAttempt ? 'call_log_delivery_exhausted' : 'call_log_delivery_retry',
          call_id: summary.callId,
          attempt,
          error: errorMessage(error),
        },
        finalAttempt ? 'call log delivery exhausted' : 'call log delivery retry',
      );
      if (!finalAttempt) {
        await wait(options.retryBaseMs * Math.pow(2, attempt - 1));
      }
    }
  }
  return false;
}
