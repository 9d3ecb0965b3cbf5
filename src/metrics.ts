import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * Histograms named *_ms record milliseconds measured with hrtime; prom-client's
 * own startTimer() would record seconds.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'restaurant_voice_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls that reached a terminal state',
  labelNames: ['restaurant', 'state', 'handled_by'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  labelNames: ['restaurant'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 600, 900],
  registers: [register],
});

const audioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}audio_frames_dropped_total`,
  help: 'Audio frames dropped by the bridge or the conversation uplink',
  labelNames: ['direction', 'reason'] as const,
  registers: [register],
});

const toolInvocationsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tool_invocations_total`,
  help: 'Agent tool invocations by outcome',
  labelNames: ['tool', 'status'] as const,
  registers: [register],
});

const conversationOpenDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}conversation_open_duration_ms`,
  help: 'Time to open a conversation session in milliseconds',
  labelNames: ['result'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Calls currently owned by this process',
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function incAudioFramesDropped(direction: 'inbound' | 'outbound' | 'uplink', reason: string, count = 1): void {
  if (count <= 0) return;
  audioFramesDroppedTotal.inc({ direction, reason: reason.trim() || 'unknown' }, count);
}

export function incToolInvocation(tool: string, status: string): void {
  toolInvocationsTotal.inc({ tool, status });
}

/** Returns a function that records the open latency with its outcome. */
export function startConversationOpenTimer(): (result: 'ok' | 'failed' | 'aborted') => void {
  const start = nowNs();
  return (result) => {
    conversationOpenDurationMs.observe({ result }, nsToMs(nowNs() - start));
  };
}

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

export function recordCallMetrics(opts: {
  restaurantId?: string;
  state: string;
  handledBy: string;
  durationMs: number;
}): void {
  const restaurant = opts.restaurantId ?? 'unknown';
  callCompletionsTotal.inc({ restaurant, state: opts.state, handled_by: opts.handledBy });
  callDurationSeconds.observe({ restaurant }, opts.durationMs / 1000);
}
