import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import WebSocket, { RawData, WebSocketServer } from 'ws';
import { env } from './env';
import { SessionManager, type SessionManagerDeps } from './calls/sessionManager';
import { ElevenLabsConversationConnector } from './convai/conversationClient';
import { log } from './log';
import { parseTelnyxMediaMessage } from './media/telnyxMediaStream';
import { metricsHandler, metricsMiddleware } from './metrics';
import { CallNotifier, LogCallNotifier, WebhookCallNotifier } from './notifications/callSummaryNotifier';
import { RedisCallLogSink } from './observability/callLogs';
import { RestaurantConfigResolver } from './restaurants/restaurantResolver';
import { RedisRestaurantStore } from './restaurants/restaurantStore';
import { createHealthRouter } from './routes/health';
import { captureRawBody, requestIdMiddleware } from './routes/requestContext';
import { createTelnyxWebhookRouter } from './routes/telnyxWebhook';
import { TelnyxCallControlClient } from './telnyx/telnyxClient';
import { ToolDispatcher } from './tools/toolDispatcher';

const MEDIA_PATH_PREFIX = '/v1/telnyx/media/';

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

function parseMediaRequest(request: http.IncomingMessage): { callId: string; token: string | null } | null {
  if (!request.url) {
    return null;
  }

  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  if (!url.pathname.startsWith(MEDIA_PATH_PREFIX)) {
    return null;
  }

  const callId = decodeURIComponent(url.pathname.slice(MEDIA_PATH_PREFIX.length));
  if (!callId || callId.includes('/')) {
    return null;
  }

  return {
    callId,
    token: url.searchParams.get('token'),
  };
}

export function buildMediaStreamUrl(callId: string, publicBaseUrl: string = env.PUBLIC_BASE_URL): string {
  const url = new URL(`${MEDIA_PATH_PREFIX}${encodeURIComponent(callId)}`, publicBaseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.searchParams.set('token', env.MEDIA_STREAM_TOKEN);
  return url.toString();
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function handleMediaConnection(ws: WebSocket, callId: string, sessionManager: SessionManager): void {
  sessionManager.registerMediaConnection(callId, ws);

  ws.on('message', (data, isBinary) => {
    if (isBinary) {
      log.debug({ call_id: callId }, 'binary media frame ignored');
      return;
    }

    const message = parseTelnyxMediaMessage(rawDataToString(data));
    if (!message) {
      log.debug({ call_id: callId, event: 'media_message_invalid' }, 'media message ignored');
      return;
    }

    const ok = sessionManager.handleMediaMessage(callId, message, ws);
    if (!ok) {
      ws.close(1008, 'session_not_found');
    }
  });

  ws.on('close', () => {
    sessionManager.unregisterMediaConnection(callId, ws);
  });

  ws.on('error', (error) => {
    sessionManager.unregisterMediaConnection(callId, ws);
    log.error({ err: error, call_id: callId }, 'media websocket error');
  });
}

function attachMediaWebSocketServer(
  server: http.Server,
  sessionManager: SessionManager,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseMediaRequest(request);
    if (!parsed) {
      socket.destroy();
      return;
    }

    if (!parsed.token || parsed.token !== env.MEDIA_STREAM_TOKEN) {
      log.warn({ call_id: parsed.callId, event: 'media_token_rejected' }, 'media stream token rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      handleMediaConnection(ws, parsed.callId, sessionManager);
    });
  });

  return wss;
}

function createNotifier(): CallNotifier {
  return env.NOTIFY_WEBHOOK_URL ? new WebhookCallNotifier(env.NOTIFY_WEBHOOK_URL) : new LogCallNotifier();
}

export function createSessionManagerDeps(): SessionManagerDeps {
  return {
    resolver: new RestaurantConfigResolver(new RedisRestaurantStore()),
    connector: new ElevenLabsConversationConnector({
      wsUrl: env.ELEVENLABS_WS_URL,
      apiBaseUrl: env.ELEVENLABS_API_BASE_URL,
      apiKey: env.ELEVENLABS_API_KEY,
      connectTimeoutMs: env.CONVAI_CONNECT_TIMEOUT_MS,
      outboundQueueMax: env.CONVAI_OUTBOUND_QUEUE_MAX,
      highWaterBytes: env.CONVAI_WS_HIGH_WATER_BYTES,
    }),
    telephony: new TelnyxCallControlClient({ apiKey: env.TELNYX_API_KEY }),
    dispatcher: new ToolDispatcher(),
    callLog: new RedisCallLogSink(),
    notifier: createNotifier(),
    telephonyHighWaterBytes: env.TELEPHONY_WS_HIGH_WATER_BYTES,
    settings: {
      mediaStreamUrl: (callId) => buildMediaStreamUrl(callId),
      maxCallDurationMs: env.MAX_CALL_DURATION_MS,
      forwardAckTimeoutMs: env.FORWARD_ACK_TIMEOUT_MS,
      telephonyOutboundQueueMax: env.TELEPHONY_OUTBOUND_QUEUE_MAX,
      callLogMaxAttempts: env.CALL_LOG_MAX_ATTEMPTS,
      callLogRetryBaseMs: env.CALL_LOG_RETRY_BASE_MS,
    },
  };
}

export function buildServer(
  deps: SessionManagerDeps = createSessionManagerDeps(),
): { app: express.Express; server: http.Server; sessionManager: SessionManager } {
  const app = express();
  const sessionManager = new SessionManager(deps);

  app.disable('x-powered-by');
  app.use(express.json({ verify: captureRawBody }));
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(sessionManager));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/telnyx/webhook', createTelnyxWebhookRouter(sessionManager));

  app.use(errorHandler);

  const server = http.createServer(app);
  attachMediaWebSocketServer(server, sessionManager);

  return { app, server, sessionManager };
}
