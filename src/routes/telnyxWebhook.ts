import { Router } from 'express';
import { z } from 'zod';
import { SessionManager } from '../calls/sessionManager';
import { log } from '../log';
import {
  extractTelnyxEventMetaFromPayload,
  extractTelnyxEventMetaFromRawBody,
  TelnyxSignatureCheck,
  TelnyxSignatureInput,
  verifyTelnyxSignature,
} from '../telnyx/telnyxVerify';
import { getRawBody, getRequestId } from './requestContext';

type SignatureVerifier = (input: TelnyxSignatureInput) => TelnyxSignatureCheck;

const PhoneFieldSchema = z
  .union([z.string(), z.object({ phone_number: z.string() }).passthrough()])
  .transform((value) => (typeof value === 'string' ? value : value.phone_number))
  .optional();

const CallPayloadSchema = z
  .object({
    call_control_id: z.string().min(1),
    from: PhoneFieldSchema,
    to: PhoneFieldSchema,
    direction: z.string().optional(),
    hangup_cause: z.string().optional(),
    digit: z.string().optional(),
  })
  .passthrough();

const WebhookEnvelopeSchema = z.object({
  data: z.object({
    event_type: z.string().min(1),
    payload: CallPayloadSchema,
  }),
});

export type TelnyxCallEvent = z.infer<typeof WebhookEnvelopeSchema>['data'];

function determineAction(eventType?: string, callId?: string): string {
  if (!eventType) {
    return 'ignored_unknown_event';
  }

  if (!callId) {
    return 'ignored_missing_call_control_id';
  }

  switch (eventType) {
    case 'call.initiated':
      return 'session_created';
    case 'call.hangup':
      return 'session_torn_down';
    case 'call.dtmf.received':
      return 'barge_in';
    default:
      return 'ignored_unhandled_event';
  }
}

function trimOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function dispatchTelnyxEvent(
  sessionManager: SessionManager,
  event: TelnyxCallEvent,
  requestId?: string,
): void {
  const payload = event.payload;
  const callId = payload.call_control_id;

  switch (event.event_type) {
    case 'call.initiated':
      if (payload.direction && payload.direction !== 'incoming') {
        log.info(
          { event: 'outbound_leg_ignored', call_id: callId, direction: payload.direction, requestId },
          'ignoring non-inbound call leg',
        );
        return;
      }
      sessionManager.handleInboundCall(
        {
          callId,
          from: trimOrUndefined(payload.from),
          to: trimOrUndefined(payload.to),
        },
        { requestId },
      );
      return;
    case 'call.hangup':
      sessionManager.onHangup(callId, payload.hangup_cause, { requestId });
      return;
    case 'call.dtmf.received':
      sessionManager.onDtmf(callId);
      return;
    default:
      return;
  }
}

export function createTelnyxWebhookRouter(
  sessionManager: SessionManager,
  verify: SignatureVerifier = (input) => verifyTelnyxSignature(input),
): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const requestId = getRequestId(res);
    const rawBody = getRawBody(req);
    const signatureEd25519 = req.header('telnyx-signature-ed25519');
    const signatureHmac = req.header('telnyx-signature');
    const signature = signatureEd25519 ?? signatureHmac ?? '';
    const timestamp = req.header('telnyx-timestamp') ?? '';
    const scheme = signatureEd25519 ? 'ed25519' : signatureHmac ? 'hmac-sha256' : undefined;

    const rawMeta = extractTelnyxEventMetaFromRawBody(rawBody);
    const signatureCheck = verify({ rawBody, signature, timestamp, scheme });

    if (signatureCheck.skipped) {
      log.warn({ requestId, event_type: rawMeta.eventType }, 'telnyx signature check skipped (dev)');
    }

    if (!signatureCheck.ok) {
      log.warn(
        {
          requestId,
          event_type: rawMeta.eventType,
          call_id: rawMeta.callId,
          restaurant_id: rawMeta.restaurantId,
          action_taken: 'reject_invalid_signature',
        },
        'telnyx webhook ack',
      );
      res.status(401).json({ error: 'invalid_signature' });
      return;
    }

    const meta = extractTelnyxEventMetaFromPayload(req.body);
    const eventType = meta.eventType ?? rawMeta.eventType;
    const callId = meta.callId ?? rawMeta.callId;
    const restaurantId = meta.restaurantId ?? rawMeta.restaurantId;
    const parsed = WebhookEnvelopeSchema.safeParse(req.body);

    const actionTaken = parsed.success ? determineAction(eventType, callId) : 'ignored_malformed_payload';
    if (parsed.success) {
      const event = parsed.data.data;
      sessionManager.enqueue(event.payload.call_control_id, {
        name: `telnyx_webhook_${event.event_type}`,
        run: () => dispatchTelnyxEvent(sessionManager, event, requestId),
      });
    }

    log.info(
      {
        requestId,
        event_type: eventType,
        call_id: callId,
        restaurant_id: restaurantId,
        action_taken: actionTaken,
      },
      'telnyx webhook ack',
    );

    res.status(200).json({ ok: true });
  });

  return router;
}
