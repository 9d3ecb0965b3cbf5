import crypto from 'crypto';
import { env } from '../env';

const MAX_SKEW_SECONDS = 300;

export interface TelnyxSignatureInput {
  rawBody: Buffer;
  signature: string;
  timestamp: string;
  scheme?: 'ed25519' | 'hmac-sha256';
  nowSeconds?: number;
}

export interface TelnyxVerificationKeys {
  publicKey?: string;
  webhookSecret?: string;
  skip?: boolean;
}

export interface TelnyxEventMeta {
  eventType?: string;
  callId?: string;
  restaurantId?: string;
}

export interface TelnyxSignatureCheck {
  ok: boolean;
  skipped: boolean;
}

function isHex(value: string): boolean {
  return /^[0-9a-f]+$/i.test(value);
}

function parsePublicKey(publicKey: string): crypto.KeyObject {
  if (publicKey.includes('BEGIN PUBLIC KEY')) {
    return crypto.createPublicKey(publicKey);
  }

  const keyBuffer = Buffer.from(publicKey, isHex(publicKey) ? 'hex' : 'base64');
  return crypto.createPublicKey({ key: keyBuffer, format: 'der', type: 'spki' });
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getField(value: unknown, key: string): unknown {
  if (!value || typeof value !== 'object' || !(key in value)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

export function extractRestaurantIdFromClientState(clientState?: string): string | undefined {
  if (!clientState) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(clientState, 'base64').toString('utf8'));
  } catch {
    return undefined;
  }
  return getString(getField(parsed, 'restaurant_id'));
}

export function extractTelnyxEventMetaFromPayload(payload: unknown): TelnyxEventMeta {
  const data = getField(payload, 'data');
  if (!data || typeof data !== 'object') {
    return {};
  }

  const eventType = getString(getField(data, 'event_type'));
  const payloadObj = getField(data, 'payload');
  if (!payloadObj || typeof payloadObj !== 'object') {
    return { eventType };
  }

  return {
    eventType,
    callId: getString(getField(payloadObj, 'call_control_id')),
    restaurantId: extractRestaurantIdFromClientState(getString(getField(payloadObj, 'client_state'))),
  };
}

export function extractTelnyxEventMetaFromRawBody(rawBody: Buffer): TelnyxEventMeta {
  if (!rawBody || rawBody.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    return {};
  }
  return extractTelnyxEventMetaFromPayload(parsed);
}

function verifyHmacSignature(message: Buffer, signature: string, secret: string): boolean {
  const digest = crypto.createHmac('sha256', secret).update(message).digest();
  const signatureBuffer = Buffer.from(signature, isHex(signature) ? 'hex' : 'base64');

  if (signatureBuffer.length !== digest.length) {
    return false;
  }

  return crypto.timingSafeEqual(digest, signatureBuffer);
}

function defaultKeys(): TelnyxVerificationKeys {
  return {
    publicKey: env.TELNYX_PUBLIC_KEY,
    webhookSecret: env.TELNYX_WEBHOOK_SECRET,
    skip: env.TELNYX_SKIP_SIGNATURE,
  };
}

export function verifyTelnyxSignature(
  { rawBody, signature, timestamp, scheme, nowSeconds }: TelnyxSignatureInput,
  keys: TelnyxVerificationKeys = defaultKeys(),
): TelnyxSignatureCheck {
  if (keys.skip) {
    return { ok: true, skipped: true };
  }

  const trimmedSignature = signature?.trim() ?? '';
  const trimmedTimestamp = timestamp?.trim() ?? '';
  if (!trimmedSignature || !trimmedTimestamp) {
    return { ok: false, skipped: false };
  }

  const parsedTimestamp = Number.parseInt(trimmedTimestamp, 10);
  if (!Number.isFinite(parsedTimestamp)) {
    return { ok: false, skipped: false };
  }

  const now = nowSeconds ?? Math.floor(Date.now() / 1000);
  const normalizedTimestamp = parsedTimestamp > 1_000_000_000_000 ? Math.floor(parsedTimestamp / 1000) : parsedTimestamp;
  if (Math.abs(now - normalizedTimestamp) > MAX_SKEW_SECONDS) {
    return { ok: false, skipped: false };
  }

  const message = Buffer.concat([
    Buffer.from(trimmedTimestamp, 'utf8'),
    Buffer.from('.', 'utf8'),
    rawBody,
  ]);

  const secret = keys.webhookSecret?.trim();
  const shouldUseHmac = scheme === 'hmac-sha256' || (!!secret && scheme !== 'ed25519');

  if (shouldUseHmac) {
    if (!secret) {
      return { ok: false, skipped: false };
    }
    return { ok: verifyHmacSignature(message, trimmedSignature, secret), skipped: false };
  }

  const publicKeyRaw = keys.publicKey?.trim();
  if (!publicKeyRaw) {
    return { ok: false, skipped: false };
  }

  try {
    const publicKey = parsePublicKey(publicKeyRaw);
    const signatureBuffer = Buffer.from(trimmedSignature, isHex(trimmedSignature) ? 'hex' : 'base64');
    return { ok: crypto.verify(null, message, publicKey, signatureBuffer), skipped: false };
  } catch {
    // malformed key or signature bytes
    return { ok: false, skipped: false };
  }
}
