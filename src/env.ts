import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const positiveIntWithDefault = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  PUBLIC_BASE_URL: z.string().min(1),
  TELNYX_API_KEY: z.string().min(1),
  TELNYX_PUBLIC_KEY: z.string().min(1),
  TELNYX_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  TELNYX_WEBHOOK_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  MEDIA_STREAM_TOKEN: z.string().min(1),
  REDIS_URL: z.string().min(1),
  RESTAURANTMAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('restaurantmap')),
  RESTAURANTCFG_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('restaurantcfg')),
  CALLLOG_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('calllog')),
  ELEVENLABS_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  ELEVENLABS_API_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('https://api.elevenlabs.io'),
  ),
  ELEVENLABS_WS_URL: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('wss://api.elevenlabs.io/v1/convai/conversation'),
  ),
  CONVAI_CONNECT_TIMEOUT_MS: positiveIntWithDefault(5000),
  CONVAI_OUTBOUND_QUEUE_MAX: positiveIntWithDefault(50),
  CONVAI_WS_HIGH_WATER_BYTES: positiveIntWithDefault(65_536),
  TELEPHONY_OUTBOUND_QUEUE_MAX: positiveIntWithDefault(250),
  TELEPHONY_WS_HIGH_WATER_BYTES: positiveIntWithDefault(65_536),
  MAX_CALL_DURATION_MS: positiveIntWithDefault(900_000),
  FORWARD_ACK_TIMEOUT_MS: positiveIntWithDefault(10_000),
  CALL_LOG_MAX_ATTEMPTS: positiveIntWithDefault(5),
  CALL_LOG_RETRY_BASE_MS: positiveIntWithDefault(250),
  NOTIFY_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.string().min(1).default('info')),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
export type Env = typeof env;
