import pino from 'pino';

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}

// Read straight from process.env so modules can log before env validation runs.
export const log = pino({
  name: 'restaurant-voice-runtime',
  level: resolveLevel(process.env.LOG_LEVEL),
  redact: {
    paths: ['apiKey', 'api_key', 'headers.authorization', 'headers["xi-api-key"]', 'signed_url'],
    censor: '[REDACTED]',
  },
});
