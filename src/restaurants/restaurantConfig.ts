import { z } from 'zod';

const E164_REGEX = /^\+[1-9]\d{1,14}$/;
const HHMM_REGEX = /^([01]\d|2[0-3]):[0-5]\d$/;

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const CallHoursSchema = z.object({
  start: z.string().regex(HHMM_REGEX, 'expected HH:MM'),
  end: z.string().regex(HHMM_REGEX, 'expected HH:MM'),
});

export type CallHoursWindow = z.infer<typeof CallHoursSchema>;

export const StoredRestaurantConfigSchema = z
  .object({
    contractVersion: z.literal('v1'),
    restaurantId: z.string().min(1),
    name: z.string().min(1),
    address: z.string().min(1),
    timezone: z.string().min(1).refine(isValidTimeZone, 'unknown IANA timezone'),
    phoneNumbers: z.array(z.string().regex(E164_REGEX, 'invalid E.164 number')).min(1),
    aiEnabled: z.boolean(),
    callHours: CallHoursSchema,
    forwardingNumber: z
      .string()
      .regex(E164_REGEX, 'invalid E.164 number')
      .nullish()
      .transform((value) => value ?? undefined),
    agent: z.object({
      agentId: z.string().min(1),
      voiceId: z.string().min(1).optional(),
      firstMessage: z.string().min(1).optional(),
      language: z.string().min(2).optional(),
    }),
    enabledTools: z.array(z.string().min(1)).default([]),
    knowledgeRefs: z.array(z.string().min(1)).default([]),
    notifyEmail: z.string().email().optional(),
  })
  .passthrough();

export type StoredRestaurantConfig = z.infer<typeof StoredRestaurantConfigSchema>;

/** Per-call snapshot; never mutated after resolution. */
export interface RestaurantConfig {
  readonly restaurantId: string;
  readonly name: string;
  readonly address: string;
  readonly timezone: string;
  readonly phoneNumbers: readonly string[];
  readonly aiEnabled: boolean;
  readonly callHours: Readonly<CallHoursWindow>;
  readonly forwardingNumber?: string;
  readonly agentId: string;
  readonly voiceId?: string;
  readonly firstMessage?: string;
  readonly language?: string;
  readonly enabledTools: ReadonlySet<string>;
  readonly knowledgeRefs: readonly string[];
  readonly notifyEmail?: string;
}

export function toRestaurantConfig(stored: StoredRestaurantConfig): RestaurantConfig {
  return Object.freeze({
    restaurantId: stored.restaurantId,
    name: stored.name,
    address: stored.address,
    timezone: stored.timezone,
    phoneNumbers: Object.freeze([...stored.phoneNumbers]),
    aiEnabled: stored.aiEnabled,
    callHours: Object.freeze({ start: stored.callHours.start, end: stored.callHours.end }),
    forwardingNumber: stored.forwardingNumber,
    agentId: stored.agent.agentId,
    voiceId: stored.agent.voiceId,
    firstMessage: stored.agent.firstMessage,
    language: stored.agent.language,
    enabledTools: new Set(stored.enabledTools),
    knowledgeRefs: Object.freeze([...stored.knowledgeRefs]),
    notifyEmail: stored.notifyEmail,
  });
}
