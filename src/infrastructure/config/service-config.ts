import { z } from 'zod';
import { describeIssue } from '../../application/index.js';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/** Boolean environment flag; unset or empty falls back to `fallback`. */
function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === '') return fallback;
      const value = raw.trim().toLowerCase();
      if (TRUE_VALUES.includes(value)) return true;
      if (FALSE_VALUES.includes(value)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, received '${raw}'` });
      return z.NEVER;
    });
}

/** Non-empty string with a default when unset or blank. */
function text(fallback: string) {
  return z
    .string()
    .optional()
    .transform((raw) => (raw === undefined || raw.trim() === '' ? fallback : raw.trim()));
}

/**
 * Zod schema over the process environment.
 *
 * Unknown variables are ignored; every recognised one has a default so the
 * service starts against a local Redis with no configuration at all.
 */
const envSchema = z.object({
  EVENT_DEFINITIONS_FILE: text('event_definitions.yaml'),
  ALLOW_DROPPING_OF_NOTIFICATIONS: flag(false),
  STORE_EVENTS: flag(true),
  REDIS_URL: text('redis://localhost:6379'),
  NOTIFICATION_STREAM: text('notifications_stream'),
  EVENT_STREAM: text('events_stream'),
  DEAD_LETTER_STREAM: text('notifications_dlq'),
  WORKER_ID: text('worker-1'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional()
    .default('info'),
  HOST: text('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(3000),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface StreamNames {
  notifications: string;
  events: string;
  deadLetter: string;
}

export interface ServiceConfig {
  /** Event definitions file, looked up as given and then under `config/`. */
  eventDefinitionsFile: string;
  /** Drop notifications no definition matches instead of using a catch-all. */
  allowDroppingOfNotifications: boolean;
  /** Convert and record events; when false notifications are only acknowledged. */
  storeEvents: boolean;
  redisUrl: string;
  streams: StreamNames;
  workerId: string;
  logLevel: LogLevel;
  host: string;
  port: number;
}

/**
 * Reads the service configuration from environment variables.
 *
 * @throws Error naming the offending variable when a value is invalid.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid service configuration: ${describeIssue(parsed.error)}`);
  }

  const e = parsed.data;
  return {
    eventDefinitionsFile: e.EVENT_DEFINITIONS_FILE,
    allowDroppingOfNotifications: e.ALLOW_DROPPING_OF_NOTIFICATIONS,
    storeEvents: e.STORE_EVENTS,
    redisUrl: e.REDIS_URL,
    streams: {
      notifications: e.NOTIFICATION_STREAM,
      events: e.EVENT_STREAM,
      deadLetter: e.DEAD_LETTER_STREAM,
    },
    workerId: e.WORKER_ID,
    logLevel: e.LOG_LEVEL,
    host: e.HOST,
    port: e.PORT,
  };
}
