import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { NotificationCollector } from '../../application/index.js';
import { notificationSchema } from '../../application/index.js';
import { ConversionError } from '../../domain/index.js';
import type { StreamNames } from '../config/index.js';
import { quarantineNotification } from '../redis/index.js';

export const GROUP_NAME = 'event_converter';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

/** Dependencies bundled for internal functions. */
export interface ConsumerDeps {
  redis: Redis;
  log: Logger;
  collector: NotificationCollector;
  streams: StreamNames;
  consumerName: string;
}

/**
 * Ensures the consumer group exists on the notification stream.
 *
 * Start ID "$" = only deliver notifications arriving after group creation.
 * Crash recovery re-reads this consumer's own pending entries instead
 * (see processPending). Uses MKSTREAM so the stream is created if absent.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(deps: ConsumerDeps): Promise<void> {
  try {
    await deps.redis.xgroup('CREATE', deps.streams.notifications, GROUP_NAME, '$', 'MKSTREAM');
    deps.log.info({ group: GROUP_NAME, stream: deps.streams.notifications }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      deps.log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 */
function toFieldMap(fields: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }
  return map;
}

type StreamEntry = [streamId: string, fields: string[]];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Flattens an XREADGROUP reply ([[stream, [[id, fields], ...]], ...]) into
 * its entries. Pending entries deleted from the stream come back with
 * null fields; those map to an empty field list.
 */
function toStreamEntries(response: unknown): StreamEntry[] {
  const out: StreamEntry[] = [];
  if (!Array.isArray(response)) return out;

  for (const stream of response) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      out.push([entry[0], isStringArray(entry[1]) ? entry[1] : []]);
    }
  }
  return out;
}

async function ack(deps: ConsumerDeps, streamId: string): Promise<void> {
  await deps.redis.xack(deps.streams.notifications, GROUP_NAME, streamId);
}

/**
 * Processes a single stream entry: decode → validate → convert/record → ACK.
 *
 * - Undecodable or envelope-less entries can never succeed: logged and ACKed.
 * - A ConversionError is a per-message failure: logged with the event type
 *   and message id, copied to the dead-letter stream, ACKed.
 * - Any other failure (the sink) leaves the entry un-ACKed so Redis
 *   redelivers it from the pending entries list.
 */
export async function processEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: readonly string[],
): Promise<void> {
  const body = toFieldMap(fields).get('body');

  let decoded: unknown;
  try {
    decoded = JSON.parse(body ?? '');
  } catch (err: unknown) {
    deps.log.warn({ err, streamId }, 'Malformed notification entry, discarding');
    await ack(deps, streamId);
    return;
  }

  const parsed = notificationSchema.safeParse(decoded);
  if (!parsed.success) {
    deps.log.warn({ streamId, issues: parsed.error.issues }, 'Invalid notification envelope, discarding');
    await ack(deps, streamId);
    return;
  }

  const notification = parsed.data;
  const context = {
    streamId,
    event_type: notification.event_type,
    message_id: notification.message_id,
  };

  try {
    const outcome = await deps.collector.processNotification(notification);
    await ack(deps, streamId);
    deps.log.debug({ ...context, status: outcome.status }, 'Notification processed');
  } catch (err: unknown) {
    if (err instanceof ConversionError) {
      deps.log.error({ err, ...context, field: err.field }, 'Failed to convert notification');
      await quarantineNotification(deps.redis, deps.log, deps.streams.deadLetter, {
        stream_id: streamId,
        event_type: notification.event_type,
        message_id: notification.message_id,
        error: err.message,
        body: body ?? '',
      });
      await ack(deps, streamId);
      return;
    }

    // Do NOT ack: entry stays in pending list for redelivery
    deps.log.error({ err, ...context }, 'Failed to record event');
  }
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  deps.log.info('Checking for pending entries...');

  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, deps.consumerName,
    'COUNT', BATCH_SIZE,
    'STREAMS', deps.streams.notifications,
    '0',  // '0' = re-read pending entries for this consumer
  );

  let count = 0;
  for (const [streamId, fields] of toStreamEntries(response)) {
    if (fields.length === 0) continue; // already acked, skip nil entries
    await processEntry(deps, streamId, fields);
    count++;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Main consumer loop.
 *
 * XREADGROUP with BLOCK waits for new notifications; each one is handed
 * to processEntry in delivery order. Runs until `signal` is aborted.
 */
export async function startConsumer(deps: ConsumerDeps, signal: AbortSignal): Promise<void> {
  await ensureConsumerGroup(deps);

  deps.log.info(
    { consumer: deps.consumerName, group: GROUP_NAME, stream: deps.streams.notifications },
    'Consumer started',
  );

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, deps.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', deps.streams.notifications,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      for (const [streamId, fields] of toStreamEntries(response)) {
        await processEntry(deps, streamId, fields);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      deps.log.error({ err }, 'Consumer loop error — retrying in 1s');
      await sleep(1000);
    }
  }

  deps.log.info('Consumer stopped');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
