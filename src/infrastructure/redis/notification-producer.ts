import type { Redis } from 'ioredis';
import type { Notification } from '../../domain/index.js';

/**
 * Appends a notification to the inbound Redis Stream.
 *
 * The body travels as JSON in the `body` field; `event_type` and
 * `message_id` are duplicated as plain fields so the stream can be
 * inspected with XRANGE without decoding every entry.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueNotification(
  redis: Redis,
  streamKey: string,
  notification: Notification,
): Promise<string> {
  const entryId = await redis.xadd(
    streamKey,
    '*',
    'message_id', notification.message_id,
    'event_type', notification.event_type,
    'body', JSON.stringify(notification),
  );

  // XADD only returns null with NOMKSTREAM, which is not used here.
  return entryId ?? '';
}
