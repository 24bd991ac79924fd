import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

export interface QuarantinedNotification {
  stream_id: string;
  event_type: string;
  message_id: string;
  error: string;
  body: string;
}

/**
 * Copies a notification that failed conversion to the dead-letter stream.
 *
 * Best-effort: a failed XADD is logged and never blocks acknowledgement of
 * the original entry, which would otherwise be redelivered forever.
 */
export async function quarantineNotification(
  redis: Redis,
  log: Logger,
  streamKey: string,
  entry: QuarantinedNotification,
): Promise<void> {
  try {
    await redis.xadd(
      streamKey,
      '*',
      'stream_id', entry.stream_id,
      'event_type', entry.event_type,
      'message_id', entry.message_id,
      'error', entry.error,
      'body', entry.body,
    );
    log.debug({ stream: streamKey, message_id: entry.message_id }, 'Notification quarantined');
  } catch (err: unknown) {
    log.warn({ err, message_id: entry.message_id }, 'Failed to quarantine notification');
  }
}
