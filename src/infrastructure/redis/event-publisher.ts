import type { Redis } from 'ioredis';
import { traitJsonReplacer } from '../../domain/index.js';
import type { EventSink, RecordedEvent } from '../../application/index.js';

/**
 * Event sink that republishes converted events onto a Redis Stream.
 *
 * Entries carry the notification's `message_id`, whatever the definitions
 * did with the `message_id` trait. Downstream storage de-duplicates on it,
 * so redelivering the same notification is harmless.
 */
export class RedisEventPublisher implements EventSink {
  constructor(
    private readonly redis: Redis,
    private readonly streamKey: string,
  ) {}

  async recordEvents(records: readonly RecordedEvent[]): Promise<void> {
    for (const { message_id, event } of records) {
      await this.redis.xadd(
        this.streamKey,
        '*',
        'message_id', message_id,
        'event_type', event.event_type,
        'generated', event.generated,
        'traits', JSON.stringify(event.traits, traitJsonReplacer),
      );
    }
  }
}
