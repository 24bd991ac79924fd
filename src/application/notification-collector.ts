import type { Logger } from 'pino';
import type { Event, Notification } from '../domain/index.js';
import type { ConversionEngine } from './conversion-engine.js';

/** A converted event keyed by the `message_id` of its notification. */
export interface RecordedEvent {
  readonly message_id: string;
  readonly event: Event;
}

/**
 * Where converted events go.
 *
 * Implementations must be idempotent per `message_id`: the stream consumer
 * redelivers a notification whose events were not recorded.
 */
export interface EventSink {
  recordEvents(records: readonly RecordedEvent[]): Promise<void>;
}

export interface CollectorOptions {
  /** When false, notifications are accepted but not converted. */
  storeEvents: boolean;
}

export type CollectorOutcome =
  | { readonly status: 'skipped' }
  | { readonly status: 'dropped' }
  | { readonly status: 'recorded'; readonly event: Event };

/**
 * Use case: turn one notification into a recorded event.
 *
 * Conversion errors and sink errors are not handled here; the transport
 * decides whether to redeliver, quarantine or give up.
 */
export class NotificationCollector {
  constructor(
    private readonly engine: ConversionEngine,
    private readonly sink: EventSink,
    private readonly log: Logger,
    private readonly options: CollectorOptions = { storeEvents: true },
  ) {}

  async processNotification(notification: Notification): Promise<CollectorOutcome> {
    if (!this.options.storeEvents) {
      return { status: 'skipped' };
    }
    return this.messageToEvent(notification);
  }

  /**
   * @throws ConversionError when a trait value does not coerce.
   */
  async messageToEvent(notification: Notification): Promise<CollectorOutcome> {
    const event = this.engine.convert(notification);

    if (event === null) {
      this.log.debug(
        { event_type: notification.event_type, message_id: notification.message_id },
        'Dropping Notification',
      );
      return { status: 'dropped' };
    }

    await this.sink.recordEvents([{ message_id: notification.message_id, event }]);
    this.log.debug(
      { event_type: event.event_type, message_id: notification.message_id, traitCount: event.traits.length },
      'Event recorded',
    );
    return { status: 'recorded', event };
  }
}
