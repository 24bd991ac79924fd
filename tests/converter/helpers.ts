import type { DocumentMapping, Event, Notification, Trait } from '../../src/domain/index.js';

/**
 * Factory for notifications shaped like a compute service envelope.
 * The payload and any envelope field can be overridden.
 */
export function makeNotification(
  eventType: string,
  messageId: string,
  payload: DocumentMapping = {},
  overrides: DocumentMapping = {},
): Notification {
  return {
    event_type: eventType,
    message_id: messageId,
    priority: 'INFO',
    publisher_id: 'compute.host-1-2-3',
    timestamp: '2013-08-08 21:06:37.803826',
    payload,
    ...overrides,
  };
}

/** Fixed "now" for notifications that carry no timestamp. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export function traitNamed(event: Event, name: string): Trait | undefined {
  return event.traits.find((trait) => trait.name === name);
}
