/**
 * Semi-structured document model for inbound notifications.
 *
 * Notifications arrive as deserialized JSON (or YAML) trees. The converter
 * only ever reads them, so every shape is described here once and shared by
 * the path evaluator, the coercions and the schemas.
 */

export type DocumentScalar = string | number | boolean | null;

export interface DocumentMapping {
  [key: string]: DocumentValue;
}

export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMapping;

/**
 * A notification body as handed over by the collector.
 *
 * `event_type` and `message_id` are part of the envelope every producer
 * must send; everything else depends on the emitting service.
 */
export interface Notification extends DocumentMapping {
  event_type: string;
  message_id: string;
}

export function isMapping(value: DocumentValue | undefined): value is DocumentMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: DocumentValue | undefined): value is DocumentValue[] {
  return Array.isArray(value);
}
