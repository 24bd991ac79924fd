import { z } from 'zod';
import type { DocumentValue, Notification } from '../domain/index.js';

/** Any JSON value: the document model notifications are made of. */
export const documentValueSchema: z.ZodType<DocumentValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(documentValueSchema),
    z.record(z.string(), documentValueSchema),
  ]),
);

/**
 * Zod schema for an inbound notification body.
 *
 * Only the envelope is checked: `event_type` and `message_id` must be
 * non-empty strings. Every other field is kept as-is for the trait
 * extractors to walk.
 */
export const notificationSchema: z.ZodType<Notification> = z
  .object({
    event_type: z.string().min(1).max(255),
    message_id: z.string().min(1).max(255),
  })
  .catchall(documentValueSchema);

/** Validates a batch of raw notification bodies. */
export const notificationBatchSchema = z
  .array(notificationSchema)
  .min(1, 'Batch must contain at least one notification');
