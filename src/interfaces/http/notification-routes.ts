import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { notificationSchema, notificationBatchSchema } from '../../application/index.js';
import { ConversionError, traitJsonReplacer } from '../../domain/index.js';
import { enqueueNotification } from '../../infrastructure/index.js';

export interface NotificationRouteOptions {
  /** Stream the worker consumes notifications from. */
  streamKey: string;
}

/**
 * Registers the notification ingestion routes.
 *
 * POST /api/v1/notifications          — single notification
 * POST /api/v1/notifications/batch    — batch (array of notifications)
 * POST /api/v1/notifications/preview  — convert without storing
 * GET  /api/v1/notifications/health   — Redis connectivity check
 */
async function notificationRoutes(fastify: FastifyInstance, opts: NotificationRouteOptions): Promise<void> {

  /**
   * Single notification ingestion.
   *
   * Validates the envelope → enqueues → returns 202. Conversion happens
   * in the worker; nothing here depends on the definitions.
   */
  fastify.post(
    '/api/v1/notifications',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = notificationSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const notification = parsed.data;

      // Fire-and-forget: enqueue without awaiting confirmation.
      enqueueNotification(fastify.redis, opts.streamKey, notification).catch((err: unknown) => {
        fastify.log.error({ err, message_id: notification.message_id }, 'Failed to enqueue notification');
      });

      return reply.status(202).send({
        status: 'accepted',
        message_id: notification.message_id,
      });
    },
  );

  /**
   * Batch ingestion. The whole batch is rejected on any invalid envelope.
   */
  fastify.post(
    '/api/v1/notifications/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = notificationBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const enqueueAll = parsed.data.map((notification) =>
        enqueueNotification(fastify.redis, opts.streamKey, notification).catch((err: unknown) => {
          fastify.log.error({ err, message_id: notification.message_id }, 'Failed to enqueue notification');
        }),
      );
      Promise.all(enqueueAll).catch(() => { /* individual errors already logged */ });

      return reply.status(202).send({
        status: 'accepted',
        count: parsed.data.length,
        message_ids: parsed.data.map((n) => n.message_id),
      });
    },
  );

  /**
   * Dry-run conversion against the loaded definitions.
   *
   * 200 converted | 200 dropped | 422 when a trait value does not coerce.
   */
  fastify.post(
    '/api/v1/notifications/preview',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = notificationSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const notification = parsed.data;
      try {
        const rule = fastify.converter.selectRule(notification.event_type);
        if (rule === undefined) {
          fastify.log.debug(
            { event_type: notification.event_type, message_id: notification.message_id },
            'Dropping Notification',
          );
          return reply.status(200).send({ status: 'dropped' });
        }
        const event = rule.toEvent(notification);
        // Big int traits are bigint, which the default serializer rejects.
        return reply
          .status(200)
          .type('application/json; charset=utf-8')
          .send(JSON.stringify({ status: 'converted', rule_id: rule.id, event }, traitJsonReplacer));
      } catch (err: unknown) {
        if (err instanceof ConversionError) {
          return reply.status(422).send({
            error: 'Conversion failed',
            field: err.field,
            message: err.message,
          });
        }
        throw err;
      }
    },
  );

  /**
   * Health check — verifies Redis is reachable via PING.
   */
  fastify.get(
    '/api/v1/notifications/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const pong = await fastify.redis.ping();
        return reply.status(200).send({
          status: 'ok',
          redis: pong,
          rules: fastify.converter.rules.length,
        });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
      }
    },
  );
}

export default fp(notificationRoutes, {
  name: 'notification-routes',
  dependencies: ['redis', 'converter'],
  fastify: '5.x',
});
