import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ConversionEngine } from '../../application/index.js';

export interface ConverterPluginOptions {
  engine: ConversionEngine;
}

/**
 * Fastify plugin that exposes the conversion engine to routes.
 *
 * The engine is built once at startup (a definition error aborts the
 * process before listen) and shared read-only by every request.
 */
async function converterPlugin(fastify: FastifyInstance, opts: ConverterPluginOptions): Promise<void> {
  fastify.decorate('converter', opts.engine);
}

export default fp(converterPlugin, {
  name: 'converter',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    converter: ConversionEngine;
  }
}
