import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { StreamCore } from '../../application/stream-core.js';

export interface CorePluginOptions {
  core: StreamCore;
  /** Identifies this process in rule change notifications and health output. */
  instanceId: string;
}

/**
 * Exposes the running alerting core to route plugins.
 *
 * The core is created and started by the entry point; this plugin only
 * decorates `fastify.core` and `fastify.instanceId`.
 */
async function corePlugin(fastify: FastifyInstance, opts: CorePluginOptions): Promise<void> {
  fastify.decorate('core', opts.core);
  fastify.decorate('instanceId', opts.instanceId);
}

export default fp(corePlugin, {
  name: 'core',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    core: StreamCore;
    instanceId: string;
  }
}
