import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { OutboxDeps } from '../../application/index.js';

export interface OutboxPluginOptions {
  deps: OutboxDeps;
}

/**
 * Decorates `fastify.outbox` with the use-case dependencies and releases
 * the broker client on server shutdown. The store connection belongs to
 * whoever created it.
 */
async function outboxPlugin(fastify: FastifyInstance, options: OutboxPluginOptions): Promise<void> {
  fastify.decorate('outbox', options.deps);

  fastify.addHook('onClose', async () => {
    await options.deps.broker.close();
    fastify.log.info('Broker client closed');
  });
}

export default fp(outboxPlugin, {
  name: 'outbox',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    outbox: OutboxDeps;
  }
}
