import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ListenerStatus } from '../../application/supervisor.js';

export interface HealthRoutesOptions {
  /** Listener states from the in-process supervisor. */
  listeners: () => ListenerStatus[];
}

/**
 * GET /health: liveness plus the state of every registered listener.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const listeners = opts.listeners();
    return reply.status(200).send({
      status: 'ok',
      uptime_seconds: Math.floor(process.uptime()),
      listeners: {
        total: listeners.length,
        streaming: listeners.filter((l) => l.state === 'streaming').length,
        items: listeners,
      },
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
