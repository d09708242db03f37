import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/notifier/health : context and notifier lifecycle state.
 *
 * 200 only when both are started; audit records are dropped otherwise.
 */
async function notifierRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/notifier/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const context = fastify.routing.status;
      const notifier = fastify.auditNotifier.status;
      const healthy = context === 'started' && notifier === 'started';

      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'ok' : 'degraded',
        context,
        notifier,
        destination: fastify.auditNotifier.destination,
      });
    },
  );
}

export default fp(notifierRoutes, {
  name: 'notifier-routes',
  dependencies: ['routing'],
  fastify: '5.x',
});
