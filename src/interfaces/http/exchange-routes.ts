import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { sendExchangeSchema } from '../../application/index.js';
import {
  ExchangeProperty,
  IllegalStateError,
  ResolveEndpointError,
  toError,
} from '../../domain/index.js';

/**
 * Registers the exchange routes.
 *
 * POST /api/v1/exchanges : route one message through the context
 */
async function exchangeRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates → resolves endpoint → sends → reports the outcome.
   *
   * Lifecycle events for the exchange reach the audit notifier along the way;
   * `dispatch_id` is the one stamped on `sending`, or null when the notifier
   * is not enabled for it.
   */
  fastify.post(
    '/api/v1/exchanges',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = sendExchangeSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { endpoint_uri, body, headers } = parsed.data;

      try {
        const exchange = await fastify.routing.send(endpoint_uri, body, headers);
        const dispatchId = exchange.getProperty(ExchangeProperty.DISPATCH_ID);
        const failure = exchange.getProperty(ExchangeProperty.EXCEPTION_CAUGHT);

        if (failure !== undefined) {
          return reply.status(502).send({
            status: 'failed',
            exchange_id: exchange.exchangeId,
            error: toError(failure).message,
          });
        }

        return reply.status(202).send({
          status: 'sent',
          exchange_id: exchange.exchangeId,
          dispatch_id: typeof dispatchId === 'string' ? dispatchId : null,
        });
      } catch (err: unknown) {
        if (err instanceof ResolveEndpointError) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        if (err instanceof IllegalStateError) {
          return reply.status(503).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    },
  );
}

export default fp(exchangeRoutes, {
  name: 'exchange-routes',
  dependencies: ['routing'],
  fastify: '5.x',
});
