import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /healthz: liveness plus the active delivery mode.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/healthz',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'ok',
        backend: fastify.mailer.emailClient.name,
        dry_run: fastify.mailer.settings.dryRun,
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['mailer'],
  fastify: '5.x',
});
