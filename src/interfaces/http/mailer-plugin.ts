import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { PipelineDeps } from '../../application/pipeline.js';

/** Request-independent pipeline collaborators. */
export type MailerServices = Omit<PipelineDeps, 'log'>;

/**
 * Fastify plugin exposing the pipeline collaborators.
 *
 * Decorates `fastify.mailer`; everything on it is read-only after startup.
 */
async function mailerPlugin(fastify: FastifyInstance, services: MailerServices): Promise<void> {
  fastify.decorate('mailer', services);

  fastify.log.info(
    {
      backend: services.emailClient.name,
      dry_run: services.settings.dryRun,
      filters: services.settings.filters.length,
      filter_mode: services.settings.filterMode,
    },
    'Mailer configured',
  );
}

export default fp(mailerPlugin, {
  name: 'mailer',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.mailer` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    mailer: MailerServices;
  }
}
