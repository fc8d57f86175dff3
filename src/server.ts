import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { HandlebarsTemplateRenderer } from './infrastructure/templates/handlebars-renderer.js';
import { createEmailClient } from './infrastructure/email/index.js';
import type { EmailClient } from './infrastructure/email/index.js';
import type { Settings } from './infrastructure/config/settings.js';
import { loggerOptions, configureLogging } from './infrastructure/logging/logger.js';
import type { TemplateRenderer } from './application/content-selector.js';
import { mailerPlugin, eventRoutes, healthRoutes } from './interfaces/http/index.js';

export interface BuildServerOptions {
  /** Disable request logging (tests). */
  readonly logger?: boolean;
  readonly emailClient?: EmailClient;
  readonly renderer?: TemplateRenderer;
}

/**
 * Build the Fastify app.
 *
 * Order:
 * 1) Body parsing: every content type is read as a raw Buffer, since the
 *    envelope adapter decides how to decode it
 * 2) Mailer services plugin
 * 3) HTTP routes
 */
export async function buildServer(
  settings: Settings,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {

  const fastify = Fastify({
    logger: options.logger === false ? false : loggerOptions(settings.logLevel),
  });

  configureLogging(fastify.log, settings.logLevel);

  // --------------------------------------------------
  // Body parsing
  // --------------------------------------------------

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'buffer' },
    (_request, body, done) => {
      done(null, body);
    },
  );

  // --------------------------------------------------
  // Services
  // --------------------------------------------------

  await fastify.register(mailerPlugin, {
    settings,
    renderer: options.renderer ?? new HandlebarsTemplateRenderer({
      inline: settings.templatesInline,
      directory: settings.templatesDir,
    }),
    emailClient: options.emailClient ?? createEmailClient(settings, fastify.log),
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
