import { loadSettings } from './infrastructure/config/settings.js';
import { buildServer } from './server.js';

/**
 * Process entry.
 *
 * Settings are loaded once; a ConfigError here aborts startup.
 */
async function main(): Promise<void> {
  const settings = loadSettings();
  const fastify = await buildServer(settings);

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: settings.host,
    port: settings.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
