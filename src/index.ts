import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createAppContext } from './context.js';
import { buildServer } from './server.js';

async function main(): Promise<void> {
  logger.info('Initializing services...');
  const context = await createAppContext(config);
  const fastify = await buildServer(context);
  logger.info('Services initialized');

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down gracefully...');
    fastify.close().then(
      () => {
        logger.info('Shutdown complete');
        process.exit(0);
      },
      error => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on ${config.server.host}:${config.server.port}`);
}

main().catch(error => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});
