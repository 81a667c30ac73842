import { createCardCacheFromConfig } from './bootstrap';
import { config } from './config';
import { logger } from './logger';
import { buildApp } from './server';

/**
 * Main entrypoint for the card lookup service.
 * Brings the local corpus up to date, then starts Fastify on the configured host/port.
 */
async function main() {
  const cache = await createCardCacheFromConfig();
  const app = await buildApp({ cache, logLevel: config.logLevel });

  app.addHook('onClose', async () => {
    await cache.close();
  });

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Card cache listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  logger.fatal({ err }, 'Fatal error starting card cache');
  process.exit(1);
});
