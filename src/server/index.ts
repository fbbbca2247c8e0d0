// ============================================================================
// tracesift — Main Fastify Server Entry Point
// Config, app construction, graceful shutdown (SIGTERM/SIGINT, 8s timeout).
// ============================================================================

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('tracesift starting...', { port: config.port, host: config.host });

  const app = await buildApp(config);

  // --- Graceful shutdown ---

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info(`Received ${signal} — starting graceful shutdown`);

    // Force exit timeout: 8 seconds
    const forceExitTimer = setTimeout(() => {
      logger.error('Shutdown timeout exceeded (8s) — forcing exit');
      process.exit(1);
    }, 8000);
    forceExitTimer.unref();

    try {
      await app.close();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (err: unknown) {
      logger.error('Error during shutdown', { error: errorMessage(err) });
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  // --- Start listening ---

  const address = await app.listen({ port: config.port, host: config.host });

  logger.info('tracesift server started', {
    address,
    maxLines: config.maxLines,
    maxBytes: config.maxBytes,
    defaultGrammar: config.defaultGrammar,
  });
}

main().catch((err: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(err) });
  process.exit(1);
});
