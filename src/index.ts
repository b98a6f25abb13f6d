import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const context = await buildApp();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');
    try {
      await context.shutdown();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await context.app.listen({ port: env.port, host: env.host });
  logger.info({ port: env.port, env: env.nodeEnv }, 'Care orchestrator started');
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
