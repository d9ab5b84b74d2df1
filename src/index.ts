import { env, validateEnv } from '@/shared/config';
import { errorMessage, logger } from '@/shared/utils';
import { createVoiceServer } from './server';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', { error: errorMessage(error) });
  process.exit(1);
}

const server = createVoiceServer();
let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  // Force exit if sessions refuse to close
  const forceExit = setTimeout(() => {
    logger.warn('Shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000);
  forceExit.unref();

  try {
    await server.close();
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
server
  .listen(env.PORT)
  .then((port) => {
    logger.info('Voice gateway started', {
      port,
      websocketPath: env.WEBSOCKET_PATH,
      pipeline: env.PIPELINE_MODE,
      environment: env.NODE_ENV,
    });
  })
  .catch((error: unknown) => {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
