/**
 * Storefront Notifier
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import { App } from './app.js';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

let app: App | null = null;

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app?.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(() => process.exit(1));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch(() => process.exit(1));
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  shutdown('uncaughtException').catch(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

// Start the application
async function main(): Promise<void> {
  try {
    logger.info('='.repeat(50));
    logger.info('Storefront Notifier');
    logger.info('='.repeat(50));

    // Configuration errors surface here and stop the process
    app = new App();
    await app.start();

    // Log status periodically
    setInterval(() => {
      logger.debug('Application status', app?.getStatus());
    }, 60000); // Every minute
  } catch (error) {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Run
main().catch(() => process.exit(1));
