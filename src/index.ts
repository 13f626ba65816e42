/**
 * Topicwire - topic news delivery bot for Telegram
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainer, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainer();

  const { logger, config, telegramChannel, newsService } = container;

  logger.info(
    {
      tickIntervalMs: config.scheduler.tickIntervalMs,
      maxConcurrentUsers: config.scheduler.maxConcurrentUsers,
      providerPriority: config.news.providerPriority,
      dataPath: config.paths.data,
    },
    'Topicwire starting...'
  );

  await telegramChannel.start();
  newsService.start();
}

// Single shutdown path for signals and fatal errors
async function shutdown(exitCode: number): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  try {
    if (container) {
      await container.shutdown();
    }
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('Shutdown failed:', error);
    exitCode = 1;
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown(0);
});

process.on('SIGTERM', () => {
  void shutdown(0);
});

// Handle uncaught errors
process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

// Start the application
main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
