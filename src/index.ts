/**
 * Breaking news monitor - replays a news feed and flags breaking stories.
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainerAsync();

  const { logger, config, store, replayer, cleanupScheduler, listen } = container;

  logger.info(
    {
      dataFile: config.replay.dataFile,
      acceleration: config.replay.acceleration,
      stateStore: store.backend,
    },
    'Breaking news monitor starting...'
  );

  await listen();

  cleanupScheduler.start();
  replayer.start();
}

// Handle shutdown gracefully
async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown();
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown();
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
