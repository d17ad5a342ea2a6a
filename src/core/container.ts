/**
 * Container - wires configuration, store, pipeline, scheduler and API.
 */

import type { Server } from 'node:http';
import type { Logger } from '../types/logger.js';
import type { StateStore } from '../ports/state-store.js';
import { type MergedConfig, loadConfig } from '../config/index.js';
import { InMemoryStateStore, connectRedisStateStore } from '../storage/index.js';
import { BreakingNewsScorer } from '../scoring/index.js';
import { createFileArticleSource } from '../feed/feed-loader.js';
import { createApp } from '../api/server.js';
import { createLogger } from './logger.js';
import { ArticleProcessor } from './article-processor.js';
import { FeedReplayer } from './feed-replayer.js';
import { CleanupScheduler } from './cleanup-scheduler.js';

export interface Container {
  config: MergedConfig;
  logger: Logger;
  store: StateStore;
  scorer: BreakingNewsScorer;
  processor: ArticleProcessor;
  replayer: FeedReplayer;
  cleanupScheduler: CleanupScheduler;
  /** Start the HTTP API; resolves once listening. No-op when the API is disabled. */
  listen: () => Promise<Server | null>;
  /** Stop replay and cleanup, close the API and the store */
  shutdown: () => Promise<void>;
}

/**
 * Build the configured state store. A Redis store that cannot be reached
 * fails startup with StoreConnectionError.
 */
export async function createStateStore(config: MergedConfig, logger: Logger): Promise<StateStore> {
  const store: StateStore =
    config.store.backend === 'redis'
      ? await connectRedisStateStore(config.store.redisUrl, {
          logger,
          namespace: config.store.keyPrefix,
        })
      : new InMemoryStateStore();

  if (config.store.resetOnStart) {
    await store.reset();
    logger.info({ backend: store.backend }, 'State store reset');
  }
  return store;
}

export async function createContainerAsync(configOverride?: MergedConfig): Promise<Container> {
  const config = configOverride ?? (await loadConfig());

  const logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    logDir: config.logging.logDir,
  });

  const store = await createStateStore(config, logger);
  const scorer = new BreakingNewsScorer(store);
  const processor = new ArticleProcessor(store, scorer, logger);

  const source = createFileArticleSource(
    config.replay.dataFile,
    { recentWindowDays: config.replay.recentWindowDays },
    logger
  );
  const replayer = new FeedReplayer(source, processor, store, logger, {
    acceleration: config.replay.acceleration,
    maxDelayMs: config.replay.maxDelayMs,
    progressEvery: config.replay.progressEvery,
  });

  const cleanupScheduler = new CleanupScheduler(store, logger, {
    intervalMs: config.cleanup.intervalMs,
  });

  let server: Server | null = null;

  const listen = async (): Promise<Server | null> => {
    if (!config.api.enabled) {
      return null;
    }
    const app = createApp({ store, replayStatus: () => replayer.getStatus() }, logger);
    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(config.api.port, () => {
        resolve(listening);
      });
      listening.once('error', reject);
    });
    logger.info({ port: config.api.port }, 'API listening');
    return server;
  };

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await replayer.stop();
    await cleanupScheduler.stop();

    const active = server;
    server = null;
    if (active) {
      await new Promise<void>((resolve, reject) => {
        active.close((error) => {
          if (error) reject(error);
          else resolve();
        });
      });
    }

    await store.close();
  };

  return {
    config,
    logger,
    store,
    scorer,
    processor,
    replayer,
    cleanupScheduler,
    listen,
    shutdown,
  };
}
