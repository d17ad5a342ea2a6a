/**
 * CleanupScheduler - periodic TTL eviction and topic-window pruning.
 *
 * Runs independently of ingestion; with the Redis store it may interleave
 * with article processing, which the store's per-command atomicity covers.
 */

import type { StateStore } from '../ports/state-store.js';
import type { Logger } from '../types/logger.js';
import { describeError } from './errors.js';

export interface CleanupSchedulerConfig {
  intervalMs: number;
}

export interface CleanupResult {
  expiredBreakingNews: number;
  prunedTopics: number;
}

const DEFAULT_CONFIG: CleanupSchedulerConfig = {
  intervalMs: 60_000,
};

export class CleanupScheduler {
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly config: CleanupSchedulerConfig;
  private readonly now: () => Date;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<void> | null = null;

  constructor(
    store: StateStore,
    logger: Logger,
    config: Partial<CleanupSchedulerConfig> = {},
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.logger = logger.child({ component: 'cleanup-scheduler' });
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = now;
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Cleanup scheduler already running');
      return;
    }
    this.running = true;
    this.logger.info({ intervalMs: this.config.intervalMs }, 'Cleanup scheduler started');
    this.scheduleNext();
  }

  /**
   * Clear the timer and wait for an in-flight cleanup to settle.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.logger.info('Cleanup scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run both cleanups once and stamp lastCleanupTime.
   */
  async runOnce(): Promise<CleanupResult> {
    const expiredBreakingNews = await this.store.cleanupExpiredBreakingNews();
    const prunedTopics = await this.store.cleanupTopicWindows();
    await this.store.setLastCleanupTime(this.now());

    const result = { expiredBreakingNews, prunedTopics };
    if (expiredBreakingNews > 0 || prunedTopics > 0) {
      this.logger.info(result, 'Cleanup removed stale state');
    } else {
      this.logger.debug(result, 'Cleanup found nothing stale');
    }
    return result;
  }

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, this.config.intervalMs);
  }

  /**
   * A failing cleanup is logged and the schedule continues.
   */
  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Cleanup failed');
    }
    if (this.running) {
      this.scheduleNext();
    }
  }
}
