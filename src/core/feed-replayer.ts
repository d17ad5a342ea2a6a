/**
 * FeedReplayer - paced, cancellable replay of a chronological feed.
 *
 * Between consecutive articles the run sleeps for the real inter-arrival gap
 * divided by the acceleration factor, capped at maxDelayMs. The simulated
 * clock is advanced to each article's publish time right before it is
 * processed.
 *
 * Cancellation is only observed between articles: stop() aborts the pacing
 * sleep and waits for the loop to exit, so an article is either fully
 * processed or never started.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { StateStore } from '../ports/state-store.js';
import type { NewsArticle } from '../types/news.js';
import type { Logger } from '../types/logger.js';
import type { ArticleSource } from '../feed/feed-loader.js';
import type { ArticleProcessor } from './article-processor.js';
import { describeError } from './errors.js';

export interface FeedReplayerConfig {
  /** Feed seconds per real second */
  acceleration: number;
  /** Upper bound on a single pacing sleep */
  maxDelayMs: number;
  /** Log progress every N processed articles (0 = never) */
  progressEvery: number;
}

const DEFAULT_CONFIG: FeedReplayerConfig = {
  acceleration: 1000,
  maxDelayMs: 500,
  progressEvery: 10,
};

/** Sleeps shorter than this are skipped */
const MIN_SLEEP_MS = 1;

export type ReplayState = 'idle' | 'running' | 'complete' | 'stopped' | 'failed';

export interface ReplayStatus {
  state: ReplayState;
  /** Articles scored in the current/last run */
  processed: number;
  /** Articles dropped at the dedup gate in the current/last run */
  duplicates: number;
  startedAt: Date | null;
  finishedAt: Date | null;
  /** Articles per second over the finished run; null until the run completes */
  finalProcessingRate: number | null;
  error: string | null;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export class FeedReplayer {
  private readonly source: ArticleSource;
  private readonly processor: ArticleProcessor;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly config: FeedReplayerConfig;

  private abortController: AbortController | null = null;
  private runPromise: Promise<void> | null = null;
  private status: ReplayStatus = {
    state: 'idle',
    processed: 0,
    duplicates: 0,
    startedAt: null,
    finishedAt: null,
    finalProcessingRate: null,
    error: null,
  };

  constructor(
    source: ArticleSource,
    processor: ArticleProcessor,
    store: StateStore,
    logger: Logger,
    config: Partial<FeedReplayerConfig> = {}
  ) {
    this.source = source;
    this.processor = processor;
    this.store = store;
    this.logger = logger.child({ component: 'feed-replayer' });
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (!(this.config.acceleration > 0)) {
      throw new RangeError(`acceleration must be positive, got ${String(this.config.acceleration)}`);
    }
  }

  /**
   * Start a run. No-op while a run is active.
   */
  start(): void {
    if (this.runPromise) {
      this.logger.warn('Replay already running');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.status = {
      state: 'running',
      processed: 0,
      duplicates: 0,
      startedAt: new Date(),
      finishedAt: null,
      finalProcessingRate: null,
      error: null,
    };

    this.runPromise = this.run(controller.signal).finally(() => {
      this.runPromise = null;
      this.abortController = null;
    });
  }

  /**
   * Cancel the run and wait for it to exit. Resolves normally.
   */
  async stop(): Promise<void> {
    const running = this.runPromise;
    if (!running) {
      return;
    }
    this.abortController?.abort();
    await running;
  }

  /**
   * Wait for the active run, if any, to finish on its own.
   */
  async waitForCompletion(): Promise<void> {
    await this.runPromise;
  }

  isRunning(): boolean {
    return this.runPromise !== null;
  }

  getStatus(): ReplayStatus {
    return { ...this.status };
  }

  /**
   * Pacing delay before an article, in ms.
   */
  delayBetween(previous: Date, next: Date): number {
    const gapMs = next.getTime() - previous.getTime();
    if (gapMs <= 0) {
      return 0;
    }
    const delay = Math.min(gapMs / this.config.acceleration, this.config.maxDelayMs);
    return delay < MIN_SLEEP_MS ? 0 : delay;
  }

  /**
   * Never rejects: every outcome ends up in status.
   */
  private async run(signal: AbortSignal): Promise<void> {
    let articles: NewsArticle[];
    try {
      articles = await this.source();
    } catch (error) {
      this.logger.error({ error: describeError(error) }, 'Failed to load feed, replay aborted');
      this.finish('failed', describeError(error));
      return;
    }

    this.logger.info({ articles: articles.length }, 'Replay started');

    try {
      let previous: Date | null = null;

      for (const article of articles) {
        if (signal.aborted) break;

        if (previous) {
          const delay = this.delayBetween(previous, article.publishedAt);
          if (delay > 0) {
            await sleep(delay, undefined, { signal });
          }
        }
        if (signal.aborted) break;
        previous = article.publishedAt;

        await this.store.advanceSimulationTime(article.publishedAt);
        const outcome = await this.processor.process(article);

        if (outcome.status === 'duplicate') {
          this.status.duplicates++;
          continue;
        }

        this.status.processed++;
        if (this.config.progressEvery > 0 && this.status.processed % this.config.progressEvery === 0) {
          this.logger.info(
            { processed: this.status.processed, latest: article.title.slice(0, 50) },
            'Replay progress'
          );
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        this.logger.error({ error: describeError(error) }, 'Replay failed');
        this.finish('failed', describeError(error));
        return;
      }
    }

    if (signal.aborted) {
      this.logger.info({ processed: this.status.processed }, 'Replay stopped');
      this.finish('stopped', null);
      return;
    }

    this.finish('complete', null);
    this.logger.info(
      {
        processed: this.status.processed,
        duplicates: this.status.duplicates,
        rate: this.status.finalProcessingRate?.toFixed(2),
      },
      'Replay complete'
    );
  }

  private finish(state: Exclude<ReplayState, 'idle' | 'running'>, error: string | null): void {
    const finishedAt = new Date();
    const startedAt = this.status.startedAt;
    let finalProcessingRate: number | null = null;

    if (state === 'complete' && startedAt) {
      const elapsedSeconds = (finishedAt.getTime() - startedAt.getTime()) / 1000;
      finalProcessingRate = elapsedSeconds > 0 ? this.status.processed / elapsedSeconds : 0;
    }

    this.status = { ...this.status, state, finishedAt, finalProcessingRate, error };
  }
}
