/**
 * Tests for FeedReplayer - pacing, clock advancement and cancellation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FeedReplayer } from '../../../src/core/feed-replayer.js';
import { ArticleProcessor, type ProcessOutcome } from '../../../src/core/article-processor.js';
import { BreakingNewsScorer } from '../../../src/scoring/breaking-news-scorer.js';
import type { StateStore } from '../../../src/ports/state-store.js';
import { STORE_FACTORIES } from '../../helpers/stores.js';
import { FeedLoadError } from '../../../src/core/errors.js';
import type { NewsArticle } from '../../../src/types/news.js';
import {
  createArticle,
  createMockLogger,
  loggedMessages,
  minutesAfter,
  type MockLogger,
} from '../../helpers/factories.js';

class RecordingProcessor extends ArticleProcessor {
  readonly outcomes: ProcessOutcome[] = [];

  override async process(article: NewsArticle): Promise<ProcessOutcome> {
    const outcome = await super.process(article);
    this.outcomes.push(outcome);
    return outcome;
  }
}

function ukraineBurst(count: number): NewsArticle[] {
  return Array.from({ length: count }, (_, i) =>
    createArticle({
      id: `ukr00000000${String(i)}`,
      title: `Ukraine talks update ${String(i)}`,
      publishedAt: minutesAfter(i * 2),
    })
  );
}

describe.each(STORE_FACTORIES)('FeedReplayer on %s', (_name, createStore) => {
  let store: StateStore;
  let logger: MockLogger;
  let processor: RecordingProcessor;

  beforeEach(async () => {
    store = await createStore();
    logger = createMockLogger();
    processor = new RecordingProcessor(store, new BreakingNewsScorer(store), logger);
  });

  afterEach(async () => {
    await store.close();
  });

  it('replays the feed in order and advances the simulated clock', async () => {
    const articles = ukraineBurst(5);
    const replayer = new FeedReplayer(() => Promise.resolve(articles), processor, store, logger, {
      acceleration: 1e9,
    });

    replayer.start();
    await replayer.waitForCompletion();

    const velocities = processor.outcomes.map((outcome) =>
      outcome.status === 'scored' ? outcome.scored.velocityScore : -1
    );
    expect(velocities[0]).toBe(0);
    expect(velocities[1]).toBe(0);
    expect(velocities[2]).toBeCloseTo(0.7);
    expect(velocities.slice(3)).toEqual([1, 1]);
    expect(await store.getTopicWindow('ukraine')).toHaveLength(5);
    expect(await store.getSimulationTime()).toEqual(minutesAfter(8));

    const status = replayer.getStatus();
    expect(status.state).toBe('complete');
    expect(status.processed).toBe(5);
    expect(status.finalProcessingRate).not.toBeNull();
    expect(replayer.isRunning()).toBe(false);
  });

  it('counts duplicates separately', async () => {
    const articles = [
      createArticle({ id: 'first0000001', title: 'Ukraine talks update' }),
      createArticle({ id: 'second000001', title: 'Ukraine talks update' }),
    ];
    const replayer = new FeedReplayer(() => Promise.resolve(articles), processor, store, logger);

    replayer.start();
    await replayer.waitForCompletion();

    expect(replayer.getStatus()).toMatchObject({ state: 'complete', processed: 1, duplicates: 1 });
  });

  it('stops during a pacing delay without processing the next article', async () => {
    const articles = [
      ...ukraineBurst(5).map((article) => ({ ...article, publishedAt: minutesAfter(0) })),
      createArticle({ id: 'later0000001', title: 'Later story', publishedAt: minutesAfter(60) }),
    ];
    // One hour of feed time at x1000 is a 3.6 s sleep
    const replayer = new FeedReplayer(() => Promise.resolve(articles), processor, store, logger, {
      acceleration: 1000,
      maxDelayMs: 10_000,
    });

    replayer.start();
    await vi.waitFor(async () => {
      expect(await store.getTotalProcessed()).toBe(5);
    });
    await replayer.stop();

    expect(replayer.getStatus().state).toBe('stopped');
    expect(await store.getTotalProcessed()).toBe(5);
    expect(processor.outcomes).toHaveLength(5);
    expect(replayer.isRunning()).toBe(false);
  });

  it('ignores start while a run is active', async () => {
    const replayer = new FeedReplayer(
      () => Promise.resolve(ukraineBurst(2)),
      processor,
      store,
      logger
    );

    replayer.start();
    replayer.start();
    await replayer.waitForCompletion();

    expect(loggedMessages(logger, 'warn')).toEqual(['Replay already running']);
    expect(await store.getTotalProcessed()).toBe(2);
  });

  it('ends in failed when the feed cannot be loaded', async () => {
    const replayer = new FeedReplayer(
      () => Promise.reject(new FeedLoadError('data/missing.csv', new Error('ENOENT'))),
      processor,
      store,
      logger
    );

    replayer.start();
    await replayer.waitForCompletion();

    const status = replayer.getStatus();
    expect(status.state).toBe('failed');
    expect(status.error).toContain('data/missing.csv');
    expect(await store.getTotalProcessed()).toBe(0);
  });

  it('treats stop without a run as a no-op', async () => {
    const replayer = new FeedReplayer(() => Promise.resolve([]), processor, store, logger);

    await replayer.stop();

    expect(replayer.getStatus().state).toBe('idle');
  });

  it('rejects a non-positive acceleration', () => {
    expect(
      () => new FeedReplayer(() => Promise.resolve([]), processor, store, logger, { acceleration: 0 })
    ).toThrow(RangeError);
  });

  describe('delayBetween', () => {
    const replayer = (): FeedReplayer =>
      new FeedReplayer(() => Promise.resolve([]), processor, store, logger, {
        acceleration: 1000,
        maxDelayMs: 500,
      });

    it('divides the feed gap by the acceleration', () => {
      expect(replayer().delayBetween(minutesAfter(0), minutesAfter(1))).toBe(60);
    });

    it('caps long gaps', () => {
      expect(replayer().delayBetween(minutesAfter(0), minutesAfter(60))).toBe(500);
    });

    it('skips sub-millisecond and backwards gaps', () => {
      const start = minutesAfter(0);
      expect(replayer().delayBetween(start, new Date(start.getTime() + 500))).toBe(0);
      expect(replayer().delayBetween(minutesAfter(5), minutesAfter(0))).toBe(0);
    });
  });
});
