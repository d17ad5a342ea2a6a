/**
 * Tests for the API response projections.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  formatTimeAgo,
  getBreakingNewsView,
  getHealthView,
  getStatsView,
  getTopicsView,
} from '../../../src/api/projections.js';
import type { ReplayStatus } from '../../../src/core/feed-replayer.js';
import { InMemoryStateStore } from '../../../src/storage/memory-state-store.js';
import { BASE_TIME, createScoredArticle, minutesAfter } from '../../helpers/factories.js';

const IDLE: ReplayStatus = {
  state: 'idle',
  processed: 0,
  duplicates: 0,
  startedAt: null,
  finishedAt: null,
  finalProcessingRate: null,
  error: null,
};

describe('formatTimeAgo', () => {
  it.each([
    [0, '0s ago'],
    [42, '42s ago'],
    [60, '1m ago'],
    [59 * 60 + 59, '59m ago'],
    [3600, '1h ago'],
    [23 * 3600, '23h ago'],
    [86400 * 2 + 5, '2d ago'],
  ])('formats %i seconds as %s', (seconds, expected) => {
    expect(formatTimeAgo(BASE_TIME, new Date(BASE_TIME.getTime() + seconds * 1000))).toBe(expected);
  });

  it('reads future instants as just now', () => {
    expect(formatTimeAgo(minutesAfter(5), BASE_TIME)).toBe('0s ago');
  });
});

describe('projections', () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore({ now: () => BASE_TIME });
  });

  describe('getBreakingNewsView', () => {
    beforeEach(async () => {
      await store.putBreakingNews(
        createScoredArticle(
          { totalScore: 0.6, topic: 'ukraine', detectedAt: minutesAfter(-5) },
          { id: 'low000000000', title: 'Low' }
        )
      );
      await store.putBreakingNews(
        createScoredArticle(
          { totalScore: 0.9, topic: 'gaza', detectedAt: minutesAfter(-120) },
          { id: 'high00000000', title: 'High' }
        )
      );
    });

    it('lists entries by descending score with ages against the simulated clock', async () => {
      await store.advanceSimulationTime(BASE_TIME);

      const view = await getBreakingNewsView(store, {});

      expect(view.count).toBe(2);
      expect(view.breakingNews.map((item) => [item.id, item.timeAgo])).toEqual([
        ['high00000000', '2h ago'],
        ['low000000000', '5m ago'],
      ]);
      expect(view.breakingNews[0]).toMatchObject({
        title: 'High',
        score: 0.9,
        topic: 'gaza',
        category: 'business',
        publishedAt: '2024-03-01T12:00:00.000Z',
        detectedAt: '2024-03-01T10:00:00.000Z',
      });
    });

    it('measures ages against the given time before the clock is set', async () => {
      const view = await getBreakingNewsView(store, {}, minutesAfter(60));

      expect(view.breakingNews.map((item) => item.timeAgo)).toEqual(['3h ago', '1h ago']);
    });

    it('filters by topic', async () => {
      const view = await getBreakingNewsView(store, { topic: 'ukraine' }, BASE_TIME);

      expect(view.count).toBe(1);
      expect(view.breakingNews[0]?.id).toBe('low000000000');
    });
  });

  describe('getStatsView', () => {
    it('reports counters and the processing rate', async () => {
      for (let i = 0; i < 5; i++) {
        await store.incrementProcessed();
      }
      await store.recordTopicEntry('ukraine', BASE_TIME, 'u1');
      await store.putBreakingNews(createScoredArticle());
      await store.advanceSimulationTime(new Date('2022-03-07T08:00:00.000Z'));

      const stats = await getStatsView(
        store,
        { ...IDLE, state: 'complete', finalProcessingRate: 12.5 },
        new Date(BASE_TIME.getTime() + 10_000)
      );

      expect(stats).toEqual({
        totalProcessed: 5,
        breakingNewsCount: 1,
        activeTopics: 1,
        processingRate: 0.5,
        processingStatus: 'complete',
        finalProcessingRate: 12.5,
        simulationTime: '2022-03-07T08:00:00.000Z',
        realStartTime: '2024-03-01T12:00:00.000Z',
        uptimeSeconds: 10,
      });
    });

    it('reports a zero rate before anything is processed', async () => {
      const stats = await getStatsView(store, IDLE, BASE_TIME);

      expect(stats.processingRate).toBe(0);
      expect(stats.simulationTime).toBeNull();
      expect(stats.finalProcessingRate).toBeNull();
    });
  });

  describe('getTopicsView', () => {
    it('lists non-empty windows, busiest first', async () => {
      await store.recordTopicEntry('gaza', BASE_TIME, 'g1');
      await store.recordTopicEntry('ukraine', BASE_TIME, 'u1');
      await store.recordTopicEntry('ukraine', minutesAfter(1), 'u2');
      await store.recordTopicEntry('taiwan', BASE_TIME, 't1');
      await store.pruneAndCount('taiwan', minutesAfter(120));

      expect(await getTopicsView(store)).toEqual({
        count: 2,
        topics: [
          { topic: 'ukraine', articleCount: 2 },
          { topic: 'gaza', articleCount: 1 },
        ],
      });
    });
  });

  describe('getHealthView', () => {
    it('reports the backend and replay state', () => {
      expect(getHealthView('memory', true, BASE_TIME)).toEqual({
        status: 'healthy',
        processorRunning: true,
        stateStore: 'memory',
        timestamp: '2024-03-01T12:00:00.000Z',
      });
    });
  });
});
