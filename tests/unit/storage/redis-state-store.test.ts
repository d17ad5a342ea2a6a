/**
 * Redis-specific behavior: namespacing, malformed records, connection checks.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import {
  RedisStateStore,
  createRedisStateStore,
} from '../../../src/storage/redis-state-store.js';
import { StoreConnectionError } from '../../../src/core/errors.js';
import { createMockLogger, createScoredArticle, type MockLogger } from '../../helpers/factories.js';

describe('RedisStateStore', () => {
  let client: Redis;
  let logger: MockLogger;

  beforeEach(async () => {
    client = new RedisMock();
    await client.flushall();
    logger = createMockLogger();
  });

  it('keeps namespaces apart on one instance', async () => {
    const first = await createRedisStateStore(client, { logger, namespace: 'one:' });
    const second = await createRedisStateStore(client, { logger, namespace: 'two:' });

    await first.addSeenHash('hash-1');
    await first.putBreakingNews(createScoredArticle({}, { id: 'story0000001' }));

    expect(await second.hasSeenHash('hash-1')).toBe(false);
    expect(await second.breakingNewsCount()).toBe(0);
    expect(await client.exists('one:breaking_news:story0000001')).toBe(1);
  });

  it('skips undecodable records when listing', async () => {
    const store = await createRedisStateStore(client, { logger, namespace: 'test:' });
    await store.putBreakingNews(createScoredArticle({}, { id: 'story0000001' }));
    await client.set('test:breaking_news:broken', '{not json');

    const listed = await store.listBreakingNews();

    expect(listed.map((scored) => scored.article.id)).toEqual(['story0000001']);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'test:breaking_news:broken' }),
      'Skipping undecodable breaking-news record'
    );
  });

  it('discards undecodable records during cleanup', async () => {
    const store = await createRedisStateStore(client, { logger, namespace: 'test:' });
    await store.advanceSimulationTime(new Date('2024-03-01T12:00:00.000Z'));
    await store.putBreakingNews(
      createScoredArticle(
        { detectedAt: new Date('2024-03-01T11:00:00.000Z') },
        { id: 'story0000001' }
      )
    );
    await client.set('test:breaking_news:broken', JSON.stringify({ article: { id: 'x' } }));

    expect(await store.cleanupExpiredBreakingNews()).toBe(1);
    expect(await client.exists('test:breaking_news:broken')).toBe(0);
    expect(await store.breakingNewsCount()).toBe(1);
  });

  it('does not move an existing start time on initialize', async () => {
    const first = await createRedisStateStore(client, {
      logger,
      now: () => new Date('2024-03-01T00:00:00.000Z'),
    });
    const second = await createRedisStateStore(client, {
      logger,
      now: () => new Date('2024-03-02T00:00:00.000Z'),
    });

    expect(await second.getStartTime()).toEqual(new Date('2024-03-01T00:00:00.000Z'));
    expect(await first.getStartTime()).toEqual(new Date('2024-03-01T00:00:00.000Z'));
  });

  it('fails with StoreConnectionError when PING fails', async () => {
    vi.spyOn(client, 'ping').mockRejectedValue(new Error('connection refused'));

    await expect(
      createRedisStateStore(client, { logger, url: 'redis://cache.invalid:6379' })
    ).rejects.toBeInstanceOf(StoreConnectionError);
  });

  it('reports the redis backend', () => {
    expect(new RedisStateStore(client, { logger }).backend).toBe('redis');
  });
});
