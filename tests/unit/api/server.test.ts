/**
 * HTTP routing tests against an app bound to an ephemeral local port.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../../src/api/server.js';
import type { ReplayStatus } from '../../../src/core/feed-replayer.js';
import { InMemoryStateStore } from '../../../src/storage/memory-state-store.js';
import {
  createMockLogger,
  createScoredArticle,
  loggedMessages,
  type MockLogger,
} from '../../helpers/factories.js';

const RUNNING: ReplayStatus = {
  state: 'running',
  processed: 3,
  duplicates: 0,
  startedAt: new Date('2024-03-01T12:00:00.000Z'),
  finishedAt: null,
  finalProcessingRate: null,
  error: null,
};

describe('API server', () => {
  let store: InMemoryStateStore;
  let logger: MockLogger;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new InMemoryStateStore();
    logger = createMockLogger();
    const app = createApp({ store, replayStatus: () => RUNNING }, logger);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => {
        resolve(listening);
      });
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${String(address.port)}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });
  });

  it('serves health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'healthy',
      processorRunning: true,
      stateStore: 'memory',
    });
  });

  it('filters breaking news by topic', async () => {
    await store.putBreakingNews(createScoredArticle({ topic: 'gaza' }, { id: 'gaza00000001' }));
    await store.putBreakingNews(createScoredArticle({ topic: 'ukraine' }, { id: 'ukr000000001' }));

    const response = await fetch(`${baseUrl}/api/breaking?topic=gaza`);
    const body: unknown = await response.json();

    expect(body).toMatchObject({ count: 1, breakingNews: [{ id: 'gaza00000001' }] });
  });

  it('serves stats and topics', async () => {
    await store.recordTopicEntry('ukraine', new Date('2024-03-01T12:00:00.000Z'), 'u1');

    const stats: unknown = await (await fetch(`${baseUrl}/api/stats`)).json();
    const topics: unknown = await (await fetch(`${baseUrl}/api/topics`)).json();

    expect(stats).toMatchObject({ processingStatus: 'running', activeTopics: 1 });
    expect(topics).toEqual({ count: 1, topics: [{ topic: 'ukraine', articleCount: 1 }] });
  });

  it('turns store failures into 500 responses', async () => {
    vi.spyOn(store, 'listTopics').mockRejectedValue(new Error('store offline'));

    const response = await fetch(`${baseUrl}/api/topics`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Internal server error' });
    expect(loggedMessages(logger, 'error')).toContain('Unhandled API error');
  });
});
