/**
 * State store factories shared by suites that must pass on both backends.
 * The Redis adapter runs against ioredis-mock.
 */

import RedisMock from 'ioredis-mock';
import type { StateStore } from '../../src/ports/state-store.js';
import { InMemoryStateStore } from '../../src/storage/memory-state-store.js';
import { createRedisStateStore } from '../../src/storage/redis-state-store.js';
import { createMockLogger } from './factories.js';

export type StoreFactory = (now?: () => Date) => Promise<StateStore>;

export const STORE_FACTORIES: [string, StoreFactory][] = [
  ['InMemoryStateStore', (now) => Promise.resolve(new InMemoryStateStore(now ? { now } : {}))],
  [
    'RedisStateStore',
    async (now) => {
      const client = new RedisMock();
      await client.flushall();
      return createRedisStateStore(client, {
        logger: createMockLogger(),
        namespace: 'test:',
        ...(now ? { now } : {}),
      });
    },
  ],
];
