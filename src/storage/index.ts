/**
 * Storage module exports.
 */

export { InMemoryStateStore, type InMemoryStateStoreOptions } from './memory-state-store.js';
export {
  RedisStateStore,
  createRedisStateStore,
  connectRedisStateStore,
  type RedisStateStoreOptions,
} from './redis-state-store.js';
export { encodeScoredArticle, decodeScoredArticle } from './scored-article-codec.js';
export { DEFAULT_STORE_LIMITS } from './window-math.js';
