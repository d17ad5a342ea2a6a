/**
 * Redis-backed state store.
 *
 * Same contract as the in-process store, shared across processes through a
 * Redis instance. Key layout (under an optional namespace):
 *
 *   breaking_news:<id>      string   JSON ScoredArticle (see scored-article-codec)
 *   topic_windows:<topic>   zset     score = epoch ms, member = "<epochMs>|<articleId>"
 *   topic_index             set      every topic ever recorded
 *   seen_hashes             set      dedup hashes
 *   total_processed         string   INCR counter
 *   start_time, simulation_time, last_processed_time, last_cleanup_time
 *                           string   ISO-8601
 *
 * Redis drops a sorted set once its last member is removed; topic_index keeps
 * such topics listed so both adapters report the same topics.
 */

import { Redis } from 'ioredis';
import type { StateStore, StateStoreLimits } from '../ports/state-store.js';
import type { ScoredArticle, TopicWindowEntry } from '../types/news.js';
import type { Logger } from '../types/logger.js';
import { RecordDecodeError, StoreConnectionError, describeError } from '../core/errors.js';
import { decodeScoredArticle, encodeScoredArticle } from './scored-article-codec.js';
import {
  DEFAULT_STORE_LIMITS,
  breakingNewsCutoffMs,
  decodeWindowMember,
  encodeWindowMember,
  topicCleanupCutoffMs,
  velocityCutoffMs,
} from './window-math.js';

/** Keys fetched per SCAN / MGET round trip */
const SCAN_BATCH = 100;

export interface RedisStateStoreOptions {
  logger: Logger;
  /** Prepended to every key, e.g. "monitor:" */
  namespace?: string;
  limits?: Partial<StateStoreLimits>;
  /** Wall clock, overridable for tests */
  now?: () => Date;
}

interface RedisKeys {
  breakingPrefix: string;
  topicPrefix: string;
  topicIndex: string;
  seenHashes: string;
  totalProcessed: string;
  startTime: string;
  simulationTime: string;
  lastProcessedTime: string;
  lastCleanupTime: string;
}

function buildKeys(namespace: string): RedisKeys {
  return {
    breakingPrefix: `${namespace}breaking_news:`,
    topicPrefix: `${namespace}topic_windows:`,
    topicIndex: `${namespace}topic_index`,
    seenHashes: `${namespace}seen_hashes`,
    totalProcessed: `${namespace}total_processed`,
    startTime: `${namespace}start_time`,
    simulationTime: `${namespace}simulation_time`,
    lastProcessedTime: `${namespace}last_processed_time`,
    lastCleanupTime: `${namespace}last_cleanup_time`,
  };
}

/**
 * Escape glob metacharacters so a literal prefix can be used in SCAN MATCH.
 */
function escapeGlob(literal: string): string {
  return literal.replace(/[*?[\]\\]/g, '\\$&');
}

function parseDate(value: string | null): Date | null {
  if (value === null) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Pull a command's reply out of a MULTI/EXEC result, rethrowing its error.
 */
function execReply(results: [Error | null, unknown][] | null, index: number): unknown {
  if (results === null) {
    throw new Error('Redis transaction was aborted');
  }
  const entry = results[index];
  if (!entry) {
    throw new Error(`Redis transaction returned no reply at ${String(index)}`);
  }
  const [error, reply] = entry;
  if (error) {
    throw error;
  }
  return reply;
}

function asCount(reply: unknown): number {
  if (typeof reply === 'number') return reply;
  if (typeof reply === 'string') return Number(reply);
  throw new Error(`Unexpected Redis reply: ${String(reply)}`);
}

export class RedisStateStore implements StateStore {
  readonly backend = 'redis' as const;

  private readonly client: Redis;
  private readonly logger: Logger;
  private readonly keys: RedisKeys;
  private readonly limits: StateStoreLimits;
  private readonly now: () => Date;

  /**
   * Use createRedisStateStore / connectRedisStateStore, which verify the
   * connection before handing the store out.
   */
  constructor(client: Redis, options: RedisStateStoreOptions) {
    this.client = client;
    this.logger = options.logger.child({ component: 'redis-state-store' });
    this.keys = buildKeys(options.namespace ?? '');
    this.limits = { ...DEFAULT_STORE_LIMITS, ...options.limits };
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Stamp the start time unless another process already did.
   */
  async initialize(): Promise<void> {
    await this.client.set(this.keys.startTime, this.now().toISOString(), 'NX');
  }

  // --- Dedup -------------------------------------------------------------------

  async addSeenHash(hash: string): Promise<boolean> {
    const added = await this.client.sadd(this.keys.seenHashes, hash);
    return added === 1;
  }

  async hasSeenHash(hash: string): Promise<boolean> {
    return (await this.client.sismember(this.keys.seenHashes, hash)) === 1;
  }

  async seenHashCount(): Promise<number> {
    return this.client.scard(this.keys.seenHashes);
  }

  // --- Topic windows -------------------------------------------------------------

  async recordTopicEntry(topic: string, timestamp: Date, articleId: string): Promise<void> {
    const score = timestamp.getTime();
    const results = await this.client
      .multi()
      .zadd(this.topicKey(topic), score, encodeWindowMember(score, articleId))
      .sadd(this.keys.topicIndex, topic)
      .exec();
    execReply(results, 0);
  }

  async pruneAndCount(topic: string, timestamp: Date): Promise<number> {
    const key = this.topicKey(topic);
    const cutoff = velocityCutoffMs(timestamp, this.limits);
    const results = await this.client
      .multi()
      .zremrangebyscore(key, '-inf', `(${String(cutoff)}`)
      .zcard(key)
      .exec();
    return asCount(execReply(results, 1));
  }

  async getTopicWindow(topic: string): Promise<TopicWindowEntry[]> {
    const members = await this.client.zrange(this.topicKey(topic), 0, -1);
    const entries: TopicWindowEntry[] = [];
    for (const member of members) {
      const decoded = decodeWindowMember(member);
      if (!decoded) {
        this.logger.warn({ topic, member }, 'Skipping malformed window member');
        continue;
      }
      entries.push({ timestamp: new Date(decoded.timestampMs), articleId: decoded.articleId });
    }
    return entries;
  }

  async listTopics(): Promise<string[]> {
    const topics = await this.client.smembers(this.keys.topicIndex);
    return topics.sort();
  }

  async topicCount(): Promise<number> {
    return this.client.scard(this.keys.topicIndex);
  }

  // --- Breaking news -------------------------------------------------------------

  async putBreakingNews(scored: ScoredArticle): Promise<void> {
    await this.client.set(this.breakingKey(scored.article.id), encodeScoredArticle(scored));
  }

  async getBreakingNews(articleId: string): Promise<ScoredArticle | null> {
    const payload = await this.client.get(this.breakingKey(articleId));
    return payload === null ? null : decodeScoredArticle(payload);
  }

  async listBreakingNews(): Promise<ScoredArticle[]> {
    const keys = await this.scanKeys(this.keys.breakingPrefix);
    const articles: ScoredArticle[] = [];

    for (const [key, payload] of await this.fetchAll(keys)) {
      try {
        articles.push(decodeScoredArticle(payload));
      } catch (error) {
        if (!(error instanceof RecordDecodeError)) throw error;
        this.logger.warn({ key, error: error.message }, 'Skipping undecodable breaking-news record');
      }
    }

    return articles.sort((a, b) => (a.article.id < b.article.id ? -1 : a.article.id > b.article.id ? 1 : 0));
  }

  async breakingNewsCount(): Promise<number> {
    return (await this.scanKeys(this.keys.breakingPrefix)).length;
  }

  // --- Counters & clock ------------------------------------------------------------

  async incrementProcessed(): Promise<number> {
    return this.client.incr(this.keys.totalProcessed);
  }

  async getTotalProcessed(): Promise<number> {
    const value = await this.client.get(this.keys.totalProcessed);
    return value === null ? 0 : Number(value);
  }

  async getStartTime(): Promise<Date> {
    const stored = parseDate(await this.client.get(this.keys.startTime));
    if (stored) {
      return stored;
    }
    await this.initialize();
    return parseDate(await this.client.get(this.keys.startTime)) ?? this.now();
  }

  async getSimulationTime(): Promise<Date | null> {
    return parseDate(await this.client.get(this.keys.simulationTime));
  }

  /**
   * Read-compare-write. The replayer is the only writer of the clock, and
   * only one run is active at a time.
   */
  async advanceSimulationTime(time: Date): Promise<Date> {
    const current = await this.getSimulationTime();
    if (current && current.getTime() >= time.getTime()) {
      return current;
    }
    await this.client.set(this.keys.simulationTime, time.toISOString());
    return new Date(time.getTime());
  }

  async getLastProcessedTime(): Promise<Date | null> {
    return parseDate(await this.client.get(this.keys.lastProcessedTime));
  }

  async setLastProcessedTime(time: Date): Promise<void> {
    await this.client.set(this.keys.lastProcessedTime, time.toISOString());
  }

  async getLastCleanupTime(): Promise<Date | null> {
    return parseDate(await this.client.get(this.keys.lastCleanupTime));
  }

  async setLastCleanupTime(time: Date): Promise<void> {
    await this.client.set(this.keys.lastCleanupTime, time.toISOString());
  }

  // --- Maintenance -----------------------------------------------------------------

  /**
   * Records that cannot be decoded are deleted and counted as expired.
   */
  async cleanupExpiredBreakingNews(): Promise<number> {
    const cutoff = breakingNewsCutoffMs(await this.clock(), this.limits);
    const keys = await this.scanKeys(this.keys.breakingPrefix);
    let removed = 0;

    for (const [key, payload] of await this.fetchAll(keys)) {
      let expired: boolean;
      try {
        expired = decodeScoredArticle(payload).detectedAt.getTime() < cutoff;
      } catch (error) {
        if (!(error instanceof RecordDecodeError)) throw error;
        this.logger.warn({ key, error: error.message }, 'Discarding undecodable breaking-news record');
        expired = true;
      }

      if (expired) {
        removed += await this.client.del(key);
      }
    }

    return removed;
  }

  async cleanupTopicWindows(): Promise<number> {
    const cutoff = topicCleanupCutoffMs(await this.clock(), this.limits);
    const topics = await this.client.smembers(this.keys.topicIndex);
    let changed = 0;

    for (const topic of topics) {
      const removed = await this.client.zremrangebyscore(
        this.topicKey(topic),
        '-inf',
        `(${String(cutoff)}`
      );
      if (removed > 0) {
        changed++;
      }
    }

    return changed;
  }

  async reset(): Promise<void> {
    const scanned = [
      ...(await this.scanKeys(this.keys.breakingPrefix)),
      ...(await this.scanKeys(this.keys.topicPrefix)),
    ];
    const fixed = [
      this.keys.topicIndex,
      this.keys.seenHashes,
      this.keys.totalProcessed,
      this.keys.startTime,
      this.keys.simulationTime,
      this.keys.lastProcessedTime,
      this.keys.lastCleanupTime,
    ];

    const all = [...scanned, ...fixed];
    for (let i = 0; i < all.length; i += SCAN_BATCH) {
      await this.client.del(...all.slice(i, i + SCAN_BATCH));
    }

    await this.client.set(this.keys.startTime, this.now().toISOString());
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  // --- Internals -------------------------------------------------------------------

  private topicKey(topic: string): string {
    return `${this.keys.topicPrefix}${topic}`;
  }

  private breakingKey(articleId: string): string {
    return `${this.keys.breakingPrefix}${articleId}`;
  }

  private async clock(): Promise<Date> {
    return (await this.getSimulationTime()) ?? this.now();
  }

  /**
   * All keys under a literal prefix. SCAN may repeat keys; they are deduplicated.
   */
  private async scanKeys(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    const found = new Set<string>();
    let cursor = '0';

    do {
      const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_BATCH);
      for (const key of batch) {
        found.add(key);
      }
      cursor = next;
    } while (cursor !== '0');

    return [...found];
  }

  /**
   * MGET in batches; keys deleted between SCAN and MGET are left out.
   */
  private async fetchAll(keys: string[]): Promise<[string, string][]> {
    const pairs: [string, string][] = [];
    for (let i = 0; i < keys.length; i += SCAN_BATCH) {
      const batch = keys.slice(i, i + SCAN_BATCH);
      const values = await this.client.mget(...batch);
      batch.forEach((key, index) => {
        const value = values[index];
        if (value !== null && value !== undefined) {
          pairs.push([key, value]);
        }
      });
    }
    return pairs;
  }
}

/**
 * Build a store over an existing client, verifying it answers PING.
 *
 * @throws StoreConnectionError when the backend does not respond
 */
export async function createRedisStateStore(
  client: Redis,
  options: RedisStateStoreOptions & { url?: string }
): Promise<RedisStateStore> {
  try {
    await client.ping();
  } catch (error) {
    throw new StoreConnectionError(options.url ?? 'redis', error);
  }

  const store = new RedisStateStore(client, options);
  await store.initialize();
  options.logger.info(
    { backend: 'redis', namespace: options.namespace ?? '' },
    'Redis state store connected'
  );
  return store;
}

/**
 * Connect to the Redis instance at `url` and build a store on it.
 *
 * @throws StoreConnectionError when the instance cannot be reached
 */
export async function connectRedisStateStore(
  url: string,
  options: RedisStateStoreOptions
): Promise<RedisStateStore> {
  const client = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 1 });

  try {
    await client.connect();
  } catch (error) {
    client.disconnect();
    options.logger.error({ url, error: describeError(error) }, 'Redis unreachable');
    throw new StoreConnectionError(url, error);
  }

  return createRedisStateStore(client, { ...options, url });
}
