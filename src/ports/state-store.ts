/**
 * State Store Port
 *
 * One contract over every piece of replay state: dedup set, topic velocity
 * windows, breaking-news map, counters and clock fields. Two adapters
 * implement it (in-process and Redis); replay and scoring code only ever see
 * this interface.
 *
 * Every method is async so the shared adapter can do I/O behind it. Each
 * window mutation and each breaking-news read/write is atomic on its own;
 * nothing here needs a cross-key transaction.
 */

import type { ScoredArticle, TopicWindowEntry } from '../types/news.js';

export type StateStoreBackend = 'memory' | 'redis';

/**
 * Time bounds the store applies when pruning and evicting.
 */
export interface StateStoreLimits {
  /** Trailing velocity window */
  velocityWindowMinutes: number;
  /** Age beyond which breaking entries are evicted by cleanup */
  breakingNewsTtlHours: number;
}

export interface StateStore {
  readonly backend: StateStoreBackend;

  // --- Dedup ---------------------------------------------------------------

  /**
   * Add a content hash. Resolves true if it was new, false if already seen.
   * Test-and-set in one step, so two racing callers never both get true.
   */
  addSeenHash(hash: string): Promise<boolean>;
  hasSeenHash(hash: string): Promise<boolean>;
  seenHashCount(): Promise<number>;

  // --- Topic velocity windows ----------------------------------------------

  /**
   * Append an entry to a topic's window. Does not prune.
   */
  recordTopicEntry(topic: string, timestamp: Date, articleId: string): Promise<void>;

  /**
   * Drop the topic's entries older than `timestamp − velocity window`, then
   * return how many remain. Once this resolves every reader sees the pruned
   * window.
   */
  pruneAndCount(topic: string, timestamp: Date): Promise<number>;

  /** Entries ascending by timestamp; empty for unknown topics */
  getTopicWindow(topic: string): Promise<TopicWindowEntry[]>;
  /** Every topic ever recorded, including ones whose window is now empty */
  listTopics(): Promise<string[]>;
  topicCount(): Promise<number>;

  // --- Breaking news ---------------------------------------------------------

  /** Insert or overwrite by article id */
  putBreakingNews(scored: ScoredArticle): Promise<void>;
  getBreakingNews(articleId: string): Promise<ScoredArticle | null>;
  listBreakingNews(): Promise<ScoredArticle[]>;
  breakingNewsCount(): Promise<number>;

  // --- Counters & clock ----------------------------------------------------

  /** Resolves to the new total */
  incrementProcessed(): Promise<number>;
  getTotalProcessed(): Promise<number>;

  /** Fixed at construction, re-stamped by reset */
  getStartTime(): Promise<Date>;

  getSimulationTime(): Promise<Date | null>;
  /**
   * Move the simulated clock forward. An earlier instant is ignored.
   * Resolves to the clock value after the call.
   */
  advanceSimulationTime(time: Date): Promise<Date>;

  getLastProcessedTime(): Promise<Date | null>;
  setLastProcessedTime(time: Date): Promise<void>;
  getLastCleanupTime(): Promise<Date | null>;
  setLastCleanupTime(time: Date): Promise<void>;

  // --- Maintenance -----------------------------------------------------------

  /**
   * Remove breaking entries with detectedAt < clock − TTL, where clock is the
   * simulated time if set, else wall time. Resolves to the removed count.
   */
  cleanupExpiredBreakingNews(): Promise<number>;

  /**
   * Prune every topic window to clock − 2 × velocity window. Topics are kept
   * even when emptied. Resolves to the number of topics that changed.
   */
  cleanupTopicWindows(): Promise<number>;

  /** Drop all state and re-stamp the start time */
  reset(): Promise<void>;

  /** Release backend resources */
  close(): Promise<void>;
}
