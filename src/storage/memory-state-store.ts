/**
 * In-process state store.
 *
 * Plain Maps and Sets, no persistence. Single-process only; the replay run
 * is sequential so no locking is needed.
 */

import type { StateStore, StateStoreLimits } from '../ports/state-store.js';
import type { ScoredArticle, TopicWindowEntry } from '../types/news.js';
import {
  DEFAULT_STORE_LIMITS,
  breakingNewsCutoffMs,
  compareWindowMembers,
  encodeWindowMember,
  topicCleanupCutoffMs,
  velocityCutoffMs,
} from './window-math.js';

interface WindowSlot {
  timestampMs: number;
  articleId: string;
  member: string;
}

export interface InMemoryStateStoreOptions {
  limits?: Partial<StateStoreLimits>;
  /** Wall clock, overridable for tests */
  now?: () => Date;
}

export class InMemoryStateStore implements StateStore {
  readonly backend = 'memory' as const;

  private readonly limits: StateStoreLimits;
  private readonly now: () => Date;

  private breakingNews = new Map<string, ScoredArticle>();
  private topicWindows = new Map<string, WindowSlot[]>();
  private seenHashes = new Set<string>();
  private totalProcessed = 0;
  private startTime: Date;
  private simulationTime: Date | null = null;
  private lastProcessedTime: Date | null = null;
  private lastCleanupTime: Date | null = null;

  constructor(options: InMemoryStateStoreOptions = {}) {
    this.limits = { ...DEFAULT_STORE_LIMITS, ...options.limits };
    this.now = options.now ?? (() => new Date());
    this.startTime = this.now();
  }

  addSeenHash(hash: string): Promise<boolean> {
    if (this.seenHashes.has(hash)) {
      return Promise.resolve(false);
    }
    this.seenHashes.add(hash);
    return Promise.resolve(true);
  }

  hasSeenHash(hash: string): Promise<boolean> {
    return Promise.resolve(this.seenHashes.has(hash));
  }

  seenHashCount(): Promise<number> {
    return Promise.resolve(this.seenHashes.size);
  }

  /**
   * Inserts in sorted-set order so both adapters list windows identically,
   * even when entries arrive out of timestamp order.
   */
  recordTopicEntry(topic: string, timestamp: Date, articleId: string): Promise<void> {
    const slot: WindowSlot = {
      timestampMs: timestamp.getTime(),
      articleId,
      member: encodeWindowMember(timestamp.getTime(), articleId),
    };

    let window = this.topicWindows.get(topic);
    if (!window) {
      window = [];
      this.topicWindows.set(topic, window);
    }

    // Scan from the tail: replay appends in ascending order, so this is O(1) in practice
    let index = window.length;
    while (index > 0) {
      const previous = window[index - 1];
      if (!previous) break;
      const order = compareWindowMembers(previous, slot);
      if (order === 0) {
        return Promise.resolve();
      }
      if (order < 0) break;
      index--;
    }
    window.splice(index, 0, slot);
    return Promise.resolve();
  }

  pruneAndCount(topic: string, timestamp: Date): Promise<number> {
    const window = this.topicWindows.get(topic);
    if (!window) {
      return Promise.resolve(0);
    }
    const cutoff = velocityCutoffMs(timestamp, this.limits);
    const kept = window.filter((slot) => slot.timestampMs >= cutoff);
    this.topicWindows.set(topic, kept);
    return Promise.resolve(kept.length);
  }

  getTopicWindow(topic: string): Promise<TopicWindowEntry[]> {
    const window = this.topicWindows.get(topic) ?? [];
    return Promise.resolve(
      window.map((slot) => ({ timestamp: new Date(slot.timestampMs), articleId: slot.articleId }))
    );
  }

  listTopics(): Promise<string[]> {
    return Promise.resolve([...this.topicWindows.keys()].sort());
  }

  topicCount(): Promise<number> {
    return Promise.resolve(this.topicWindows.size);
  }

  putBreakingNews(scored: ScoredArticle): Promise<void> {
    this.breakingNews.set(scored.article.id, scored);
    return Promise.resolve();
  }

  getBreakingNews(articleId: string): Promise<ScoredArticle | null> {
    return Promise.resolve(this.breakingNews.get(articleId) ?? null);
  }

  listBreakingNews(): Promise<ScoredArticle[]> {
    return Promise.resolve(
      [...this.breakingNews.values()].sort((a, b) =>
        a.article.id < b.article.id ? -1 : a.article.id > b.article.id ? 1 : 0
      )
    );
  }

  breakingNewsCount(): Promise<number> {
    return Promise.resolve(this.breakingNews.size);
  }

  incrementProcessed(): Promise<number> {
    this.totalProcessed += 1;
    return Promise.resolve(this.totalProcessed);
  }

  getTotalProcessed(): Promise<number> {
    return Promise.resolve(this.totalProcessed);
  }

  getStartTime(): Promise<Date> {
    return Promise.resolve(new Date(this.startTime.getTime()));
  }

  getSimulationTime(): Promise<Date | null> {
    return Promise.resolve(this.simulationTime ? new Date(this.simulationTime.getTime()) : null);
  }

  advanceSimulationTime(time: Date): Promise<Date> {
    if (this.simulationTime === null || time.getTime() > this.simulationTime.getTime()) {
      this.simulationTime = new Date(time.getTime());
    }
    return Promise.resolve(new Date(this.simulationTime.getTime()));
  }

  getLastProcessedTime(): Promise<Date | null> {
    return Promise.resolve(this.lastProcessedTime);
  }

  setLastProcessedTime(time: Date): Promise<void> {
    this.lastProcessedTime = time;
    return Promise.resolve();
  }

  getLastCleanupTime(): Promise<Date | null> {
    return Promise.resolve(this.lastCleanupTime);
  }

  setLastCleanupTime(time: Date): Promise<void> {
    this.lastCleanupTime = time;
    return Promise.resolve();
  }

  cleanupExpiredBreakingNews(): Promise<number> {
    const cutoff = breakingNewsCutoffMs(this.clock(), this.limits);
    let removed = 0;
    for (const [id, scored] of this.breakingNews) {
      if (scored.detectedAt.getTime() < cutoff) {
        this.breakingNews.delete(id);
        removed++;
      }
    }
    return Promise.resolve(removed);
  }

  cleanupTopicWindows(): Promise<number> {
    const cutoff = topicCleanupCutoffMs(this.clock(), this.limits);
    let changed = 0;
    for (const [topic, window] of this.topicWindows) {
      const kept = window.filter((slot) => slot.timestampMs >= cutoff);
      if (kept.length < window.length) {
        this.topicWindows.set(topic, kept);
        changed++;
      }
    }
    return Promise.resolve(changed);
  }

  reset(): Promise<void> {
    this.breakingNews = new Map();
    this.topicWindows = new Map();
    this.seenHashes = new Set();
    this.totalProcessed = 0;
    this.startTime = this.now();
    this.simulationTime = null;
    this.lastProcessedTime = null;
    this.lastCleanupTime = null;
    return Promise.resolve();
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  private clock(): Date {
    return this.simulationTime ?? this.now();
  }
}
