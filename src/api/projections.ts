/**
 * Read-only projections of store contents into API response shapes.
 */

import type { StateStore, StateStoreBackend } from '../ports/state-store.js';
import type { ScoredArticle } from '../types/news.js';
import type { ReplayState, ReplayStatus } from '../core/feed-replayer.js';

export interface BreakingNewsItem {
  id: string;
  title: string;
  description: string;
  link: string;
  category: string | null;
  score: number;
  detectedKeywords: string[];
  topic: string | null;
  publishedAt: string;
  detectedAt: string;
  timeAgo: string;
}

export interface BreakingNewsResponse {
  count: number;
  breakingNews: BreakingNewsItem[];
}

export interface StatsResponse {
  totalProcessed: number;
  breakingNewsCount: number;
  activeTopics: number;
  /** Articles per second since the store's start time */
  processingRate: number;
  processingStatus: ReplayState;
  finalProcessingRate: number | null;
  simulationTime: string | null;
  realStartTime: string;
  uptimeSeconds: number;
}

export interface TopicsResponse {
  count: number;
  topics: { topic: string; articleCount: number }[];
}

export interface HealthResponse {
  status: 'healthy';
  processorRunning: boolean;
  stateStore: StateStoreBackend;
  timestamp: string;
}

/**
 * Compact age label: "42s ago", "5m ago", "3h ago", "2d ago".
 * An instant after `now` reads as "0s ago".
 */
export function formatTimeAgo(then: Date, now: Date): string {
  const seconds = Math.max(0, (now.getTime() - then.getTime()) / 1000);

  if (seconds < 60) {
    return `${String(Math.floor(seconds))}s ago`;
  }
  if (seconds < 3600) {
    return `${String(Math.floor(seconds / 60))}m ago`;
  }
  if (seconds < 86400) {
    return `${String(Math.floor(seconds / 3600))}h ago`;
  }
  return `${String(Math.floor(seconds / 86400))}d ago`;
}

function toBreakingNewsItem(scored: ScoredArticle, reference: Date): BreakingNewsItem {
  const { article } = scored;
  return {
    id: article.id,
    title: article.title,
    description: article.description,
    link: article.link,
    category: article.category,
    score: scored.totalScore,
    detectedKeywords: [...scored.detectedKeywords],
    topic: scored.topic,
    publishedAt: article.publishedAt.toISOString(),
    detectedAt: scored.detectedAt.toISOString(),
    timeAgo: formatTimeAgo(scored.detectedAt, reference),
  };
}

/**
 * Breaking news, highest score first, optionally for one topic.
 * Ages are measured against the simulated clock when it is set.
 */
export async function getBreakingNewsView(
  store: StateStore,
  filter: { topic?: string | undefined },
  now: Date = new Date()
): Promise<BreakingNewsResponse> {
  const reference = (await store.getSimulationTime()) ?? now;
  const entries = await store.listBreakingNews();

  const items = entries
    .filter((scored) => !filter.topic || scored.topic === filter.topic)
    .map((scored) => toBreakingNewsItem(scored, reference))
    .sort((a, b) => b.score - a.score);

  return { count: items.length, breakingNews: items };
}

export async function getStatsView(
  store: StateStore,
  replay: ReplayStatus,
  now: Date = new Date()
): Promise<StatsResponse> {
  const [totalProcessed, breakingNewsCount, activeTopics, startTime, simulationTime] =
    await Promise.all([
      store.getTotalProcessed(),
      store.breakingNewsCount(),
      store.topicCount(),
      store.getStartTime(),
      store.getSimulationTime(),
    ]);

  const uptimeSeconds = Math.max(0, (now.getTime() - startTime.getTime()) / 1000);
  const processingRate = totalProcessed > 0 && uptimeSeconds > 0 ? totalProcessed / uptimeSeconds : 0;

  return {
    totalProcessed,
    breakingNewsCount,
    activeTopics,
    processingRate,
    processingStatus: replay.state,
    finalProcessingRate: replay.finalProcessingRate,
    simulationTime: simulationTime?.toISOString() ?? null,
    realStartTime: startTime.toISOString(),
    uptimeSeconds,
  };
}

/**
 * Topics with a non-empty window, busiest first.
 */
export async function getTopicsView(store: StateStore): Promise<TopicsResponse> {
  const topics: { topic: string; articleCount: number }[] = [];

  for (const topic of await store.listTopics()) {
    const window = await store.getTopicWindow(topic);
    if (window.length > 0) {
      topics.push({ topic, articleCount: window.length });
    }
  }

  topics.sort((a, b) => b.articleCount - a.articleCount || a.topic.localeCompare(b.topic));
  return { count: topics.length, topics };
}

export function getHealthView(
  backend: StateStoreBackend,
  processorRunning: boolean,
  now: Date = new Date()
): HealthResponse {
  return {
    status: 'healthy',
    processorRunning,
    stateStore: backend,
    timestamp: now.toISOString(),
  };
}
