/**
 * Feed Loader
 *
 * Reads a feed file from disk and returns the replay timeline. Any failure
 * to read or parse the file surfaces as FeedLoadError.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { NewsArticle } from '../types/news.js';
import type { Logger } from '../types/logger.js';
import { FeedLoadError } from '../core/errors.js';
import { buildTimeline, type TimelineOptions, type TimelineSummary } from './records.js';
import { readCsvRecords, readRssRecords, type ReadResult } from './readers.js';

export type FeedFormat = 'csv' | 'rss';

export interface LoadedFeed {
  articles: NewsArticle[];
  summary: TimelineSummary & { rejected: number };
}

/**
 * Pick the reader by file extension: .xml / .rss → RSS, anything else → CSV.
 */
export function detectFeedFormat(path: string): FeedFormat {
  const extension = extname(path).toLowerCase();
  return extension === '.xml' || extension === '.rss' ? 'rss' : 'csv';
}

export async function loadFeed(
  path: string,
  options: TimelineOptions,
  logger?: Logger
): Promise<LoadedFeed> {
  let read: ReadResult;
  try {
    const content = await readFile(path, 'utf-8');
    read = detectFeedFormat(path) === 'rss' ? readRssRecords(content) : readCsvRecords(content);
  } catch (error) {
    throw new FeedLoadError(path, error);
  }

  const { articles, summary } = buildTimeline(read.records, options);

  logger?.info(
    {
      path,
      received: summary.received,
      rejected: read.rejected,
      invalidDates: summary.invalidDates,
      outsideWindow: summary.outsideWindow,
      windowStart: summary.windowStart?.toISOString() ?? null,
      windowEnd: summary.windowEnd?.toISOString() ?? null,
      articles: articles.length,
    },
    'Feed loaded'
  );

  return { articles, summary: { ...summary, rejected: read.rejected } };
}

/**
 * Source of the replay timeline, as the replayer consumes it.
 */
export type ArticleSource = () => Promise<NewsArticle[]>;

/**
 * ArticleSource reading `path` on every run.
 */
export function createFileArticleSource(
  path: string,
  options: TimelineOptions,
  logger?: Logger
): ArticleSource {
  return async () => (await loadFeed(path, options, logger)).articles;
}
