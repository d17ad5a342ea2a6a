/**
 * Raw feed records → NewsArticle timeline.
 *
 * Shared by the CSV and RSS readers: date parsing, id derivation, category
 * extraction, chronological ordering and the recent-window cut.
 */

import { createHash } from 'node:crypto';
import { DateTime } from 'luxon';
import type { NewsArticle } from '../types/news.js';

/**
 * One feed row before validation of its timestamp.
 */
export interface RawFeedRecord {
  guid: string;
  title: string;
  description: string;
  pubDate: string;
  link: string;
}

export interface TimelineOptions {
  /** Keep only this many days ending at the newest article (0 = keep all) */
  recentWindowDays: number;
}

export interface TimelineSummary {
  /** Records handed in */
  received: number;
  /** Dropped for an unparseable pubDate */
  invalidDates: number;
  /** Dropped by the recent-window cut */
  outsideWindow: number;
  windowStart: Date | null;
  windowEnd: Date | null;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Stable short id: first 12 hex chars of the MD5 of the source guid.
 */
export function generateArticleId(guid: string): string {
  return createHash('md5').update(guid).digest('hex').slice(0, 12);
}

const CATEGORY_PATTERN = /bbc\.co\.uk\/(?:news|sport)\/([a-z-]+)/;

/**
 * Category from a BBC link, e.g. /news/world-europe-60638042 → "world".
 */
export function extractCategory(link: string): string | null {
  const match = CATEGORY_PATTERN.exec(link.toLowerCase());
  const segment = match?.[1];
  if (!segment) {
    return null;
  }
  return segment.split('-')[0] || null;
}

/**
 * Parse a feed timestamp. Accepts RFC 2822, ISO 8601, HTTP and SQL forms;
 * strings without an offset are read as UTC.
 */
export function parsePublishDate(raw: string): Date | null {
  const value = raw.trim();
  if (!value) {
    return null;
  }

  const candidates = [
    DateTime.fromRFC2822(value, { zone: 'utc' }),
    DateTime.fromISO(value, { zone: 'utc' }),
    DateTime.fromHTTP(value, { zone: 'utc' }),
    DateTime.fromSQL(value, { zone: 'utc' }),
  ];

  const parsed = candidates.find((dt) => dt.isValid);
  return parsed ? parsed.toJSDate() : null;
}

/**
 * Turn raw records into articles ordered by ascending publish time.
 * Records with unparseable dates are dropped; equal timestamps keep feed order.
 */
export function buildTimeline(
  records: RawFeedRecord[],
  options: TimelineOptions
): { articles: NewsArticle[]; summary: TimelineSummary } {
  const dated: { record: RawFeedRecord; publishedAt: Date }[] = [];
  let invalidDates = 0;

  for (const record of records) {
    const publishedAt = parsePublishDate(record.pubDate);
    if (publishedAt === null) {
      invalidDates++;
      continue;
    }
    dated.push({ record, publishedAt });
  }

  // Array.prototype.sort is stable
  dated.sort((a, b) => a.publishedAt.getTime() - b.publishedAt.getTime());

  const last = dated[dated.length - 1];
  const windowEnd = last ? last.publishedAt : null;
  let windowStart = dated[0]?.publishedAt ?? null;

  let inWindow = dated;
  if (windowEnd && options.recentWindowDays > 0) {
    const start = new Date(windowEnd.getTime() - options.recentWindowDays * MS_PER_DAY);
    inWindow = dated.filter((entry) => entry.publishedAt.getTime() >= start.getTime());
    windowStart = start;
  }

  const articles = inWindow.map(
    ({ record, publishedAt }): NewsArticle => ({
      id: generateArticleId(record.guid),
      title: record.title,
      description: record.description,
      publishedAt,
      link: record.link,
      category: extractCategory(record.link),
    })
  );

  return {
    articles,
    summary: {
      received: records.length,
      invalidDates,
      outsideWindow: dated.length - inWindow.length,
      windowStart,
      windowEnd,
    },
  };
}
