/**
 * Cutoffs and window-entry encoding shared by both store adapters, so the
 * two backends prune, evict and order identically.
 */

import type { StateStoreLimits } from '../ports/state-store.js';
import { MS_PER_HOUR, MS_PER_MINUTE, SCORING } from '../scoring/constants.js';

export const DEFAULT_STORE_LIMITS: StateStoreLimits = {
  velocityWindowMinutes: SCORING.VELOCITY_WINDOW_MINUTES,
  breakingNewsTtlHours: SCORING.BREAKING_NEWS_TTL_HOURS,
};

/** Entries strictly older than this fall out of the velocity window */
export function velocityCutoffMs(timestamp: Date, limits: StateStoreLimits): number {
  return timestamp.getTime() - limits.velocityWindowMinutes * MS_PER_MINUTE;
}

/** Topic cleanup keeps twice the velocity window */
export function topicCleanupCutoffMs(clock: Date, limits: StateStoreLimits): number {
  return clock.getTime() - 2 * limits.velocityWindowMinutes * MS_PER_MINUTE;
}

/** Breaking entries detected strictly before this are expired */
export function breakingNewsCutoffMs(clock: Date, limits: StateStoreLimits): number {
  return clock.getTime() - limits.breakingNewsTtlHours * MS_PER_HOUR;
}

/**
 * Sorted-set member for a window entry: `<epochMs>|<articleId>`.
 */
export function encodeWindowMember(timestampMs: number, articleId: string): string {
  return `${String(timestampMs)}|${articleId}`;
}

/**
 * Inverse of encodeWindowMember. Returns null for a member that does not
 * carry a numeric timestamp prefix.
 */
export function decodeWindowMember(member: string): { timestampMs: number; articleId: string } | null {
  const separator = member.indexOf('|');
  if (separator === -1) {
    return null;
  }
  const timestampMs = Number(member.slice(0, separator));
  if (!Number.isFinite(timestampMs)) {
    return null;
  }
  return { timestampMs, articleId: member.slice(separator + 1) };
}

/**
 * Sorted-set order: score ascending, then member bytes.
 */
export function compareWindowMembers(
  a: { timestampMs: number; member: string },
  b: { timestampMs: number; member: string }
): number {
  if (a.timestampMs !== b.timestampMs) {
    return a.timestampMs - b.timestampMs;
  }
  if (a.member === b.member) {
    return 0;
  }
  return a.member < b.member ? -1 : 1;
}
