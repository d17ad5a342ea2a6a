import { createHash } from 'node:crypto';

/**
 * Normalize a title for duplicate detection: lowercase, trimmed.
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().trim();
}

/**
 * Dedup hash of a title. Titles that normalize identically share a hash.
 */
export function titleContentHash(title: string): string {
  return createHash('sha256').update(normalizeTitle(title)).digest('hex');
}
