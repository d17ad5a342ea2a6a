/**
 * Scoring lexicon: urgency keywords, major topics and category priorities.
 *
 * Kept as data in data/lexicon.json and validated on first use.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const unitScore = z.number().min(0).max(1);

const lexiconSchema = z
  .object({
    urgencyKeywords: z.array(z.string().min(1)).min(1),
    highUrgencyKeywords: z.array(z.string().min(1)),
    majorTopics: z.array(z.string().min(1)),
    categoryScores: z.record(unitScore),
    defaultCategoryScore: unitScore,
  })
  .refine((lex) => lex.highUrgencyKeywords.every((k) => lex.urgencyKeywords.includes(k)), {
    message: 'highUrgencyKeywords must be a subset of urgencyKeywords',
  });

export interface Lexicon {
  /** Matched as lowercase substrings, in this order */
  readonly urgencyKeywords: readonly string[];
  readonly highUrgencyKeywords: ReadonlySet<string>;
  /** Scanned in order; first contained token wins */
  readonly majorTopics: readonly string[];
  readonly categoryScores: ReadonlyMap<string, number>;
  readonly defaultCategoryScore: number;
}

const LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

let cached: Lexicon | null = null;

/**
 * Parse and validate raw lexicon data.
 */
export function parseLexicon(raw: unknown): Lexicon {
  const data = lexiconSchema.parse(raw);
  return {
    urgencyKeywords: data.urgencyKeywords.map((k) => k.toLowerCase()),
    highUrgencyKeywords: new Set(data.highUrgencyKeywords.map((k) => k.toLowerCase())),
    majorTopics: data.majorTopics.map((t) => t.toLowerCase()),
    categoryScores: new Map(Object.entries(data.categoryScores)),
    defaultCategoryScore: data.defaultCategoryScore,
  };
}

/**
 * The bundled lexicon, read once.
 */
export function getDefaultLexicon(): Lexicon {
  if (!cached) {
    const content = readFileSync(LEXICON_URL, 'utf-8');
    cached = parseLexicon(JSON.parse(content) as unknown);
  }
  return cached;
}
