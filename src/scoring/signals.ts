/**
 * Component Signals
 *
 * The four breaking-news signals as pure functions. Velocity is split:
 * the window bookkeeping lives on the store (recordTopicEntry /
 * pruneAndCount), only the count-to-score mapping is here.
 *
 * Every function returns a value in [0, 1].
 */

import { getDefaultLexicon, type Lexicon } from './lexicon.js';
import { MS_PER_HOUR, RECENCY_FLOOR, RECENCY_TIERS, SCORING } from './constants.js';

export interface KeywordScore {
  score: number;
  /** Matched keywords by first occurrence in the title, ties in lexicon order */
  keywords: string[];
}

export interface ComponentScores {
  keywordScore: number;
  velocityScore: number;
  categoryScore: number;
  recencyScore: number;
}

/**
 * Clamp to the unit interval.
 */
export function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Urgency score from title keywords.
 *
 * min(0.3 × matches, 1.0), plus 0.3 (capped) when any match is high-urgency.
 */
export function calculateKeywordScore(
  title: string,
  lexicon: Lexicon = getDefaultLexicon()
): KeywordScore {
  const normalized = title.toLowerCase();

  const matches: { keyword: string; position: number; rank: number }[] = [];
  lexicon.urgencyKeywords.forEach((keyword, rank) => {
    const position = normalized.indexOf(keyword);
    if (position !== -1) {
      matches.push({ keyword, position, rank });
    }
  });

  if (matches.length === 0) {
    return { score: 0, keywords: [] };
  }

  matches.sort((a, b) => a.position - b.position || a.rank - b.rank);
  const keywords = matches.map((m) => m.keyword);

  let score = Math.min(keywords.length * SCORING.KEYWORD_STEP, 1);
  if (keywords.some((k) => lexicon.highUrgencyKeywords.has(k))) {
    score = Math.min(score + SCORING.HIGH_URGENCY_BONUS, 1);
  }

  return { score, keywords };
}

// Boundaries count any letter or digit, so a fragment of an accented word never matches
const SIGNIFICANT_WORD = /(?<![\p{L}\p{N}_])[a-zA-Z]{4,}(?![\p{L}\p{N}_])/u;

/**
 * Topic a title belongs to, for velocity tracking.
 *
 * First major topic contained in the title, else the first word of four or
 * more letters, else "general".
 */
export function extractTopic(title: string, lexicon: Lexicon = getDefaultLexicon()): string {
  const normalized = title.toLowerCase();

  for (const topic of lexicon.majorTopics) {
    if (normalized.includes(topic)) {
      return topic;
    }
  }

  const word = SIGNIFICANT_WORD.exec(title);
  if (word) {
    return word[0].toLowerCase();
  }

  return SCORING.DEFAULT_TOPIC;
}

/**
 * Velocity score for a pruned window size.
 *
 * count >= 3 → min((count − 3 + 1) × 0.3 + 0.4, 1.0), otherwise 0.
 */
export function velocityScoreForCount(count: number): number {
  if (count < SCORING.VELOCITY_THRESHOLD) {
    return 0;
  }
  const excess = count - SCORING.VELOCITY_THRESHOLD + 1;
  return Math.min(excess * SCORING.VELOCITY_STEP + SCORING.VELOCITY_BASE, 1);
}

/**
 * Priority of the source category; unknown or absent → default.
 */
export function calculateCategoryScore(
  category: string | null,
  lexicon: Lexicon = getDefaultLexicon()
): number {
  if (!category) {
    return lexicon.defaultCategoryScore;
  }
  return lexicon.categoryScores.get(category) ?? lexicon.defaultCategoryScore;
}

/**
 * Recency tier of an article relative to the simulated clock.
 * Before the clock is first set every article counts as fresh.
 */
export function calculateRecencyScore(publishedAt: Date, simulationTime: Date | null): number {
  if (simulationTime === null) {
    return 1;
  }

  const ageHours = (simulationTime.getTime() - publishedAt.getTime()) / MS_PER_HOUR;
  for (const tier of RECENCY_TIERS) {
    if (ageHours < tier.maxAgeHours) {
      return tier.score;
    }
  }
  return RECENCY_FLOOR;
}

/**
 * Fixed four-factor linear combination.
 */
export function combineScores(components: ComponentScores): { totalScore: number; isBreaking: boolean } {
  const totalScore = clampUnit(
    SCORING.WEIGHT_KEYWORD * clampUnit(components.keywordScore) +
      SCORING.WEIGHT_VELOCITY * clampUnit(components.velocityScore) +
      SCORING.WEIGHT_CATEGORY * clampUnit(components.categoryScore) +
      SCORING.WEIGHT_RECENCY * clampUnit(components.recencyScore)
  );

  return { totalScore, isBreaking: totalScore >= SCORING.BREAKING_THRESHOLD };
}
