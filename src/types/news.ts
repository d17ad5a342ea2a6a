/**
 * News Types
 *
 * Records flowing through the replay pipeline. Both are created once per
 * processed item and never edited afterwards.
 */

/**
 * Article as loaded from the feed.
 */
export interface NewsArticle {
  /** Short stable hash of the source guid (12 hex chars) */
  readonly id: string;

  readonly title: string;

  readonly description: string;

  /** Publication instant; drives the simulated clock */
  readonly publishedAt: Date;

  readonly link: string;

  /** Category derived from the link, null when the link carries none */
  readonly category: string | null;
}

/**
 * Article with its four component scores and the breaking decision.
 */
export interface ScoredArticle {
  readonly article: NewsArticle;

  /** Component scores, each in [0, 1] */
  readonly keywordScore: number;
  readonly velocityScore: number;
  readonly categoryScore: number;
  readonly recencyScore: number;

  /** Weighted sum of the components, in [0, 1] */
  readonly totalScore: number;

  /** totalScore >= breaking threshold */
  readonly isBreaking: boolean;

  /** Urgency keywords found in the title, by first occurrence */
  readonly detectedKeywords: readonly string[];

  readonly topic: string | null;

  /** Wall-clock processing instant (not the publish time, not the simulated clock) */
  readonly detectedAt: Date;
}

/**
 * One entry of a topic velocity window.
 */
export interface TopicWindowEntry {
  readonly timestamp: Date;
  readonly articleId: string;
}
