/**
 * Fixed scoring model.
 *
 * The four-factor weights and the breaking threshold are part of the model,
 * not deployment configuration, so they live here rather than in config.
 */
export const SCORING = {
  /** Component weights (sum to 1.0) */
  WEIGHT_KEYWORD: 0.4,
  WEIGHT_VELOCITY: 0.35,
  WEIGHT_CATEGORY: 0.15,
  WEIGHT_RECENCY: 0.1,

  /** total >= this marks an article as breaking */
  BREAKING_THRESHOLD: 0.5,

  /** Per-keyword contribution and high-urgency bonus */
  KEYWORD_STEP: 0.3,
  HIGH_URGENCY_BONUS: 0.3,

  /** Trailing window for topic velocity */
  VELOCITY_WINDOW_MINUTES: 30,
  /** Window size at which velocity starts scoring */
  VELOCITY_THRESHOLD: 3,
  VELOCITY_BASE: 0.4,
  VELOCITY_STEP: 0.3,

  /** Age after which breaking entries are evicted by cleanup */
  BREAKING_NEWS_TTL_HOURS: 24,

  /** Fallback topic when a title yields nothing usable */
  DEFAULT_TOPIC: 'general',
} as const;

/**
 * Recency tiers: first tier whose bound exceeds the age wins.
 */
export const RECENCY_TIERS: readonly { maxAgeHours: number; score: number }[] = [
  { maxAgeHours: 1, score: 1.0 },
  { maxAgeHours: 3, score: 0.8 },
  { maxAgeHours: 6, score: 0.5 },
];

export const RECENCY_FLOOR = 0.2;

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
