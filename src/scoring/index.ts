export { SCORING } from './constants.js';
export { getDefaultLexicon, parseLexicon, type Lexicon } from './lexicon.js';
export {
  calculateKeywordScore,
  calculateCategoryScore,
  calculateRecencyScore,
  combineScores,
  extractTopic,
  velocityScoreForCount,
  clampUnit,
  type KeywordScore,
  type ComponentScores,
} from './signals.js';
export { normalizeTitle, titleContentHash } from './content-hash.js';
export { BreakingNewsScorer, type BreakingNewsScorerOptions } from './breaking-news-scorer.js';
