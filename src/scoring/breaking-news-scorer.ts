/**
 * BreakingNewsScorer - turns an article into a ScoredArticle.
 *
 * Keyword, category and recency are pure. Velocity writes the article into
 * its topic window and then prunes and counts it, two explicit store calls,
 * so scoring an article always mutates store state.
 */

import type { StateStore } from '../ports/state-store.js';
import type { NewsArticle, ScoredArticle } from '../types/news.js';
import { getDefaultLexicon, type Lexicon } from './lexicon.js';
import {
  calculateCategoryScore,
  calculateKeywordScore,
  calculateRecencyScore,
  combineScores,
  extractTopic,
  velocityScoreForCount,
} from './signals.js';

export interface BreakingNewsScorerOptions {
  lexicon?: Lexicon;
  /** Source of detectedAt, overridable for tests */
  now?: () => Date;
}

export class BreakingNewsScorer {
  private readonly store: StateStore;
  private readonly lexicon: Lexicon;
  private readonly now: () => Date;

  constructor(store: StateStore, options: BreakingNewsScorerOptions = {}) {
    this.store = store;
    this.lexicon = options.lexicon ?? getDefaultLexicon();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record the article in its topic window and return the velocity score
   * for the pruned window.
   */
  async recordVelocity(topic: string, article: NewsArticle): Promise<number> {
    await this.store.recordTopicEntry(topic, article.publishedAt, article.id);
    const count = await this.store.pruneAndCount(topic, article.publishedAt);
    return velocityScoreForCount(count);
  }

  async score(article: NewsArticle): Promise<ScoredArticle> {
    const keyword = calculateKeywordScore(article.title, this.lexicon);
    const topic = extractTopic(article.title, this.lexicon);
    const velocityScore = await this.recordVelocity(topic, article);
    const categoryScore = calculateCategoryScore(article.category, this.lexicon);
    const recencyScore = calculateRecencyScore(
      article.publishedAt,
      await this.store.getSimulationTime()
    );

    const { totalScore, isBreaking } = combineScores({
      keywordScore: keyword.score,
      velocityScore,
      categoryScore,
      recencyScore,
    });

    return {
      article,
      keywordScore: keyword.score,
      velocityScore,
      categoryScore,
      recencyScore,
      totalScore,
      isBreaking,
      detectedKeywords: keyword.keywords,
      topic,
      detectedAt: this.now(),
    };
  }
}
