/**
 * ArticleProcessor - admission gate, scoring and recording for one article.
 *
 * Dedup → score → store-if-breaking → counters. A duplicate title stops the
 * article at the gate: no scoring, no window entry, no counter increment.
 */

import type { StateStore } from '../ports/state-store.js';
import type { NewsArticle, ScoredArticle } from '../types/news.js';
import type { Logger } from '../types/logger.js';
import type { BreakingNewsScorer } from '../scoring/breaking-news-scorer.js';
import { titleContentHash } from '../scoring/content-hash.js';

export type ProcessOutcome =
  | { status: 'duplicate'; articleId: string }
  | { status: 'scored'; scored: ScoredArticle };

export class ArticleProcessor {
  private readonly store: StateStore;
  private readonly scorer: BreakingNewsScorer;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    store: StateStore,
    scorer: BreakingNewsScorer,
    logger: Logger,
    now: () => Date = () => new Date()
  ) {
    this.store = store;
    this.scorer = scorer;
    this.logger = logger.child({ component: 'article-processor' });
    this.now = now;
  }

  async process(article: NewsArticle): Promise<ProcessOutcome> {
    const isNew = await this.store.addSeenHash(titleContentHash(article.title));
    if (!isNew) {
      this.logger.debug({ articleId: article.id, title: article.title }, 'Duplicate title skipped');
      return { status: 'duplicate', articleId: article.id };
    }

    const scored = await this.scorer.score(article);

    if (scored.isBreaking) {
      await this.store.putBreakingNews(scored);
      this.logger.info(
        {
          articleId: article.id,
          topic: scored.topic,
          score: scored.totalScore.toFixed(3),
          keywords: scored.detectedKeywords,
        },
        `Breaking: ${article.title}`
      );
    }

    await this.store.incrementProcessed();
    await this.store.setLastProcessedTime(this.now());

    return { status: 'scored', scored };
  }
}
