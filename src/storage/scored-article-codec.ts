/**
 * Scored Article Codec
 *
 * JSON wire form of a ScoredArticle for the shared store. Dates travel as
 * ISO-8601 strings (millisecond precision); decode validates with zod so a
 * value read back is field-for-field equal to the one written.
 */

import { z } from 'zod';
import type { ScoredArticle } from '../types/news.js';
import { RecordDecodeError } from '../core/errors.js';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const unitScore = z.number().min(0).max(1);

const scoredArticleSchema = z.object({
  article: z.object({
    id: z.string().min(1),
    title: z.string(),
    description: z.string(),
    publishedAt: isoDate,
    link: z.string(),
    category: z.string().nullable(),
  }),
  keywordScore: unitScore,
  velocityScore: unitScore,
  categoryScore: unitScore,
  recencyScore: unitScore,
  totalScore: unitScore,
  isBreaking: z.boolean(),
  detectedKeywords: z.array(z.string()),
  topic: z.string().nullable(),
  detectedAt: isoDate,
});

/**
 * Encode for storage.
 */
export function encodeScoredArticle(scored: ScoredArticle): string {
  const { article } = scored;
  return JSON.stringify({
    article: {
      id: article.id,
      title: article.title,
      description: article.description,
      publishedAt: article.publishedAt.toISOString(),
      link: article.link,
      category: article.category,
    },
    keywordScore: scored.keywordScore,
    velocityScore: scored.velocityScore,
    categoryScore: scored.categoryScore,
    recencyScore: scored.recencyScore,
    totalScore: scored.totalScore,
    isBreaking: scored.isBreaking,
    detectedKeywords: [...scored.detectedKeywords],
    topic: scored.topic,
    detectedAt: scored.detectedAt.toISOString(),
  });
}

/**
 * Decode a stored record.
 *
 * @throws RecordDecodeError when the payload is not JSON or fails validation
 */
export function decodeScoredArticle(payload: string): ScoredArticle {
  let raw: unknown;
  try {
    raw = JSON.parse(payload) as unknown;
  } catch (error) {
    throw new RecordDecodeError('Scored article record is not valid JSON', { cause: error });
  }

  const result = scoredArticleSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown field';
    throw new RecordDecodeError(`Scored article record failed validation (${where})`, {
      cause: result.error,
    });
  }
  return result.data;
}
