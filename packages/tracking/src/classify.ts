import type { RawPosting, RelevanceClassifier } from '@jobwatch/posting-sdk';
import { consoleLogger } from './logger.js';
import type { ClassifiedPosting, TrackingLogger } from './types.js';

export interface ClassifyPostingsOptions {
  logger?: TrackingLogger;
}

/**
 * Attach a relevance label to each posting, one classifier call at a time.
 * A failed call marks that posting `uncertain` and the rest continue.
 */
export async function classifyPostings(
  postings: readonly RawPosting[],
  classifier: RelevanceClassifier,
  options: ClassifyPostingsOptions = {},
): Promise<ClassifiedPosting[]> {
  const { logger = consoleLogger } = options;
  const classified: ClassifiedPosting[] = [];

  for (const posting of postings) {
    try {
      const relevance = await classifier.classify(posting);
      classified.push({ ...posting, relevance });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`[classify] "${posting.title}" at ${posting.company} marked uncertain: ${message}`);
      classified.push({ ...posting, relevance: 'uncertain' });
    }
  }

  return classified;
}
