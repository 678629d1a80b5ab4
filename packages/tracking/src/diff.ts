import type { RawPosting } from '@jobwatch/posting-sdk';
import { assertObservedDate } from './dates.js';
import { InvalidPostingError } from './errors.js';
import { fingerprintPosting } from './fingerprint.js';
import type { HistoryStore } from './history.js';
import { consoleLogger } from './logger.js';
import type { FingerprintedPosting, RunResult, SkippedPosting, TrackingLogger } from './types.js';

export interface DiffOptions {
  logger?: TrackingLogger;
}

/**
 * Split a freshly fetched batch into new and previously seen postings, recording every distinct
 * fingerprint in `store` under `runDate`.
 *
 * - Postings without a title or company are skipped and reported, the rest of the batch goes on.
 * - A fingerprint repeated inside the batch counts once; later repeats are dropped.
 * - "new" means unknown to the store when first met in this batch.
 * - Both buckets keep input order.
 */
export function diff(
  batch: readonly RawPosting[],
  store: HistoryStore,
  runDate: string,
  options: DiffOptions = {},
): RunResult {
  const { logger = consoleLogger } = options;
  assertObservedDate(runDate);

  const newPostings: RawPosting[] = [];
  const seenPostings: RawPosting[] = [];
  const skipped: SkippedPosting[] = [];
  const encountered = new Set<string>();
  let duplicatesInBatch = 0;

  for (const [index, posting] of batch.entries()) {
    let fingerprinted: FingerprintedPosting;
    try {
      fingerprinted = fingerprintPosting(posting, index);
    } catch (error) {
      if (!(error instanceof InvalidPostingError)) {
        throw error;
      }
      skipped.push({ index, reason: error.message });
      logger.warn(`[diff] Skipping posting #${index}: ${error.message}`);
      continue;
    }

    const { fingerprint } = fingerprinted;
    if (encountered.has(fingerprint)) {
      duplicatesInBatch += 1;
      continue;
    }
    encountered.add(fingerprint);

    if (store.contains(fingerprint)) {
      seenPostings.push(posting);
    } else {
      newPostings.push(posting);
    }

    store.record(fingerprint, runDate);
  }

  return {
    newPostings,
    seenPostings,
    skipped,
    counts: {
      received: batch.length,
      new: newPostings.length,
      seen: seenPostings.length,
      duplicatesInBatch,
      skipped: skipped.length,
    },
  };
}
