import { validateRawPostings, type JobSource, type RawPosting, type RelevanceClassifier } from '@jobwatch/posting-sdk';
import { classifyPostings } from './classify.js';
import { assertObservedDate } from './dates.js';
import { diff } from './diff.js';
import { HistoryStore } from './history.js';
import { acquireRunLock } from './lock.js';
import { consoleLogger } from './logger.js';
import { summarize } from './summary.js';
import type { PostingStatus, RunResult, RunSummary, TrackedPosting, TrackingLogger } from './types.js';

export interface TrackOptions {
  historyPath: string;
  /** Defaults to `${historyPath}.lock`. */
  lockPath?: string;
  lockTtlMs?: number;
  runDate: string;
  classifier?: RelevanceClassifier;
  /** Classify seen postings as well as new ones. */
  classifyAll?: boolean;
  logger?: TrackingLogger;
  /** Runs after the history is saved, while the lock is still held. */
  publish?: (outcome: TrackOutcome) => Promise<void>;
}

export interface TrackOutcome {
  sourceId: string;
  runDate: string;
  result: RunResult;
  summary: RunSummary;
  /** New postings first, then seen ones, each in input order. */
  postings: TrackedPosting[];
  validationDropped: number;
  history: {
    before: number;
    after: number;
  };
  durationMs: number;
}

function withStatus(postings: readonly RawPosting[], status: PostingStatus): TrackedPosting[] {
  return postings.map((posting) => ({ ...posting, status }));
}

async function labelPostings(
  result: RunResult,
  classifier: RelevanceClassifier | undefined,
  classifyAll: boolean,
  logger: TrackingLogger,
): Promise<TrackedPosting[]> {
  if (!classifier) {
    return [...withStatus(result.newPostings, 'new'), ...withStatus(result.seenPostings, 'seen')];
  }

  const newPostings = await classifyPostings(result.newPostings, classifier, { logger });
  const seenPostings = classifyAll
    ? await classifyPostings(result.seenPostings, classifier, { logger })
    : result.seenPostings;

  return [...withStatus(newPostings, 'new'), ...withStatus(seenPostings, 'seen')];
}

/**
 * One tracking run for a single source.
 * Stages: lock → load history → fetch → diff → classify → save history → publish → unlock
 *
 * Store-level failures (corrupt history, failed save, concurrent run) propagate and leave the
 * previously saved history untouched.
 */
export async function track(source: JobSource, options: TrackOptions): Promise<TrackOutcome> {
  const { historyPath, runDate, classifier, classifyAll = false, logger = consoleLogger } = options;
  const { id, name } = source.manifest;
  const lockPath = options.lockPath ?? `${historyPath}.lock`;
  const start = performance.now();

  assertObservedDate(runDate);

  const lock = await acquireRunLock(lockPath, { ttlMs: options.lockTtlMs, logger });

  const runLocked = async (): Promise<TrackOutcome> => {
    const store = await HistoryStore.load(historyPath);
    const sizeBefore = store.size;
    logger.info(`[track:${id}] Loaded ${sizeBefore} history entries from ${historyPath}`);

    logger.info(`[track:${id}] Fetching postings from ${name}...`);
    const fetched = await source.fetch();
    let invalidShape = 0;
    const batch = validateRawPostings(fetched.postings, {
      onInvalid: () => {
        invalidShape += 1;
      },
    });
    const validationDropped = fetched.validationDropped + invalidShape;
    logger.info(`[track:${id}] Received ${batch.length} postings`);
    if (validationDropped > 0) {
      logger.warn(`[track:${id}] ${validationDropped} records failed validation`);
    }

    const result = diff(batch, store, runDate, { logger });
    const { counts } = result;
    logger.info(
      `[track:${id}] ${counts.new} new, ${counts.seen} seen, ${counts.duplicatesInBatch} in-batch duplicates, ${counts.skipped} skipped`,
    );

    const postings = await labelPostings(result, classifier, classifyAll, logger);

    // Fails with ConcurrentRunError if the lock was lost while classifying.
    await lock.refresh();
    await store.save(historyPath);
    logger.info(`[track:${id}] Saved ${store.size} history entries to ${historyPath}`);

    const outcome: TrackOutcome = {
      sourceId: id,
      runDate,
      result,
      summary: summarize(result),
      postings,
      validationDropped,
      history: {
        before: sizeBefore,
        after: store.size,
      },
      durationMs: performance.now() - start,
    };

    if (options.publish) {
      await options.publish(outcome);
    }

    return outcome;
  };

  let outcome: TrackOutcome;
  try {
    outcome = await runLocked();
  } catch (error) {
    await lock.release().catch((releaseError: unknown) => {
      const message = releaseError instanceof Error ? releaseError.message : String(releaseError);
      logger.error(`[track:${id}] Failed to release ${lockPath}: ${message}`);
    });
    throw error;
  }

  await lock.release();
  return outcome;
}
