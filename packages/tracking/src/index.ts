// Pipeline
export { track } from './pipeline.js';
export type { TrackOptions, TrackOutcome } from './pipeline.js';

// Individual stages
export { normalize, normalizeWhitespace, foldText } from './normalize.js';
export { computeFingerprint, fingerprintPosting } from './fingerprint.js';
export { HistoryStore, historyFileSchema, HISTORY_FORMAT_VERSION } from './history.js';
export type { HistoryFile } from './history.js';
export { acquireRunLock, DEFAULT_LOCK_TTL_MS } from './lock.js';
export type { RunLock, AcquireRunLockOptions } from './lock.js';
export { diff } from './diff.js';
export type { DiffOptions } from './diff.js';
export { summarize } from './summary.js';
export { classifyPostings } from './classify.js';
export type { ClassifyPostingsOptions } from './classify.js';
export { writeFileAtomic } from './atomic-write.js';
export { isObservedDate, toObservedDate, assertObservedDate } from './dates.js';
export { consoleLogger } from './logger.js';

// Errors
export {
  TrackingError,
  CorruptHistoryError,
  InvalidPostingError,
  PersistenceError,
  ConcurrentRunError,
  isFatalTrackingError,
} from './errors.js';
export type { PostingField, FatalTrackingError } from './errors.js';

// Types
export type {
  NormalizedKey,
  FingerprintedPosting,
  HistoryEntry,
  SkippedPosting,
  RunCounts,
  RunResult,
  RunSummary,
  PostingStatus,
  TrackedPosting,
  ClassifiedPosting,
  TrackingLogger,
} from './types.js';
