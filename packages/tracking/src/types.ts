import type { RawPosting, RelevanceLabel } from '@jobwatch/posting-sdk';

/**
 * Identity fields of a posting after case-folding and whitespace cleanup.
 * `url` keeps its case; a missing url becomes ''.
 */
export interface NormalizedKey {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly url: string;
}

export interface FingerprintedPosting {
  posting: RawPosting;
  key: NormalizedKey;
  fingerprint: string;
}

export interface HistoryEntry {
  fingerprint: string;
  firstSeen: string;
  lastSeen: string;
  /** Record fields this version does not know about, written back unchanged. */
  extra?: Record<string, unknown>;
}

export interface SkippedPosting {
  index: number;
  reason: string;
}

export interface RunCounts {
  received: number;
  new: number;
  seen: number;
  duplicatesInBatch: number;
  skipped: number;
}

export interface RunResult {
  newPostings: RawPosting[];
  seenPostings: RawPosting[];
  skipped: SkippedPosting[];
  counts: RunCounts;
}

export interface RunSummary {
  totalCount: number;
  newCount: number;
  seenCount: number;
  skippedCount: number;
  hasNew: boolean;
}

export type PostingStatus = 'new' | 'seen';

export type TrackedPosting = RawPosting & {
  status: PostingStatus;
  relevance?: RelevanceLabel;
};

export type ClassifiedPosting = RawPosting & {
  relevance: RelevanceLabel;
};

/**
 * Minimal logger interface, defaults to console.
 */
export interface TrackingLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
