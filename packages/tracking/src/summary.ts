import type { RunResult, RunSummary } from './types.js';

export function summarize(result: RunResult): RunSummary {
  const newCount = result.newPostings.length;
  const seenCount = result.seenPostings.length;

  return {
    totalCount: newCount + seenCount,
    newCount,
    seenCount,
    skippedCount: result.skipped.length,
    hasNew: newCount > 0,
  };
}
