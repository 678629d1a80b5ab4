import { describe, it, expect } from 'vitest';
import { summarize } from '../src/summary.js';
import type { RunResult } from '../src/types.js';

function makeResult(newCount: number, seenCount: number, skippedCount: number): RunResult {
  const posting = { title: 'Engineer', company: 'Acme' };
  return {
    newPostings: Array.from({ length: newCount }, () => posting),
    seenPostings: Array.from({ length: seenCount }, () => posting),
    skipped: Array.from({ length: skippedCount }, (_, index) => ({ index, reason: 'Posting has no title' })),
    counts: { received: newCount + seenCount + skippedCount, new: newCount, seen: seenCount, duplicatesInBatch: 0, skipped: skippedCount },
  };
}

describe('summarize', () => {
  it('counts new and seen postings', () => {
    expect(summarize(makeResult(2, 3, 1))).toEqual({
      totalCount: 5,
      newCount: 2,
      seenCount: 3,
      skippedCount: 1,
      hasNew: true,
    });
  });

  it('reports no new postings', () => {
    expect(summarize(makeResult(0, 4, 0))).toEqual({
      totalCount: 4,
      newCount: 0,
      seenCount: 4,
      skippedCount: 0,
      hasNew: false,
    });
  });

  it('handles an empty run', () => {
    expect(summarize(makeResult(0, 0, 0)).hasNew).toBe(false);
  });
});
