import { describe, it, expect, vi } from 'vitest';
import type { RawPosting, RelevanceClassifier } from '@jobwatch/posting-sdk';
import { classifyPostings } from '../src/classify.js';

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('classifyPostings', () => {
  it('attaches labels in input order', async () => {
    const classifier: RelevanceClassifier = {
      classify: vi.fn<RelevanceClassifier['classify']>(async (posting) => (posting.title.includes('ML') ? 'relevant' : 'not-relevant')),
    };

    const result = await classifyPostings(
      [
        { title: 'ML Engineer', company: 'Acme' },
        { title: 'Sales Lead', company: 'Acme' },
      ],
      classifier,
      { logger: createLogger() },
    );

    expect(result).toEqual([
      { title: 'ML Engineer', company: 'Acme', relevance: 'relevant' },
      { title: 'Sales Lead', company: 'Acme', relevance: 'not-relevant' },
    ]);
  });

  it('marks a failed posting uncertain and continues', async () => {
    const logger = createLogger();
    const classify = vi
      .fn<RelevanceClassifier['classify']>()
      .mockRejectedValueOnce(new Error('model offline'))
      .mockResolvedValueOnce('relevant');

    const result = await classifyPostings(
      [
        { title: 'AI Engineer', company: 'Initech' },
        { title: 'Data Scientist', company: 'Globex' },
      ],
      { classify },
      { logger },
    );

    expect(result.map((p) => p.relevance)).toEqual(['uncertain', 'relevant']);
    expect(logger.warn).toHaveBeenCalledWith('[classify] "AI Engineer" at Initech marked uncertain: model offline');
  });

  it('returns an empty list for no postings', async () => {
    const classify = vi.fn<RelevanceClassifier['classify']>();
    expect(await classifyPostings([], { classify })).toEqual([]);
    expect(classify).not.toHaveBeenCalled();
  });
});
