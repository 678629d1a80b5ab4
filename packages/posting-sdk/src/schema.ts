import { z } from 'zod';
import type { RawPosting } from './types.js';

// A missing title or company becomes '' so the differ reports the posting as skipped.
export const rawPostingSchema = z.object({
  title: z.string().default(''),
  company: z.string().default(''),
  location: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
  site: z.string().optional(),
  postedAt: z.string().optional(),
  raw: z.record(z.string(), z.unknown()).optional(),
});

export interface ValidateRawPostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

/**
 * Shape check only. Empty or missing titles and companies pass here and are rejected by the
 * differ, which counts them as skipped postings.
 */
export function validateRawPostings(postings: unknown[], options?: ValidateRawPostingsOptions): RawPosting[] {
  const valid: RawPosting[] = [];

  for (const posting of postings) {
    const result = rawPostingSchema.safeParse(posting);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, posting);
    }
  }

  return valid;
}
