import { createHash } from 'node:crypto';
import type { RawPosting } from '@jobwatch/posting-sdk';
import { InvalidPostingError } from './errors.js';
import { normalize } from './normalize.js';
import type { NormalizedKey, FingerprintedPosting } from './types.js';

/**
 * SHA-256 over the JSON encoding of the key fields in fixed order. JSON string escaping keeps
 * field boundaries unambiguous whatever characters the fields contain.
 */
export function computeFingerprint(key: NormalizedKey): string {
  const input = JSON.stringify([key.title, key.company, key.location, key.url]);
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Normalize and fingerprint one posting of a batch.
 * Throws InvalidPostingError when the title or company is empty after normalization.
 */
export function fingerprintPosting(posting: RawPosting, index: number): FingerprintedPosting {
  const key = normalize(posting);
  if (!key.title) {
    throw new InvalidPostingError(index, 'title');
  }
  if (!key.company) {
    throw new InvalidPostingError(index, 'company');
  }

  return {
    posting,
    key,
    fingerprint: computeFingerprint(key),
  };
}
