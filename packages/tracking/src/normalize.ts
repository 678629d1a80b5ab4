import type { RawPosting } from '@jobwatch/posting-sdk';
import type { NormalizedKey } from './types.js';

/**
 * Trim whitespace and collapse runs of whitespace (including unicode spaces) to one space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonical form of a free-text identity field: NFC, lowercase, single-spaced.
 */
export function foldText(text: string): string {
  return normalizeWhitespace(text.normalize('NFC')).toLowerCase();
}

/**
 * Derive the identity key of a posting. Pure and total: empty or missing fields map to ''.
 */
export function normalize(posting: RawPosting): NormalizedKey {
  return {
    title: foldText(posting.title),
    company: foldText(posting.company),
    location: foldText(posting.location ?? ''),
    url: normalizeWhitespace(posting.url ?? ''),
  };
}
