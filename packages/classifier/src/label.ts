import type { RelevanceLabel } from '@jobwatch/posting-sdk';

/**
 * Map a model reply to a label. Only a reply that starts with yes/no counts; anything else is
 * `uncertain`.
 */
export function parseRelevanceLabel(reply: string): RelevanceLabel {
  const normalized = reply
    .trim()
    .toLowerCase()
    .replace(/^[^a-z]+/, '');

  if (/^yes\b/.test(normalized)) {
    return 'relevant';
  }
  if (/^no\b/.test(normalized)) {
    return 'not-relevant';
  }
  return 'uncertain';
}
