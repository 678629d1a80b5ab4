import { describe, it, expect } from 'vitest';
import { parseRelevanceLabel } from '../src/label.js';

describe('parseRelevanceLabel', () => {
  it('maps a leading yes to relevant', () => {
    expect(parseRelevanceLabel('yes')).toBe('relevant');
    expect(parseRelevanceLabel('  Yes.')).toBe('relevant');
    expect(parseRelevanceLabel('**YES**, entry level role')).toBe('relevant');
  });

  it('maps a leading no to not-relevant', () => {
    expect(parseRelevanceLabel('No')).toBe('not-relevant');
    expect(parseRelevanceLabel("'no'")).toBe('not-relevant');
  });

  it('treats anything else as uncertain', () => {
    expect(parseRelevanceLabel('')).toBe('uncertain');
    expect(parseRelevanceLabel('Noted, the role is senior')).toBe('uncertain');
    expect(parseRelevanceLabel('It depends on the seniority')).toBe('uncertain');
  });
});
