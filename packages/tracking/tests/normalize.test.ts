import { describe, it, expect } from 'vitest';
import { normalizeWhitespace, foldText, normalize } from '../src/normalize.js';
import type { RawPosting } from '@jobwatch/posting-sdk';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces', () => {
    expect(normalizeWhitespace('  hello   world  ')).toBe('hello world');
  });

  it('collapses newlines, tabs and non-breaking spaces', () => {
    expect(normalizeWhitespace('hello\n\n\tworld\u00a0again')).toBe('hello world again');
  });

  it('handles empty string', () => {
    expect(normalizeWhitespace('')).toBe('');
  });
});

describe('foldText', () => {
  it('lowercases and single-spaces', () => {
    expect(foldText('  Machine   Learning ENGINEER ')).toBe('machine learning engineer');
  });

  it('composes decomposed accents', () => {
    expect(foldText('Cafe\u0301 ZU\u0308RICH')).toBe('caf\u00e9 z\u00fcrich');
  });

  it('keeps emoji and tolerates lone surrogates', () => {
    expect(foldText('Data  🚀')).toBe('data 🚀');
    expect(() => foldText('\ud800 Data')).not.toThrow();
  });
});

describe('normalize', () => {
  const makePosting = (overrides: Partial<RawPosting> = {}): RawPosting => ({
    title: 'ML Engineer',
    company: 'Acme',
    location: 'Cairo, Egypt',
    url: 'https://jobs.example.com/1',
    ...overrides,
  });

  it('folds title, company and location', () => {
    expect(normalize(makePosting({ title: ' ML  Engineer', company: 'ACME ', location: 'cairo,  EGYPT' }))).toEqual({
      title: 'ml engineer',
      company: 'acme',
      location: 'cairo, egypt',
      url: 'https://jobs.example.com/1',
    });
  });

  it('trims the url without changing its case', () => {
    expect(normalize(makePosting({ url: '  https://Jobs.example.com/ABC  ' })).url).toBe('https://Jobs.example.com/ABC');
  });

  it('uses empty strings for missing location and url', () => {
    const key = normalize({ title: 'Data Scientist', company: 'Globex' });
    expect(key.location).toBe('');
    expect(key.url).toBe('');
  });

  it('ignores description and source metadata', () => {
    const a = normalize(makePosting({ description: 'first fetch', site: 'linkedin' }));
    const b = normalize(makePosting({ description: 'second fetch', site: 'indeed', postedAt: '2026-10-01' }));
    expect(a).toEqual(b);
  });
});
