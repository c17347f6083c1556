/**
 * Tests for duration and text normalizers
 */

import { describe, it, expect } from '@jest/globals';
import { parseDuration, sanitizeText, matchKeywords, extractKeywords } from './text.js';

describe('parseDuration', () => {
  it.each([
    ['PT4M13S', 253],
    ['PT1H2M3S', 3723],
    ['PT1H30M', 5400],
    ['PT45S', 45],
    ['PT2H', 7200],
    [' PT10M ', 600],
  ])('parses %s', (token, seconds) => {
    expect(parseDuration(token)).toBe(seconds);
  });

  it.each(['', 'garbage', '4:13', 'P1D', 'PT1.5S'])('returns 0 for %p', (token) => {
    expect(parseDuration(token)).toBe(0);
  });

  it('reads the longest well-formed prefix', () => {
    expect(parseDuration('PT1H2M3.5S')).toBe(3720);
    expect(parseDuration('PT2M10Sextra')).toBe(130);
  });

  it('returns 0 for undefined', () => {
    expect(parseDuration(undefined)).toBe(0);
  });
});

describe('sanitizeText', () => {
  it('replaces symbols and emoji with spaces and collapses whitespace', () => {
    expect(sanitizeText('Glass Skin ✨ routine!!\n2024')).toBe('Glass Skin routine 2024');
  });

  it('keeps letters from any script', () => {
    expect(sanitizeText('수분 크림 최고!')).toBe('수분 크림 최고');
  });

  it('keeps underscores', () => {
    expect(sanitizeText('snake_case-name')).toBe('snake_case name');
  });

  it('removes quotes and commas so CSV cells stay simple', () => {
    expect(sanitizeText('"Best", she said')).toBe('Best she said');
  });

  it('returns empty string for empty or symbol-only input', () => {
    expect(sanitizeText('')).toBe('');
    expect(sanitizeText(undefined)).toBe('');
    expect(sanitizeText('!!! ✨✨')).toBe('');
  });
});

describe('keyword extraction', () => {
  it('matches case-insensitively and returns original terms sorted', () => {
    expect(matchKeywords('COSRX snail SERUM review', ['serum', 'COSRX', 'toner'])).toEqual([
      'COSRX',
      'serum',
    ]);
  });

  it('matches substrings', () => {
    expect(matchKeywords('my skincare routine', ['care', 'routine'])).toEqual(['care', 'routine']);
  });

  it('deduplicates repeated vocabulary terms', () => {
    expect(matchKeywords('serum serum', ['serum', 'serum'])).toEqual(['serum']);
  });

  it('joins matches with a comma and space', () => {
    expect(extractKeywords('Toner and serum haul', ['serum', 'toner', 'haul'])).toBe('haul, serum, toner');
  });

  it('returns empty string when nothing matches', () => {
    expect(extractKeywords('cooking vlog', ['serum'])).toBe('');
    expect(extractKeywords('', ['serum'])).toBe('');
  });
});
