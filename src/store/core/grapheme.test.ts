import { describe, it, expect } from 'vitest';
import { lastGraphemeCodepointLength } from './grapheme.ts';

describe('lastGraphemeCodepointLength', () => {
  it('should return 0 for empty text', () => {
    expect(lastGraphemeCodepointLength('')).toBe(0);
  });

  it('should return 1 for ASCII', () => {
    expect(lastGraphemeCodepointLength('abc')).toBe(1);
  });

  it('should count a combining sequence as one cluster', () => {
    expect(lastGraphemeCodepointLength('ae\u0301')).toBe(2);
  });

  it('should count a single astral codepoint once', () => {
    expect(lastGraphemeCodepointLength('x\u{1F600}')).toBe(1);
  });
});
