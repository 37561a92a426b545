/**
 * Tests for the growable codepoint buffer.
 */

import { describe, it, expect } from 'vitest';
import { TextBuffer, toCodepoints, codepointLength } from './text-buffer.ts';

describe('TextBuffer', () => {
  describe('append', () => {
    it('should count codepoints, not UTF-16 units', () => {
      const buffer = TextBuffer.from('a☃😀');
      expect(buffer.length).toBe(3);
      expect(buffer.codepointAt(2)).toBe(0x1f600);
      expect(buffer.toString()).toBe('a☃😀');
    });

    it('should accept a single codepoint and a codepoint sequence', () => {
      const buffer = new TextBuffer(8);
      expect(buffer.append(0x2a)).toBe(1);
      expect(buffer.append([0x61, 0x62])).toBe(2);
      expect(buffer.toString()).toBe('*ab');
    });

    it('should reject values outside the Unicode range', () => {
      const buffer = new TextBuffer(4);
      expect(() => buffer.append(0x110000)).toThrow(RangeError);
      expect(() => buffer.append([0x61, -1])).toThrow(RangeError);
      expect(buffer.length).toBe(0);
    });
  });

  describe('reallocation', () => {
    it('should keep the generation while spare capacity lasts', () => {
      const buffer = TextBuffer.from('h\u00e9llo', 4);
      expect(buffer.capacity).toBe(9);
      buffer.append('1234');
      expect(buffer.storageIdentity()).toBe(0);
    });

    it('should bump the generation exactly when storage is replaced', () => {
      const buffer = TextBuffer.from('h\u00e9llo', 4);
      buffer.append('1234');
      const before = buffer.storage;

      buffer.append('x');
      expect(buffer.storageIdentity()).toBe(1);
      expect(buffer.capacity).toBe(18);
      expect(buffer.storage).not.toBe(before);
      expect(buffer.toString()).toBe('h\u00e9llo1234x');
    });

    it('should grow from zero capacity', () => {
      const buffer = new TextBuffer();
      buffer.append('abc');
      expect(buffer.capacity).toBe(3);
      expect(buffer.storageIdentity()).toBe(1);
      buffer.append('d');
      expect(buffer.capacity).toBe(6);
      expect(buffer.storageIdentity()).toBe(2);
    });

    it('should not reallocate on truncate', () => {
      const buffer = TextBuffer.from('abc', 1);
      buffer.truncate(1);
      expect(buffer.storageIdentity()).toBe(0);
      expect(buffer.capacity).toBe(4);
    });
  });

  describe('truncate', () => {
    it('should drop everything at and after the offset', () => {
      const buffer = TextBuffer.from('a☃😀');
      buffer.truncate(1);
      expect(buffer.toString()).toBe('a');
    });

    it('should ignore offsets past the end', () => {
      const buffer = TextBuffer.from('abc');
      buffer.truncate(10);
      expect(buffer.toString()).toBe('abc');
    });

    it('should reject invalid offsets', () => {
      const buffer = TextBuffer.from('abc');
      expect(() => buffer.truncate(-1)).toThrow(RangeError);
      expect(() => buffer.truncate(1.5)).toThrow(RangeError);
    });
  });

  describe('reading', () => {
    it('should return undefined outside the valid range', () => {
      const buffer = TextBuffer.from('ab', 10);
      expect(buffer.codepointAt(2)).toBeUndefined();
      expect(buffer.codepointAt(-1)).toBeUndefined();
    });

    it('should clamp slices', () => {
      const buffer = TextBuffer.from('a☃😀');
      expect(buffer.slice(1, 3)).toBe('☃😀');
      expect(buffer.slice(2, 99)).toBe('😀');
      expect(buffer.slice(5)).toBe('');
    });
  });

  describe('codepoint helpers', () => {
    it('should split astral characters into single codepoints', () => {
      expect(toCodepoints('x😀')).toEqual([0x78, 0x1f600]);
      expect(codepointLength('x😀')).toBe(2);
      expect('x😀'.length).toBe(3);
    });
  });
});
