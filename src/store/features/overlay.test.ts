/**
 * Tests for the cursor and composition overlays.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { AttributeSpanList } from '../core/span-list.ts';
import type { OverlayAttributes } from './overlay.ts';
import { createOverlayAttributes } from './overlay.ts';
import { formatSpans } from './serialize.ts';
import { createAttributeSpanList, findSpanInvariantViolations, TO_TEXT_END } from '../core/span-list.ts';
import { TextBuffer } from '../core/text-buffer.ts';

const UNDERSCORE = 0x5f;

describe('OverlayAttributes', () => {
  let buffer: TextBuffer;
  let list: AttributeSpanList;
  let overlays: OverlayAttributes;

  beforeEach(() => {
    buffer = TextBuffer.from('ab', 4);
    list = createAttributeSpanList();
    overlays = createOverlayAttributes(list, UNDERSCORE);
  });

  describe('cursor', () => {
    it('should append the placeholder and cover it', () => {
      expect(overlays.setupCursor(buffer)).toEqual({ ok: true, value: 3 });
      expect(buffer.toString()).toBe('ab_');
      expect(overlays.cursorActive).toBe(true);
      expect(formatSpans(list)).toEqual(['0 0 compose-underline', '2 3 cursor-alpha']);
    });

    it('should remove the placeholder and park on cleanup', () => {
      overlays.setupCursor(buffer);
      expect(overlays.cleanupCursor(buffer)).toEqual({ ok: true, value: undefined });
      expect(buffer.toString()).toBe('ab');
      expect(overlays.cursorActive).toBe(false);
      expect(formatSpans(list)).toEqual(['0 0 compose-underline', '0 0 cursor-alpha']);
    });

    it('should use the configured placeholder', () => {
      const custom = createOverlayAttributes(list, 0x2588);
      custom.setupCursor(buffer);
      expect(buffer.toString()).toBe('ab█');
    });

    it('should refuse a second setup', () => {
      overlays.setupCursor(buffer);
      expect(overlays.setupCursor(buffer)).toEqual({
        ok: false,
        defect: { kind: 'cursor-already-active', message: 'Cursor placeholder is already at offset 2' },
      });
      expect(buffer.toString()).toBe('ab_');
    });

    it('should refuse cleanup without setup', () => {
      expect(overlays.cleanupCursor(buffer)).toEqual({
        ok: false,
        defect: { kind: 'cursor-not-active', message: 'cleanupCursor called without a matching setupCursor' },
      });
      expect(buffer.toString()).toBe('ab');
    });

    it('should park a stale cursor without touching the buffer', () => {
      overlays.setupCursor(buffer);
      buffer.append('x');

      expect(overlays.cleanupCursor(buffer)).toEqual({
        ok: false,
        defect: {
          kind: 'cursor-stale',
          message: 'Buffer changed since setupCursor (length 4, expected 3 ending in the placeholder)',
        },
      });
      expect(buffer.toString()).toBe('ab_x');
      expect(overlays.cursorActive).toBe(false);
      expect(list.get(list.cursorHandle)?.start).toBe(0);
    });

    it('should track a stranded placeholder until the buffer is truncated below it', () => {
      overlays.setupCursor(buffer);
      buffer.append('x');
      overlays.cleanupCursor(buffer);

      expect(overlays.strandedPlaceholder(buffer)).toBe(2);
      buffer.truncate(3);
      expect(overlays.strandedPlaceholder(buffer)).toBe(2);
      buffer.truncate(2);
      expect(overlays.strandedPlaceholder(buffer)).toBeNull();
      buffer.append('_');
      expect(overlays.strandedPlaceholder(buffer)).toBeNull();
    });

    it('should detect a replaced placeholder of the same length', () => {
      overlays.setupCursor(buffer);
      buffer.truncate(2);
      buffer.append('y');

      const outcome = overlays.cleanupCursor(buffer);
      expect(outcome.ok).toBe(false);
      expect(!outcome.ok && outcome.defect.kind).toBe('cursor-stale');
      expect(buffer.toString()).toBe('aby');
      expect(overlays.strandedPlaceholder(buffer)).toBeNull();
    });
  });

  describe('compose', () => {
    it('should underline a bounded range', () => {
      expect(overlays.setupCompose(1, 2)).toEqual({ ok: true, value: undefined });
      expect(formatSpans(list)).toEqual(['1 2 compose-underline', '0 0 cursor-alpha']);
    });

    it('should underline to the end of the text', () => {
      overlays.setupCompose(1, TO_TEXT_END);
      expect(formatSpans(list)).toEqual(['1 end compose-underline', '0 0 cursor-alpha']);
    });

    it('should accept an empty range', () => {
      overlays.setupCompose(2, 2);
      expect(formatSpans(list)).toEqual(['2 2 compose-underline', '0 0 cursor-alpha']);
      expect(findSpanInvariantViolations(list)).toEqual([]);
    });

    it.each([
      [-1, 2, 'Compose start must be a non-negative integer, got -1'],
      [0, 1.5, 'Compose end must be a non-negative integer, got 1.5'],
      [3, 2, 'Compose end 2 is before start 3'],
    ])('should refuse setupCompose(%s, %s)', (start, end, message) => {
      expect(overlays.setupCompose(start, end)).toEqual({
        ok: false,
        defect: { kind: 'invalid-range', message },
      });
      expect(formatSpans(list)[0]).toBe('0 0 compose-underline');
    });

    it('should park on cleanup', () => {
      overlays.setupCompose(0, TO_TEXT_END);
      overlays.cleanupCompose();
      expect(formatSpans(list)[0]).toBe('0 0 compose-underline');
    });
  });
});
