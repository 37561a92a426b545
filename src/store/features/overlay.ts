/**
 * Caret and composition overlays.
 *
 * Both overlays are protected spans that always exist in the list. Setup
 * moves them over the relevant text; cleanup parks them at (0, 0).
 */

import type { CodepointOffset } from '../../types/branded.ts';
import type { SpanEnd } from '../../types/state.ts';
import type { Outcome } from '../../types/outcome.ts';
import type { AttributeSpanList } from '../core/span-list.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { codepointOffset, isValidOffset, ZERO_CODEPOINT_OFFSET } from '../../types/branded.ts';
import { fail, succeed } from '../../types/outcome.ts';
import { bounded } from '../core/span-list.ts';

const PARKED: SpanEnd = bounded(ZERO_CODEPOINT_OFFSET);

export interface OverlayAttributes {
  /**
   * Append the placeholder and cover it with the cursor-alpha span.
   * Returns the buffer length after the append.
   */
  setupCursor(buffer: TextBuffer): Outcome<CodepointOffset>;

  /**
   * Remove the placeholder and park the cursor-alpha span.
   * Requires a matching setupCursor with no edits since. A stale cursor is
   * parked without touching the buffer and reported as `cursor-stale`; its
   * placeholder is then stranded until the buffer is truncated below it.
   */
  cleanupCursor(buffer: TextBuffer): Outcome;

  /**
   * Offset of a placeholder stranded by a stale cleanup, or null once the
   * buffer no longer holds it there.
   */
  strandedPlaceholder(buffer: TextBuffer): CodepointOffset | null;

  /**
   * Underline [start, end) as input-method pre-edit text.
   */
  setupCompose(start: number, end: number | SpanEnd): Outcome;

  cleanupCompose(): Outcome;

  /** Whether the placeholder is currently in the buffer. */
  readonly cursorActive: boolean;
}

/**
 * @param placeholder - codepoint appended while the cursor is shown
 */
export function createOverlayAttributes(spans: AttributeSpanList, placeholder: number): OverlayAttributes {
  // Buffer length right after setupCursor, null while parked.
  let cursorEnd: CodepointOffset | null = null;
  let stranded: CodepointOffset | null = null;

  function park(): void {
    spans.setRange(spans.cursorHandle, ZERO_CODEPOINT_OFFSET, PARKED);
    cursorEnd = null;
  }

  function setupCursor(buffer: TextBuffer): Outcome<CodepointOffset> {
    if (cursorEnd !== null) {
      return fail('cursor-already-active', `Cursor placeholder is already at offset ${cursorEnd - 1}`);
    }
    buffer.append(placeholder);
    const length = buffer.length;
    spans.setRange(spans.cursorHandle, codepointOffset(length - 1), bounded(length));
    cursorEnd = length;
    return succeed(length);
  }

  function cleanupCursor(buffer: TextBuffer): Outcome {
    if (cursorEnd === null) {
      return fail('cursor-not-active', 'cleanupCursor called without a matching setupCursor');
    }
    const expected = cursorEnd;
    if (buffer.length !== expected || buffer.codepointAt(expected - 1) !== placeholder) {
      park();
      if (buffer.codepointAt(expected - 1) === placeholder) {
        stranded = codepointOffset(expected - 1);
      }
      return fail(
        'cursor-stale',
        `Buffer changed since setupCursor (length ${buffer.length}, expected ${expected} ending in the placeholder)`
      );
    }
    buffer.truncate(expected - 1);
    park();
    return succeed(undefined);
  }

  function strandedPlaceholder(buffer: TextBuffer): CodepointOffset | null {
    if (stranded !== null && buffer.codepointAt(stranded) !== placeholder) {
      stranded = null;
    }
    return stranded;
  }

  function setupCompose(start: number, end: number | SpanEnd): Outcome {
    const spanEnd = typeof end === 'number' ? bounded(codepointOffset(end)) : end;
    if (!isValidOffset(start)) {
      return fail('invalid-range', `Compose start must be a non-negative integer, got ${start}`);
    }
    if (spanEnd.type === 'bounded') {
      if (!isValidOffset(spanEnd.offset)) {
        return fail('invalid-range', `Compose end must be a non-negative integer, got ${spanEnd.offset}`);
      }
      if (spanEnd.offset < start) {
        return fail('invalid-range', `Compose end ${spanEnd.offset} is before start ${start}`);
      }
    }
    spans.setRange(spans.composeHandle, codepointOffset(start), spanEnd);
    return succeed(undefined);
  }

  function cleanupCompose(): Outcome {
    spans.setRange(spans.composeHandle, ZERO_CODEPOINT_OFFSET, PARKED);
    return succeed(undefined);
  }

  return {
    setupCursor,
    cleanupCursor,
    strandedPlaceholder,
    setupCompose,
    cleanupCompose,
    get cursorActive() {
      return cursorEnd !== null;
    },
  };
}
