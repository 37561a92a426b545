/**
 * Backspace reducer: the inverse of the scanner.
 *
 * Removes the last character, truncates the buffer and repairs the span
 * list and open handles in one step, so that scanning can resume as if
 * the removed text had never been appended.
 */

import type { RetreatUnit, ScannerState } from '../../types/state.ts';
import type { CodepointOffset, SpanHandle } from '../../types/branded.ts';
import type { Outcome } from '../../types/outcome.ts';
import type { AttributeSpanList } from '../core/span-list.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { addCodepointOffset, codepointOffset, diffCodepointOffset } from '../../types/branded.ts';
import { fail, succeed } from '../../types/outcome.ts';
import { endsAfter, isFormattingKind, TO_TEXT_END } from '../core/span-list.ts';
import { lastGraphemeCodepointLength } from '../core/grapheme.ts';
import { markerReach, openSpanOf, setOpenSpan } from './markers.ts';

export interface RetreatSummary {
  /** Codepoints removed from the buffer (0 when there was nothing to delete) */
  readonly removed: number;
  /** Closed spans whose closing delimiter was removed */
  readonly reopened: number;
  /** Spans whose opening delimiter was removed */
  readonly deleted: number;
}

const NOTHING_REMOVED: RetreatSummary = Object.freeze({ removed: 0, reopened: 0, deleted: 0 });

/** Upper bound on how far back a grapheme cluster is searched for. */
const GRAPHEME_LOOKBACK = 32;

function retreatTarget(
  state: ScannerState,
  buffer: TextBuffer,
  unit: RetreatUnit,
  previous: CodepointOffset
): CodepointOffset {
  if (unit === 'codepoint') {
    return previous;
  }
  const windowStart = Math.max(0, state.position - GRAPHEME_LOOKBACK);
  const tail = buffer.slice(windowStart, state.position);
  return codepointOffset(Math.min(previous, state.position - lastGraphemeCodepointLength(tail)));
}

/**
 * Remove the character before `state.position`.
 * With no previous codepoint this is a no-op reporting `removed: 0`.
 */
export function retreat(
  state: ScannerState,
  spans: AttributeSpanList,
  buffer: TextBuffer,
  unit: RetreatUnit = 'codepoint'
): Outcome<RetreatSummary> {
  if (state.position > buffer.length) {
    return fail(
      'position-beyond-buffer',
      `Scanner position ${state.position} is beyond buffer length ${buffer.length}`
    );
  }
  if (state.previous === null) {
    return succeed(NOTHING_REMOVED);
  }

  const boundary = retreatTarget(state, buffer, unit, state.previous);
  const removed = diffCodepointOffset(state.position, boundary);

  state.position = boundary;
  state.previous = boundary > 0 ? addCodepointOffset(boundary, -1) : null;
  buffer.truncate(boundary);

  let reopened = 0;
  const doomed = new Set<SpanHandle>();

  for (const span of spans.spans()) {
    if (spans.isProtected(span.handle) || !isFormattingKind(span.kind)) continue;

    if (endsAfter(span.end, boundary)) {
      if (span.end.type === 'bounded') {
        spans.setEnd(span.handle, TO_TEXT_END);
        reopened++;
      }
      setOpenSpan(state, span.kind, span.handle);
    }

    // Doubled markers start one codepoint before the marker that opened them.
    if (span.start >= boundary - markerReach(span.kind)) {
      if (openSpanOf(state, span.kind) === span.handle) {
        setOpenSpan(state, span.kind, null);
      }
      doomed.add(span.handle);
    }
  }

  const deleted = doomed.size === 0 ? 0 : spans.retain((span) => !doomed.has(span.handle));
  return succeed({ removed, reopened, deleted });
}
