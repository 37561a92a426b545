/**
 * Forward incremental markdown scanner.
 *
 * Consumes only the codepoints appended since the last call and extends
 * bold and italic spans as delimiters open and close. The codepoint
 * before `position` is kept as lookback, so a `**` split across two
 * appends is still recognized.
 */

import type { ScannerState } from '../../types/state.ts';
import type { Outcome } from '../../types/outcome.ts';
import type { AttributeSpanList } from '../core/span-list.ts';
import type { PositionCache } from '../core/position-cache.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import { addCodepointOffset, codepointOffset, ZERO_CODEPOINT_OFFSET } from '../../types/branded.ts';
import { fail, succeed } from '../../types/outcome.ts';
import { bounded, TO_TEXT_END } from '../core/span-list.ts';
import { findMarkerRule, markerReach, openSpanOf, setOpenSpan } from './markers.ts';

export interface ScanSummary {
  /** Codepoints consumed by this call */
  readonly consumed: number;
  /** Spans opened */
  readonly opened: number;
  /** Spans closed */
  readonly closed: number;
}

export function createScannerState(): ScannerState {
  return {
    position: ZERO_CODEPOINT_OFFSET,
    openBold: null,
    openItalic: null,
    previous: null,
  };
}

/**
 * Scan every codepoint from `state.position` to the end of `buffer`.
 * Fails without touching anything when the position lies past the end.
 */
export function advance(
  state: ScannerState,
  spans: AttributeSpanList,
  buffer: TextBuffer,
  cache: PositionCache
): Outcome<ScanSummary> {
  const length = buffer.length;
  if (state.position > length) {
    return fail(
      'position-beyond-buffer',
      `Scanner position ${state.position} is beyond buffer length ${length}`
    );
  }

  const from = state.position;
  let opened = 0;
  let closed = 0;

  for (let o = from; o < length; o++) {
    const offset = codepointOffset(o);
    const codepoint = cache.codepointAt(buffer, offset);
    const rule = codepoint === undefined ? undefined : findMarkerRule(codepoint);

    const matched =
      rule !== undefined &&
      (!rule.doubled ||
        (state.previous !== null && cache.codepointAt(buffer, state.previous) === codepoint));

    if (rule !== undefined && matched) {
      const open = openSpanOf(state, rule.kind);
      if (open === null) {
        const start = addCodepointOffset(offset, -markerReach(rule.kind));
        setOpenSpan(state, rule.kind, spans.insert(rule.kind, start, TO_TEXT_END));
        opened++;
      } else {
        // The closing delimiter is part of the styled range.
        spans.setEnd(open, bounded(addCodepointOffset(offset, 1)));
        setOpenSpan(state, rule.kind, null);
        closed++;
      }
    }

    state.previous = offset;
  }

  state.position = length;
  return succeed({ consumed: length - from, opened, closed });
}
