/**
 * Inline delimiter rules shared by the scanner and the backspace reducer.
 *
 * A doubled marker needs the same codepoint immediately before it, and the
 * span it opens starts at that earlier codepoint. `markerReach` is the one
 * place that distance is defined: the scanner backdates span starts by it,
 * and the reducer widens its deletion boundary by it.
 */

import type { FormattingKind, ScannerState, OpenSpan } from '../../types/state.ts';

export interface MarkerRule {
  readonly kind: FormattingKind;
  readonly codepoint: number;
  /** Whether the delimiter is two consecutive marker codepoints */
  readonly doubled: boolean;
}

const rules: MarkerRule[] = [
  { kind: 'italic', codepoint: 0x5f /* _ */, doubled: false },
  { kind: 'bold', codepoint: 0x2a /* * */, doubled: true },
];

export const MARKER_RULES: readonly MarkerRule[] = Object.freeze(rules);

export function findMarkerRule(codepoint: number): MarkerRule | undefined {
  return MARKER_RULES.find((rule) => rule.codepoint === codepoint);
}

export function markerRuleFor(kind: FormattingKind): MarkerRule {
  const rule = MARKER_RULES.find((candidate) => candidate.kind === kind);
  if (!rule) {
    throw new RangeError(`No marker rule for '${kind}'`);
  }
  return rule;
}

/**
 * How many codepoints before the completing marker a span of `kind` starts.
 */
export function markerReach(kind: FormattingKind): number {
  return markerRuleFor(kind).doubled ? 1 : 0;
}

// =============================================================================
// Open Handle Access
// =============================================================================

export function openSpanOf(state: ScannerState, kind: FormattingKind): OpenSpan {
  return kind === 'bold' ? state.openBold : state.openItalic;
}

export function setOpenSpan(state: ScannerState, kind: FormattingKind, handle: OpenSpan): void {
  if (kind === 'bold') {
    state.openBold = handle;
  } else {
    state.openItalic = handle;
  }
}
