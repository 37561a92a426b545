/**
 * Core state types for the markspan attribute engine.
 * Spans and scanner state are exposed as frozen snapshots; the live
 * structures stay private to the session that owns them.
 */

import type { CodepointOffset, SpanHandle } from './branded.ts';

// =============================================================================
// Attribute Kinds
// =============================================================================

/**
 * Inline formatting produced by the markdown scanner.
 */
export type FormattingKind = 'bold' | 'italic';

/**
 * Presentation overlays. Exactly one span of each kind exists per list.
 */
export type OverlayKind = 'cursor-alpha' | 'compose-underline';

export type AttributeKind = FormattingKind | OverlayKind;

// =============================================================================
// Span Types
// =============================================================================

/**
 * End of a span: a fixed offset, or "runs to the end of the text".
 */
export type SpanEnd =
  | { readonly type: 'bounded'; readonly offset: CodepointOffset }
  | { readonly type: 'to-text-end' };

/**
 * A tagged half-open range [start, end) over buffer offsets.
 * When `end` is bounded, `start <= end.offset`.
 */
export interface AttributeSpan {
  readonly handle: SpanHandle;
  readonly kind: AttributeKind;
  readonly start: CodepointOffset;
  readonly end: SpanEnd;
}

/**
 * Handle of a span still waiting for its closing delimiter, or null.
 */
export type OpenSpan = SpanHandle | null;

// =============================================================================
// Scanner State
// =============================================================================

/**
 * Incremental scanner state. Mutated in place by advance and retreat.
 */
export interface ScannerState {
  /** Offset of the first codepoint not yet scanned */
  position: CodepointOffset;
  /** Bold span pending closure */
  openBold: OpenSpan;
  /** Italic span pending closure */
  openItalic: OpenSpan;
  /** Offset of the codepoint just before `position`, kept across calls */
  previous: CodepointOffset | null;
}

/**
 * Read-only copy of the scanner state, safe to hand out.
 */
export type ScannerSnapshot = Readonly<ScannerState>;

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Logger used to report contract defects and buffer growth.
 */
export type MarkupLogger = Pick<Console, 'debug' | 'error'>;

/**
 * How much a retreat removes: one codepoint, or one grapheme cluster.
 */
export type RetreatUnit = 'codepoint' | 'grapheme';

/**
 * Configuration options for creating a markup session.
 */
export interface MarkupSessionConfig {
  /** Initial paragraph text, scanned immediately (default: '') */
  content?: string;
  /** Spare codepoint capacity beyond the initial content (default: 256) */
  extraCapacity?: number;
  /** Single codepoint appended while the cursor is shown (default: '_') */
  cursorPlaceholder?: string;
  /** Unit removed by one retreat (default: 'codepoint') */
  retreatUnit?: RetreatUnit;
  /** Where defects are reported (default: console) */
  logger?: MarkupLogger;
}
