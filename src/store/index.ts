/**
 * Store exports for the markspan attribute engine.
 */

// Session factory
export { createMarkupSession } from './features/session.ts';
export type { MarkupSession } from './features/session.ts';

// Action creators
export { MarkupActions, serializeAction, deserializeAction } from './actions.ts';

// Text buffer
export { TextBuffer, toCodepoints, codepointLength } from './core/text-buffer.ts';
export type { BufferInput } from './core/text-buffer.ts';

// Span list
export {
  createAttributeSpanList,
  findSpanInvariantViolations,
  bounded,
  endsAfter,
  isOverlayKind,
  isFormattingKind,
  TO_TEXT_END,
} from './core/span-list.ts';
export type { AttributeSpanList } from './core/span-list.ts';

// Position cache
export { createPositionCache } from './core/position-cache.ts';
export type { PositionCache, MaterializedCursor } from './core/position-cache.ts';

// Scanner and backspace reducer
export { advance, createScannerState } from './features/scanner.ts';
export type { ScanSummary } from './features/scanner.ts';
export { retreat } from './features/backspace.ts';
export type { RetreatSummary } from './features/backspace.ts';
export { MARKER_RULES, findMarkerRule, markerRuleFor, markerReach } from './features/markers.ts';
export type { MarkerRule } from './features/markers.ts';

// Overlays
export { createOverlayAttributes } from './features/overlay.ts';
export type { OverlayAttributes } from './features/overlay.ts';

// Rendering contract
export { serializeSpans, formatSpans, formatSpanEnd } from './features/serialize.ts';
export type { SpanTriple } from './features/serialize.ts';

// Event system
export {
  createEventEmitter,
  createSpansChangeEvent,
  createDefectEvent,
  createCommitEvent,
} from './features/events.ts';
export type {
  MarkupEvent,
  SpansChangeEvent,
  DefectEvent,
  CommitEvent,
  AnyMarkupEvent,
  MarkupEventMap,
  EventHandler,
  Unsubscribe,
  MarkupEventEmitter,
} from './features/events.ts';
