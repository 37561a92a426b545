/**
 * Type exports for the markspan attribute engine.
 */

// State types
export type {
  FormattingKind,
  OverlayKind,
  AttributeKind,
  SpanEnd,
  AttributeSpan,
  OpenSpan,
  ScannerState,
  ScannerSnapshot,
  MarkupLogger,
  RetreatUnit,
  MarkupSessionConfig,
} from './state.ts';

// Action types
export type {
  AppendAction,
  AdvanceAction,
  RetreatAction,
  SimplifyAction,
  SetupCursorAction,
  CleanupCursorAction,
  SetupComposeAction,
  CleanupComposeAction,
  MarkupAction,
  MarkupActionType,
  ActionValidationResult,
} from './actions.ts';

export {
  isEditAction,
  isOverlayAction,
  isMarkupAction,
  validateAction,
} from './actions.ts';

// Outcomes
export type { DefectKind, ContractDefect, Outcome } from './outcome.ts';
export { succeed, fail, isDefect } from './outcome.ts';

// Branded offset and identity types
export type { CodepointOffset, SpanHandle, Generation } from './branded.ts';

export {
  codepointOffset,
  spanHandle,
  isValidOffset,
  addCodepointOffset,
  diffCodepointOffset,
  nextGeneration,
  ZERO_CODEPOINT_OFFSET,
  INITIAL_GENERATION,
} from './branded.ts';
