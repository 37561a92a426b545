/**
 * Explicit outcomes for session entry points.
 * Caller misuse is reported as a ContractDefect value instead of
 * being tolerated or left to corrupt state.
 */

// =============================================================================
// Defects
// =============================================================================

export type DefectKind =
  /** advance called with position beyond the buffer length */
  | 'position-beyond-buffer'
  /** cleanupCursor without a preceding setupCursor */
  | 'cursor-not-active'
  /** cleanupCursor after the buffer changed since setupCursor, or a scan over the placeholder it left */
  | 'cursor-stale'
  /** setupCursor while the placeholder is already in the buffer */
  | 'cursor-already-active'
  /** advance or retreat while the cursor placeholder is in the buffer */
  | 'cursor-active'
  /** negative, fractional or inverted range */
  | 'invalid-range'
  /** dispatch of a value that is not a well-formed action */
  | 'invalid-action'
  /** any operation after commit */
  | 'session-closed';

export interface ContractDefect {
  readonly kind: DefectKind;
  readonly message: string;
}

// =============================================================================
// Outcome
// =============================================================================

export type Outcome<T = void> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly defect: ContractDefect };

export function succeed<T>(value: T): Outcome<T> {
  return Object.freeze({ ok: true as const, value });
}

export function fail<T = never>(kind: DefectKind, message: string): Outcome<T> {
  return Object.freeze({ ok: false as const, defect: Object.freeze({ kind, message }) });
}

/**
 * Check if an outcome failed with the given defect kind.
 */
export function isDefect<T>(outcome: Outcome<T>, kind: DefectKind): boolean {
  return !outcome.ok && outcome.defect.kind === kind;
}
