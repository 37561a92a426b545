/**
 * Branded types for type-safe offset and handle handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A codepoint
 * offset into the text buffer must not be confused with a UTF-16 index into
 * a JavaScript string, and neither may stand in for a span handle.
 *
 * Usage:
 * ```typescript
 * const offset = codepointOffset(10);
 * const handle = spanHandle(3);
 *
 * // Type error: can't assign SpanHandle to CodepointOffset
 * const wrong: CodepointOffset = handle;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Offset and Identity Types
// =============================================================================

/**
 * Codepoint offset in the text buffer.
 * Zero-based position counted in Unicode codepoints, not UTF-16 code units.
 *
 * Use when:
 * - Indexing into the buffer's codepoint storage
 * - Recording span starts and bounded ends
 * - Tracking the scanner position
 */
export type CodepointOffset = Branded<number, 'CodepointOffset'>;

/**
 * Opaque handle identifying one span in an AttributeSpanList.
 * Issued on insertion, never reused within the same list.
 */
export type SpanHandle = Branded<number, 'SpanHandle'>;

/**
 * Storage generation of a text buffer.
 * Bumped exactly when the backing storage is reallocated.
 */
export type Generation = Branded<number, 'Generation'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a CodepointOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function codepointOffset(value: number): CodepointOffset {
  return value as CodepointOffset;
}

/**
 * Create a SpanHandle from a number.
 */
export function spanHandle(value: number): SpanHandle {
  return value as SpanHandle;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid offset (non-negative integer).
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a CodepointOffset.
 * Preserves the brand type.
 */
export function addCodepointOffset(offset: CodepointOffset, delta: number): CodepointOffset {
  return (offset + delta) as CodepointOffset;
}

/**
 * Subtract two CodepointOffsets to get a numeric difference.
 */
export function diffCodepointOffset(a: CodepointOffset, b: CodepointOffset): number {
  return a - b;
}

/**
 * Step one generation forward.
 */
export function nextGeneration(value: Generation): Generation {
  return (value + 1) as Generation;
}

// =============================================================================
// Constants
// =============================================================================

export const ZERO_CODEPOINT_OFFSET: CodepointOffset = 0 as CodepointOffset;

export const INITIAL_GENERATION: Generation = 0 as Generation;
