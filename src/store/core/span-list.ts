/**
 * Ordered collection of tagged half-open ranges over buffer offsets.
 *
 * Spans are addressed by opaque handles issued on insertion. The two
 * overlay spans (compose-underline, cursor-alpha) are created with the
 * list, are never removed, and only change through `setRange`.
 */

import type { CodepointOffset, SpanHandle } from '../../types/branded.ts';
import type { AttributeKind, AttributeSpan, FormattingKind, OverlayKind, SpanEnd } from '../../types/state.ts';
import { spanHandle, ZERO_CODEPOINT_OFFSET } from '../../types/branded.ts';

// =============================================================================
// Span End Helpers
// =============================================================================

export const TO_TEXT_END: SpanEnd = Object.freeze({ type: 'to-text-end' });

export function bounded(offset: CodepointOffset): SpanEnd {
  return Object.freeze({ type: 'bounded', offset });
}

/**
 * Whether `end` lies strictly past `offset`. An unbounded end always does.
 */
export function endsAfter(end: SpanEnd, offset: number): boolean {
  return end.type === 'to-text-end' || end.offset > offset;
}

export function isOverlayKind(kind: AttributeKind): kind is OverlayKind {
  return kind === 'cursor-alpha' || kind === 'compose-underline';
}

export function isFormattingKind(kind: AttributeKind): kind is FormattingKind {
  return kind === 'bold' || kind === 'italic';
}

function isInverted(start: number, end: SpanEnd): boolean {
  return end.type === 'bounded' && end.offset < start;
}

// =============================================================================
// Span List
// =============================================================================

export interface AttributeSpanList {
  /** Handle of the compose-underline overlay. */
  readonly composeHandle: SpanHandle;
  /** Handle of the cursor-alpha overlay. */
  readonly cursorHandle: SpanHandle;
  /** Number of live spans, protected ones included. */
  readonly size: number;

  /**
   * Insert a formatting span at the end of the list.
   * @throws RangeError for overlay kinds or a bounded end before start
   */
  insert(kind: FormattingKind, start: CodepointOffset, end: SpanEnd): SpanHandle;

  get(handle: SpanHandle): AttributeSpan | undefined;
  has(handle: SpanHandle): boolean;
  isProtected(handle: SpanHandle): boolean;

  /** @throws RangeError for an unknown handle or an inverted range */
  setEnd(handle: SpanHandle, end: SpanEnd): void;
  /** @throws RangeError for an unknown handle or an inverted range */
  setRange(handle: SpanHandle, start: CodepointOffset, end: SpanEnd): void;

  /**
   * Remove every span failing `predicate`. Protected spans are kept
   * whatever the predicate says. Returns the number removed.
   */
  retain(predicate: (span: AttributeSpan) => boolean): number;

  /**
   * Remove zero-length spans that are not protected. Idempotent.
   * Returns the number removed.
   */
  simplify(): number;

  /** Snapshots in insertion order. */
  spans(): readonly AttributeSpan[];
}

interface SpanRecord {
  readonly handle: SpanHandle;
  readonly kind: AttributeKind;
  start: CodepointOffset;
  end: SpanEnd;
}

function snapshot(record: SpanRecord): AttributeSpan {
  return Object.freeze({
    handle: record.handle,
    kind: record.kind,
    start: record.start,
    end: record.end,
  });
}

/**
 * Create a span list holding only the two parked overlays at (0, 0).
 */
export function createAttributeSpanList(): AttributeSpanList {
  // Map iteration follows insertion order, which is the list order.
  const records = new Map<SpanHandle, SpanRecord>();
  let nextId = 0;

  function add(kind: AttributeKind, start: CodepointOffset, end: SpanEnd): SpanHandle {
    const handle = spanHandle(nextId++);
    records.set(handle, { handle, kind, start, end });
    return handle;
  }

  const composeHandle = add('compose-underline', ZERO_CODEPOINT_OFFSET, bounded(ZERO_CODEPOINT_OFFSET));
  const cursorHandle = add('cursor-alpha', ZERO_CODEPOINT_OFFSET, bounded(ZERO_CODEPOINT_OFFSET));

  function isProtected(handle: SpanHandle): boolean {
    return handle === composeHandle || handle === cursorHandle;
  }

  function lookup(handle: SpanHandle): SpanRecord {
    const record = records.get(handle);
    if (!record) {
      throw new RangeError(`Unknown span handle: ${handle}`);
    }
    return record;
  }

  function insert(kind: FormattingKind, start: CodepointOffset, end: SpanEnd): SpanHandle {
    if (!isFormattingKind(kind)) {
      throw new RangeError(`Cannot insert a span of overlay kind '${kind}'`);
    }
    if (isInverted(start, end)) {
      throw new RangeError(`Span end ${JSON.stringify(end)} is before start ${start}`);
    }
    return add(kind, start, end);
  }

  function setEnd(handle: SpanHandle, end: SpanEnd): void {
    const record = lookup(handle);
    if (isInverted(record.start, end)) {
      throw new RangeError(`Span end ${JSON.stringify(end)} is before start ${record.start}`);
    }
    record.end = end;
  }

  function setRange(handle: SpanHandle, start: CodepointOffset, end: SpanEnd): void {
    const record = lookup(handle);
    if (isInverted(start, end)) {
      throw new RangeError(`Span end ${JSON.stringify(end)} is before start ${start}`);
    }
    record.start = start;
    record.end = end;
  }

  function retain(predicate: (span: AttributeSpan) => boolean): number {
    let removed = 0;
    for (const [handle, record] of records) {
      if (isProtected(handle)) continue;
      if (!predicate(snapshot(record))) {
        records.delete(handle);
        removed++;
      }
    }
    return removed;
  }

  function simplify(): number {
    return retain((span) => span.end.type === 'to-text-end' || span.end.offset > span.start);
  }

  return {
    composeHandle,
    cursorHandle,
    get size() {
      return records.size;
    },
    insert,
    get(handle) {
      const record = records.get(handle);
      return record ? snapshot(record) : undefined;
    },
    has(handle) {
      return records.has(handle);
    },
    isProtected,
    setEnd,
    setRange,
    retain,
    simplify,
    spans() {
      return Object.freeze(Array.from(records.values(), snapshot));
    },
  };
}

// =============================================================================
// Invariants
// =============================================================================

/**
 * List every broken span-list invariant. An empty result means the list is sound.
 */
export function findSpanInvariantViolations(list: AttributeSpanList): string[] {
  const violations: string[] = [];
  const overlayCounts: Record<OverlayKind, number> = { 'cursor-alpha': 0, 'compose-underline': 0 };

  for (const span of list.spans()) {
    if (isInverted(span.start, span.end)) {
      violations.push(`${span.kind} span ${span.handle} ends before it starts`);
    }
    if (isOverlayKind(span.kind)) {
      overlayCounts[span.kind]++;
      if (!list.isProtected(span.handle)) {
        violations.push(`${span.kind} span ${span.handle} is not protected`);
      }
    } else if (span.end.type === 'bounded' && span.end.offset <= span.start) {
      violations.push(`${span.kind} span ${span.handle} is empty`);
    }
  }

  for (const [kind, count] of Object.entries(overlayCounts)) {
    if (count !== 1) {
      violations.push(`expected exactly one ${kind} span, found ${count}`);
    }
  }
  return violations;
}
