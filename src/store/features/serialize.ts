/**
 * Span list serialization for the rendering collaborator.
 * The ordered triples are the whole rendering contract.
 */

import type { CodepointOffset } from '../../types/branded.ts';
import type { AttributeKind, AttributeSpan, SpanEnd } from '../../types/state.ts';
import type { AttributeSpanList } from '../core/span-list.ts';

export type SpanTriple = readonly [kind: AttributeKind, start: CodepointOffset, end: SpanEnd];

function toSpans(source: AttributeSpanList | readonly AttributeSpan[]): readonly AttributeSpan[] {
  return 'spans' in source ? source.spans() : source;
}

/**
 * Ordered `(kind, start, end)` triples, in list order.
 */
export function serializeSpans(source: AttributeSpanList | readonly AttributeSpan[]): readonly SpanTriple[] {
  return Object.freeze(
    toSpans(source).map((span): SpanTriple => Object.freeze([span.kind, span.start, span.end] as const))
  );
}

export function formatSpanEnd(end: SpanEnd): string {
  return end.type === 'bounded' ? String(end.offset) : 'end';
}

/**
 * One line per span, `start end kind`, e.g. `6 13 italic` or `6 end bold`.
 */
export function formatSpans(source: AttributeSpanList | readonly AttributeSpan[]): string[] {
  return toSpans(source).map((span) => `${span.start} ${formatSpanEnd(span.end)} ${span.kind}`);
}
