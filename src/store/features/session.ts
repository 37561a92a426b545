/**
 * Markup session: the single owner of one paragraph's
 * (TextBuffer, AttributeSpanList, ScannerState) triple.
 *
 * Every entry point returns an Outcome. Contract breaches are logged,
 * emitted as `defect` events and returned; they never leave the triple
 * half-updated.
 */

import type { CodepointOffset } from '../../types/branded.ts';
import type {
  AttributeSpan,
  MarkupLogger,
  MarkupSessionConfig,
  RetreatUnit,
  ScannerSnapshot,
  SpanEnd,
} from '../../types/state.ts';
import type { MarkupAction, MarkupActionType } from '../../types/actions.ts';
import type { Outcome } from '../../types/outcome.ts';
import type { EventHandler, MarkupEventMap, Unsubscribe } from './events.ts';
import type { ScanSummary } from './scanner.ts';
import type { RetreatSummary } from './backspace.ts';
import type { SpanTriple } from './serialize.ts';
import { isValidOffset } from '../../types/branded.ts';
import { validateAction } from '../../types/actions.ts';
import { fail, succeed } from '../../types/outcome.ts';
import { TextBuffer, toCodepoints } from '../core/text-buffer.ts';
import { createAttributeSpanList } from '../core/span-list.ts';
import { createPositionCache } from '../core/position-cache.ts';
import { advance as scan, createScannerState } from './scanner.ts';
import { retreat as backspace } from './backspace.ts';
import { createOverlayAttributes } from './overlay.ts';
import { serializeSpans } from './serialize.ts';
import { createCommitEvent, createDefectEvent, createEventEmitter, createSpansChangeEvent } from './events.ts';

const DEFAULT_EXTRA_CAPACITY = 256;
const DEFAULT_CURSOR_PLACEHOLDER = '_';

export interface MarkupSession {
  /** The paragraph buffer. The host may append to it directly, then call advance. */
  readonly buffer: TextBuffer;

  /** Scan text appended since the last call. */
  advance(): Outcome<ScanSummary>;
  /** Append `text` and scan it. */
  append(text: string): Outcome<ScanSummary>;
  /** Remove the last character. */
  retreat(): Outcome<RetreatSummary>;
  /** Remove zero-length formatting spans; returns how many. */
  simplify(): Outcome<number>;

  setupCursor(): Outcome<CodepointOffset>;
  cleanupCursor(): Outcome;
  setupCompose(start: number, end: number | SpanEnd): Outcome;
  cleanupCompose(): Outcome;

  /** Apply a serialized action. */
  dispatch(action: MarkupAction): Outcome<unknown>;

  /**
   * Show the cursor placeholder while `render` runs.
   * A throwing `render` still gets the cursor cleaned up.
   */
  withCursor<T>(render: () => T): Outcome<T>;

  /**
   * Append input-method pre-edit `text` with an underline while `render`
   * runs, then remove it again. Empty text only runs `render`.
   */
  withComposition<T>(text: string, render: () => T): Outcome<T>;

  getState(): ScannerSnapshot;
  spans(): readonly AttributeSpan[];
  serialize(): readonly SpanTriple[];
  text(): string;

  /**
   * Close the session and return the final paragraph text.
   */
  commit(): Outcome<string>;
  readonly closed: boolean;

  addEventListener<K extends keyof MarkupEventMap>(
    type: K,
    handler: EventHandler<MarkupEventMap[K]>
  ): Unsubscribe;
}

function resolvePlaceholder(placeholder: string): number {
  const codepoints = toCodepoints(placeholder);
  if (codepoints.length !== 1) {
    throw new RangeError(`cursorPlaceholder must be exactly one codepoint, got ${JSON.stringify(placeholder)}`);
  }
  return codepoints[0];
}

/**
 * Factory function to create a MarkupSession.
 * Initial `content` is scanned before the session is returned.
 *
 * @throws RangeError on invalid configuration
 */
export function createMarkupSession(config: Partial<MarkupSessionConfig> = {}): MarkupSession {
  const extraCapacity = config.extraCapacity ?? DEFAULT_EXTRA_CAPACITY;
  if (!isValidOffset(extraCapacity)) {
    throw new RangeError(`extraCapacity must be a non-negative integer, got ${extraCapacity}`);
  }
  const placeholder = resolvePlaceholder(config.cursorPlaceholder ?? DEFAULT_CURSOR_PLACEHOLDER);
  const retreatUnit: RetreatUnit = config.retreatUnit ?? 'codepoint';
  const logger: MarkupLogger = config.logger ?? console;

  const buffer = TextBuffer.from(config.content ?? '', extraCapacity);
  const list = createAttributeSpanList();
  const state = createScannerState();
  const cache = createPositionCache(logger);
  const overlays = createOverlayAttributes(list, placeholder);
  const emitter = createEventEmitter((message, error) => logger.error(message, error));
  let closed = false;

  function report<T>(operation: MarkupActionType | 'COMMIT', outcome: Outcome<T>): Outcome<T> {
    if (!outcome.ok) {
      logger.error(`[markspan] ${operation} rejected (${outcome.defect.kind}): ${outcome.defect.message}`);
      emitter.emit('defect', createDefectEvent(operation, outcome.defect));
    }
    return outcome;
  }

  function changed(operation: MarkupActionType): void {
    emitter.emit('spans-change', createSpansChangeEvent(operation, list.spans()));
  }

  /**
   * Shared guard for operations that must not run after commit, or while
   * the cursor placeholder sits in the buffer. Scanning operations are also
   * held back by a placeholder a stale cleanup left behind.
   */
  function guard(operation: MarkupActionType, needsParkedCursor: boolean, scans = false): Outcome<never> | null {
    if (closed) {
      return report(operation, fail('session-closed', `${operation} called after commit`));
    }
    if (needsParkedCursor && overlays.cursorActive) {
      return report(operation, fail('cursor-active', `${operation} called while the cursor placeholder is in the buffer`));
    }
    const stranded = scans ? overlays.strandedPlaceholder(buffer) : null;
    if (stranded !== null) {
      return report(
        operation,
        fail(
          'cursor-stale',
          `${operation} called while a stale cursor placeholder remains at offset ${stranded}; truncate the buffer to ${stranded} first`
        )
      );
    }
    return null;
  }

  function advance(): Outcome<ScanSummary> {
    const rejected = guard('ADVANCE', true, true);
    if (rejected) return rejected;
    const outcome = report('ADVANCE', scan(state, list, buffer, cache));
    if (outcome.ok && outcome.value.consumed > 0) changed('ADVANCE');
    return outcome;
  }

  function append(text: string): Outcome<ScanSummary> {
    const rejected = guard('APPEND', true, true);
    if (rejected) return rejected;
    if (state.position > buffer.length) {
      // Refuse before appending so the buffer is left as the caller had it.
      return report('APPEND', scan(state, list, buffer, cache));
    }
    buffer.append(text);
    const outcome = report('APPEND', scan(state, list, buffer, cache));
    if (outcome.ok && outcome.value.consumed > 0) changed('APPEND');
    return outcome;
  }

  function retreat(): Outcome<RetreatSummary> {
    const rejected = guard('RETREAT', true);
    if (rejected) return rejected;
    const outcome = report('RETREAT', backspace(state, list, buffer, retreatUnit));
    if (outcome.ok && outcome.value.removed > 0) changed('RETREAT');
    return outcome;
  }

  function simplify(): Outcome<number> {
    const rejected = guard('SIMPLIFY', false);
    if (rejected) return rejected;
    const removed = list.simplify();
    if (removed > 0) changed('SIMPLIFY');
    return succeed(removed);
  }

  function setupCursor(): Outcome<CodepointOffset> {
    const rejected = guard('SETUP_CURSOR', false);
    if (rejected) return rejected;
    const outcome = report('SETUP_CURSOR', overlays.setupCursor(buffer));
    if (outcome.ok) changed('SETUP_CURSOR');
    return outcome;
  }

  function cleanupCursor(): Outcome {
    const rejected = guard('CLEANUP_CURSOR', false);
    if (rejected) return rejected;
    const wasActive = overlays.cursorActive;
    const outcome = report('CLEANUP_CURSOR', overlays.cleanupCursor(buffer));
    // A stale cursor is still parked, so listeners hear about it either way.
    if (wasActive) changed('CLEANUP_CURSOR');
    return outcome;
  }

  function setupCompose(start: number, end: number | SpanEnd): Outcome {
    const rejected = guard('SETUP_COMPOSE', false);
    if (rejected) return rejected;
    const outcome = report('SETUP_COMPOSE', overlays.setupCompose(start, end));
    if (outcome.ok) changed('SETUP_COMPOSE');
    return outcome;
  }

  function cleanupCompose(): Outcome {
    const rejected = guard('CLEANUP_COMPOSE', false);
    if (rejected) return rejected;
    const outcome = overlays.cleanupCompose();
    changed('CLEANUP_COMPOSE');
    return outcome;
  }

  function dispatch(action: MarkupAction): Outcome<unknown> {
    const validation = validateAction(action);
    if (!validation.valid) {
      return report(action.type, fail('invalid-action', validation.errors.join('; ')));
    }

    switch (action.type) {
      case 'APPEND':
        return append(action.text);
      case 'ADVANCE':
        return advance();
      case 'RETREAT':
        return retreat();
      case 'SIMPLIFY':
        return simplify();
      case 'SETUP_CURSOR':
        return setupCursor();
      case 'CLEANUP_CURSOR':
        return cleanupCursor();
      case 'SETUP_COMPOSE':
        return setupCompose(action.start, action.end);
      case 'CLEANUP_COMPOSE':
        return cleanupCompose();
    }
  }

  function withCursor<T>(render: () => T): Outcome<T> {
    const setup = setupCursor();
    if (!setup.ok) return setup;

    let value: T;
    try {
      value = render();
    } catch (error) {
      cleanupCursor();
      throw error;
    }

    const cleanup = cleanupCursor();
    return cleanup.ok ? succeed(value) : cleanup;
  }

  function withComposition<T>(text: string, render: () => T): Outcome<T> {
    const rejected = guard('SETUP_COMPOSE', false);
    if (rejected) return rejected;
    if (text.length === 0) {
      return succeed(render());
    }

    const initial = buffer.length;
    buffer.append(text);
    const setup = setupCompose(initial, buffer.length);
    if (!setup.ok) {
      buffer.truncate(initial);
      return setup;
    }

    try {
      return succeed(render());
    } finally {
      cleanupCompose();
      buffer.truncate(initial);
    }
  }

  function getState(): ScannerSnapshot {
    return Object.freeze({ ...state });
  }

  function commit(): Outcome<string> {
    if (closed) {
      return report('COMMIT', fail('session-closed', 'commit called twice'));
    }
    if (overlays.cursorActive) {
      return report('COMMIT', fail('cursor-active', 'commit called while the cursor placeholder is in the buffer'));
    }
    const text = buffer.toString();
    closed = true;
    emitter.emit('commit', createCommitEvent(text));
    return succeed(text);
  }

  if (buffer.length > 0) {
    report('ADVANCE', scan(state, list, buffer, cache));
  }

  return {
    buffer,
    advance,
    append,
    retreat,
    simplify,
    setupCursor,
    cleanupCursor,
    setupCompose,
    cleanupCompose,
    dispatch,
    withCursor,
    withComposition,
    getState,
    spans: () => list.spans(),
    serialize: () => serializeSpans(list),
    text: () => buffer.toString(),
    commit,
    get closed() {
      return closed;
    },
    addEventListener: emitter.addEventListener,
  };
}
