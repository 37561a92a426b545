/**
 * Event system for markup sessions.
 * Provides a pub/sub mechanism for span changes and reported defects.
 */

import type { AttributeSpan } from '../../types/state.ts';
import type { MarkupActionType } from '../../types/actions.ts';
import type { ContractDefect } from '../../types/outcome.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface MarkupEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after an operation changed the buffer or the span list.
 */
export interface SpansChangeEvent extends MarkupEvent {
  readonly type: 'spans-change';
  /** The operation that caused the change */
  readonly operation: MarkupActionType;
  /** Span list after the change, in list order */
  readonly spans: readonly AttributeSpan[];
}

/**
 * Fired when an operation was rejected as a contract breach.
 */
export interface DefectEvent extends MarkupEvent {
  readonly type: 'defect';
  readonly operation: MarkupActionType | 'COMMIT';
  readonly defect: ContractDefect;
}

/**
 * Fired once when the session is committed.
 */
export interface CommitEvent extends MarkupEvent {
  readonly type: 'commit';
  /** Final paragraph text */
  readonly text: string;
}

export type AnyMarkupEvent = SpansChangeEvent | DefectEvent | CommitEvent;

/**
 * Event type to handler mapping.
 */
export interface MarkupEventMap {
  'spans-change': SpansChangeEvent;
  'defect': DefectEvent;
  'commit': CommitEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

export type EventHandler<T extends AnyMarkupEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for all markup events.
 */
export interface MarkupEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof MarkupEventMap>(
    type: K,
    handler: EventHandler<MarkupEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof MarkupEventMap>(
    type: K,
    handler: EventHandler<MarkupEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers. A throwing handler is logged
   * and does not stop the others.
   */
  emit<K extends keyof MarkupEventMap>(type: K, event: MarkupEventMap[K]): void;

  removeAllListeners(): void;
}

type HandlerSets = {
  [K in keyof MarkupEventMap]: Set<EventHandler<MarkupEventMap[K]>>;
};

/**
 * Create a new markup event emitter.
 * @param onHandlerError - receives errors thrown by handlers (default: console.error)
 */
export function createEventEmitter(
  onHandlerError: (message: string, error: unknown) => void = (message, error) => console.error(message, error)
): MarkupEventEmitter {
  const handlers: HandlerSets = {
    'spans-change': new Set(),
    'defect': new Set(),
    'commit': new Set(),
  };

  return {
    addEventListener(type, handler) {
      handlers[type].add(handler);
      return () => {
        handlers[type].delete(handler);
      };
    },

    removeEventListener(type, handler) {
      handlers[type].delete(handler);
    },

    emit(type, event) {
      for (const handler of handlers[type]) {
        try {
          handler(event);
        } catch (error) {
          onHandlerError(`Event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners() {
      for (const set of Object.values(handlers)) {
        set.clear();
      }
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createSpansChangeEvent(
  operation: MarkupActionType,
  spans: readonly AttributeSpan[]
): SpansChangeEvent {
  return Object.freeze({
    type: 'spans-change' as const,
    timestamp: Date.now(),
    operation,
    spans,
  });
}

export function createDefectEvent(
  operation: MarkupActionType | 'COMMIT',
  defect: ContractDefect
): DefectEvent {
  return Object.freeze({
    type: 'defect' as const,
    timestamp: Date.now(),
    operation,
    defect,
  });
}

export function createCommitEvent(text: string): CommitEvent {
  return Object.freeze({
    type: 'commit' as const,
    timestamp: Date.now(),
    text,
  });
}
