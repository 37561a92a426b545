/**
 * Action creator functions for the markspan engine.
 * Provides type-safe factory functions for creating markup actions.
 */

import type { SpanEnd } from '../types/state.ts';
import type {
  MarkupAction,
  AppendAction,
  AdvanceAction,
  RetreatAction,
  SimplifyAction,
  SetupCursorAction,
  CleanupCursorAction,
  SetupComposeAction,
  CleanupComposeAction,
} from '../types/actions.ts';
import { codepointOffset } from '../types/branded.ts';
import { isMarkupAction, validateAction } from '../types/actions.ts';
import { bounded } from './core/span-list.ts';

/**
 * Action creators for session operations.
 * All functions return serializable action objects.
 */
export const MarkupActions = {
  /**
   * Create an append action.
   * @param text - Text to append at the end of the buffer
   */
  append(text: string): AppendAction {
    return Object.freeze({ type: 'APPEND', text });
  },

  advance(): AdvanceAction {
    return Object.freeze({ type: 'ADVANCE' });
  },

  /**
   * Create a backspace action.
   */
  retreat(): RetreatAction {
    return Object.freeze({ type: 'RETREAT' });
  },

  simplify(): SimplifyAction {
    return Object.freeze({ type: 'SIMPLIFY' });
  },

  setupCursor(): SetupCursorAction {
    return Object.freeze({ type: 'SETUP_CURSOR' });
  },

  cleanupCursor(): CleanupCursorAction {
    return Object.freeze({ type: 'CLEANUP_CURSOR' });
  },

  /**
   * Create a setup compose action.
   * @param start - First underlined codepoint offset
   * @param end - Exclusive end offset, or a span end (e.g. to the end of the text)
   */
  setupCompose(start: number, end: number | SpanEnd): SetupComposeAction {
    const spanEnd = typeof end === 'number' ? bounded(codepointOffset(end)) : end;
    return Object.freeze({ type: 'SETUP_COMPOSE', start, end: spanEnd });
  },

  cleanupCompose(): CleanupComposeAction {
    return Object.freeze({ type: 'CLEANUP_COMPOSE' });
  },
};

/**
 * Serialize an action to a JSON string.
 */
export function serializeAction(action: MarkupAction): string {
  return JSON.stringify(action);
}

/**
 * Deserialize an action from a JSON string.
 * Useful for replaying recorded keystroke logs.
 */
export function deserializeAction(json: string): MarkupAction {
  const parsed: unknown = JSON.parse(json);
  if (!isMarkupAction(parsed)) {
    const { errors } = validateAction(parsed);
    throw new Error(`Invalid deserialized action: ${errors.join('; ')}`);
  }
  return parsed;
}
