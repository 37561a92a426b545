/**
 * Markup action types for the markspan engine.
 * Every public session operation can be expressed as a serializable action,
 * so keystroke logs can be recorded and replayed.
 */

import type { SpanEnd } from './state.ts';

// =============================================================================
// Editing Actions
// =============================================================================

/**
 * Append text to the buffer, then scan it.
 */
export interface AppendAction {
  readonly type: 'APPEND';
  /** Text to append */
  readonly text: string;
}

/**
 * Scan text already appended to the buffer by the host.
 */
export interface AdvanceAction {
  readonly type: 'ADVANCE';
}

/**
 * Remove the last character (backspace).
 */
export interface RetreatAction {
  readonly type: 'RETREAT';
}

/**
 * Remove zero-length formatting spans.
 */
export interface SimplifyAction {
  readonly type: 'SIMPLIFY';
}

// =============================================================================
// Overlay Actions
// =============================================================================

export interface SetupCursorAction {
  readonly type: 'SETUP_CURSOR';
}

export interface CleanupCursorAction {
  readonly type: 'CLEANUP_CURSOR';
}

/**
 * Underline input-method pre-edit text.
 */
export interface SetupComposeAction {
  readonly type: 'SETUP_COMPOSE';
  /** First underlined codepoint offset */
  readonly start: number;
  /** End of the underline */
  readonly end: SpanEnd;
}

export interface CleanupComposeAction {
  readonly type: 'CLEANUP_COMPOSE';
}

// =============================================================================
// Union Type
// =============================================================================

export type MarkupAction =
  | AppendAction
  | AdvanceAction
  | RetreatAction
  | SimplifyAction
  | SetupCursorAction
  | CleanupCursorAction
  | SetupComposeAction
  | CleanupComposeAction;

export type MarkupActionType = MarkupAction['type'];

// =============================================================================
// Action Type Guards
// =============================================================================

/**
 * Check if an action edits the buffer text or its formatting spans.
 */
export function isEditAction(
  action: MarkupAction
): action is AppendAction | AdvanceAction | RetreatAction | SimplifyAction {
  return (
    action.type === 'APPEND' ||
    action.type === 'ADVANCE' ||
    action.type === 'RETREAT' ||
    action.type === 'SIMPLIFY'
  );
}

/**
 * Check if an action moves one of the overlays.
 */
export function isOverlayAction(
  action: MarkupAction
): action is SetupCursorAction | CleanupCursorAction | SetupComposeAction | CleanupComposeAction {
  return (
    action.type === 'SETUP_CURSOR' ||
    action.type === 'CLEANUP_CURSOR' ||
    action.type === 'SETUP_COMPOSE' ||
    action.type === 'CLEANUP_COMPOSE'
  );
}

function isSpanEnd(value: unknown): value is SpanEnd {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  if (value.type === 'to-text-end') {
    return true;
  }
  return value.type === 'bounded' && 'offset' in value && typeof value.offset === 'number';
}

/**
 * Check if an unknown value is a valid MarkupAction.
 * Useful for validating actions read back from a recorded log.
 */
export function isMarkupAction(value: unknown): value is MarkupAction {
  return validateAction(value).valid;
}

// =============================================================================
// Action Validation
// =============================================================================

/**
 * Result of validating an action.
 */
export interface ActionValidationResult {
  /** Whether the action is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

/**
 * Validate an action with detailed error messages.
 *
 * @example
 * ```typescript
 * const result = validateAction(action);
 * if (!result.valid) {
 *   console.error('Invalid action:', result.errors);
 * }
 * ```
 */
export function validateAction(value: unknown): ActionValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Action must be a non-null object');
    return { valid: false, errors };
  }

  if (!('type' in value) || typeof value.type !== 'string') {
    errors.push('Action must have a string "type" property');
    return { valid: false, errors };
  }

  switch (value.type) {
    case 'APPEND': {
      if (!('text' in value) || typeof value.text !== 'string') {
        errors.push('APPEND action requires a string "text" property');
      }
      break;
    }

    case 'SETUP_COMPOSE': {
      const start = 'start' in value ? value.start : undefined;
      const end = 'end' in value ? value.end : undefined;
      if (typeof start !== 'number') {
        errors.push('SETUP_COMPOSE action requires a numeric "start" property');
      } else if (!Number.isInteger(start) || start < 0) {
        errors.push(`SETUP_COMPOSE start must be a non-negative integer: ${start}`);
      }
      if (!isSpanEnd(end)) {
        errors.push('SETUP_COMPOSE action requires a span end "end" property');
      } else if (end.type === 'bounded' && (!Number.isInteger(end.offset) || end.offset < 0)) {
        errors.push(`SETUP_COMPOSE end must be a non-negative integer: ${end.offset}`);
      } else if (end.type === 'bounded' && typeof start === 'number' && end.offset < start) {
        errors.push(`SETUP_COMPOSE start (${start}) cannot be greater than end (${end.offset})`);
      }
      break;
    }

    case 'ADVANCE':
    case 'RETREAT':
    case 'SIMPLIFY':
    case 'SETUP_CURSOR':
    case 'CLEANUP_CURSOR':
    case 'CLEANUP_COMPOSE':
      // These actions have no additional properties to validate
      break;

    default:
      errors.push(`Unknown action type: "${value.type}"`);
  }

  return { valid: errors.length === 0, errors };
}
