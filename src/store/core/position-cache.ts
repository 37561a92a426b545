/**
 * Materialized read cursor over a text buffer's storage.
 *
 * Reading through the captured storage array skips the buffer's bounds
 * checks on every scanned codepoint. The capture is only trusted while the
 * buffer's generation matches the one it was taken under; after a
 * reallocation it is re-derived in O(1) from the stable offset.
 */

import type { CodepointOffset, Generation } from '../../types/branded.ts';
import type { MarkupLogger } from '../../types/state.ts';
import type { TextBuffer } from './text-buffer.ts';

export interface MaterializedCursor {
  readonly buffer: TextBuffer;
  readonly storage: Uint32Array;
  readonly generation: Generation;
}

export interface PositionCache {
  /**
   * Return the cursor for `buffer`, re-deriving it if the buffer
   * reallocated (or is a different buffer) since the last call.
   */
  materialize(buffer: TextBuffer): MaterializedCursor;

  /**
   * Codepoint at `offset`, or undefined outside [0, length).
   */
  codepointAt(buffer: TextBuffer, offset: CodepointOffset): number | undefined;

  /** Drop the cached cursor. */
  invalidate(): void;

  /** How many times the cursor has been (re-)derived. */
  readonly rederivations: number;

  /** Generation of the cached cursor, or null when nothing is cached. */
  readonly lastStorageIdentity: Generation | null;
}

export function createPositionCache(logger?: Pick<MarkupLogger, 'debug'>): PositionCache {
  let cached: MaterializedCursor | null = null;
  let rederivations = 0;

  function materialize(buffer: TextBuffer): MaterializedCursor {
    const identity = buffer.storageIdentity();
    if (cached !== null && cached.buffer === buffer && cached.generation === identity) {
      return cached;
    }
    if (cached !== null && cached.buffer === buffer) {
      logger?.debug(`Buffer storage reallocated (generation ${cached.generation} -> ${identity}), re-deriving cursor`);
    }
    cached = Object.freeze({ buffer, storage: buffer.storage, generation: identity });
    rederivations++;
    return cached;
  }

  return {
    materialize,
    codepointAt(buffer, offset) {
      if (offset < 0 || offset >= buffer.length) return undefined;
      return materialize(buffer).storage[offset];
    },
    invalidate() {
      cached = null;
    },
    get rederivations() {
      return rederivations;
    },
    get lastStorageIdentity() {
      return cached?.generation ?? null;
    },
  };
}
