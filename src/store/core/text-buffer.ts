/**
 * Growable codepoint buffer backing one editable paragraph.
 *
 * Storage grows by doubling when capacity is exceeded. Codepoints in
 * [0, length) are valid; slots beyond are spare capacity. Every
 * reallocation bumps the generation, so holders of a materialized view
 * can tell when `storage` has been replaced. Offsets never change meaning
 * across reallocation.
 */

import type { CodepointOffset, Generation } from '../../types/branded.ts';
import { codepointOffset, INITIAL_GENERATION, isValidOffset, nextGeneration } from '../../types/branded.ts';

export type BufferInput = string | number | readonly number[];

export class TextBuffer {
  /** Backing storage (may have unused capacity beyond `length`) */
  private slots: Uint32Array;
  private used: number;
  private gen: Generation = INITIAL_GENERATION;

  constructor(capacity: number = 0) {
    if (!isValidOffset(capacity)) {
      throw new RangeError(`Invalid buffer capacity: ${capacity}`);
    }
    this.slots = new Uint32Array(capacity);
    this.used = 0;
  }

  /**
   * Create a buffer holding `text` with `extraCapacity` spare slots.
   */
  static from(text: string, extraCapacity: number = 0): TextBuffer {
    const codepoints = toCodepoints(text);
    const buffer = new TextBuffer(codepoints.length + extraCapacity);
    buffer.append(codepoints);
    return buffer;
  }

  /** Number of valid codepoints. */
  get length(): CodepointOffset {
    return codepointOffset(this.used);
  }

  get capacity(): number {
    return this.slots.length;
  }

  /**
   * Current backing array. Replaced on reallocation; compare
   * `storageIdentity()` before trusting a previously captured reference.
   */
  get storage(): Uint32Array {
    return this.slots;
  }

  /**
   * Token that changes exactly when the storage is reallocated.
   */
  storageIdentity(): Generation {
    return this.gen;
  }

  /**
   * Append a string, a single codepoint, or a codepoint sequence.
   * Returns the number of codepoints appended.
   */
  append(input: BufferInput): number {
    const data = typeof input === 'string' ? toCodepoints(input) : typeof input === 'number' ? [input] : input;
    for (const cp of data) {
      if (!isCodepoint(cp)) {
        throw new RangeError(`Invalid codepoint: ${cp}`);
      }
    }
    this.reserve(this.used + data.length);
    this.slots.set(data, this.used);
    this.used += data.length;
    return data.length;
  }

  /**
   * Drop every codepoint at or after `offset`. Offsets past the end are a no-op.
   */
  truncate(offset: number): void {
    if (!isValidOffset(offset)) {
      throw new RangeError(`Invalid truncate offset: ${offset}`);
    }
    this.used = Math.min(this.used, offset);
  }

  codepointAt(offset: number): number | undefined {
    if (!isValidOffset(offset) || offset >= this.used) return undefined;
    return this.slots[offset];
  }

  /**
   * Text in [start, end), clamped to the valid range.
   */
  slice(start: number = 0, end: number = this.used): string {
    const from = Math.max(0, Math.min(start, this.used));
    const to = Math.max(from, Math.min(end, this.used));
    return String.fromCodePoint(...this.slots.subarray(from, to));
  }

  toString(): string {
    return this.slice();
  }

  private reserve(required: number): void {
    if (required <= this.slots.length) return;
    const newSize = Math.max(this.slots.length * 2, required);
    const newSlots = new Uint32Array(newSize);
    newSlots.set(this.slots.subarray(0, this.used));
    this.slots = newSlots;
    this.gen = nextGeneration(this.gen);
  }
}

// =============================================================================
// Codepoint Helpers
// =============================================================================

export function toCodepoints(text: string): number[] {
  const result: number[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) result.push(cp);
  }
  return result;
}

export function codepointLength(text: string): number {
  let count = 0;
  for (const _ch of text) {
    count++;
  }
  return count;
}

function isCodepoint(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0x10ffff;
}
