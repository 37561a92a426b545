/**
 * Tests for the incremental markdown scanner.
 */

import { describe, it, expect } from 'vitest';
import { advance, createScannerState } from './scanner.ts';
import { formatSpans } from './serialize.ts';
import { createAttributeSpanList, findSpanInvariantViolations } from '../core/span-list.ts';
import { createPositionCache } from '../core/position-cache.ts';
import { TextBuffer } from '../core/text-buffer.ts';

const PARKED = ['0 0 compose-underline', '0 0 cursor-alpha'];

function createFixture(capacity: number = 16) {
  const buffer = new TextBuffer(capacity);
  const list = createAttributeSpanList();
  const state = createScannerState();
  const cache = createPositionCache();
  return {
    buffer,
    list,
    state,
    cache,
    type(text: string) {
      buffer.append(text);
      return advance(state, list, buffer, cache);
    },
  };
}

describe('advance', () => {
  it('should consume plain text without adding spans', () => {
    const fx = createFixture();
    const outcome = fx.type('hello beaſts!');

    expect(outcome).toEqual({ ok: true, value: { consumed: 13, opened: 0, closed: 0 } });
    expect(fx.state.position).toBe(13);
    expect(fx.state.previous).toBe(12);
    expect(formatSpans(fx.list)).toEqual(PARKED);
  });

  describe('italic', () => {
    it.each([
      ['hello _world_!', '6 13 italic'],
      ['_hello_ world!', '0 7 italic'],
      ['hello world_!_', '11 14 italic'],
    ])('should close %s', (text, expected) => {
      const fx = createFixture();
      fx.type(text);
      expect(fx.state.openItalic).toBeNull();
      expect(formatSpans(fx.list)).toEqual([...PARKED, expected]);
    });

    it('should leave an unterminated italic open to the end of the text', () => {
      const fx = createFixture();
      fx.type('hello _wor');
      expect(fx.state.position).toBe(10);
      expect(fx.state.openItalic).not.toBeNull();
      expect(formatSpans(fx.list)).toEqual([...PARKED, '6 end italic']);
    });

    it('should include both delimiters in the span', () => {
      const fx = createFixture();
      fx.type('_it_');
      expect(formatSpans(fx.list)).toEqual([...PARKED, '0 4 italic']);
    });
  });

  describe('bold', () => {
    it.each([
      ['hello **world**!', '6 15 bold'],
      ['**hello** world!', '0 9 bold'],
      ['hello world**!**', '11 16 bold'],
    ])('should close %s', (text, expected) => {
      const fx = createFixture();
      fx.type(text);
      expect(fx.state.openBold).toBeNull();
      expect(formatSpans(fx.list)).toEqual([...PARKED, expected]);
    });

    it('should backdate the start to the first asterisk of the pair', () => {
      const fx = createFixture();
      fx.type('**bold**');
      expect(formatSpans(fx.list)).toEqual([...PARKED, '0 8 bold']);
    });

    it('should ignore single asterisks', () => {
      const fx = createFixture();
      const outcome = fx.type('*a*');
      expect(outcome.ok && outcome.value.opened).toBe(0);
      expect(fx.state.openBold).toBeNull();
      expect(formatSpans(fx.list)).toEqual(PARKED);
    });

    it('should recognize a pair split across two calls', () => {
      const fx = createFixture();
      fx.type('x*');
      expect(fx.state.openBold).toBeNull();
      fx.type('*');
      expect(fx.state.openBold).not.toBeNull();
      expect(formatSpans(fx.list)).toEqual([...PARKED, '1 end bold']);
    });

    it('should treat every asterisk after another as a delimiter', () => {
      const fx = createFixture();
      fx.type('****');
      expect(formatSpans(fx.list)).toEqual([...PARKED, '0 3 bold', '2 end bold']);
    });
  });

  describe('nesting', () => {
    it.each([
      ['hello **w_orl_d**!', ['6 17 bold', '9 14 italic']],
      ['_**hello**_ world!', ['0 11 italic', '1 10 bold']],
    ])('should track bold and italic independently in %s', (text, expected) => {
      const fx = createFixture();
      fx.type(text);
      expect(formatSpans(fx.list)).toEqual([...PARKED, ...expected]);
    });

    it('should count codepoints in multibyte text', () => {
      const fx = createFixture();
      fx.type('**½** — Behold _the☃ beaſts!_ — _«**Pay attention ☭ now!**»_');
      expect(formatSpans(fx.list)).toEqual([
        ...PARKED,
        '0 5 bold',
        '15 29 italic',
        '32 60 italic',
        '34 58 bold',
      ]);
      expect(findSpanInvariantViolations(fx.list)).toEqual([]);
    });
  });

  describe('incremental scanning', () => {
    it('should only consume what was appended since the last call', () => {
      const fx = createFixture();
      expect(fx.type('ab**')).toEqual({ ok: true, value: { consumed: 4, opened: 1, closed: 0 } });
      expect(advance(fx.state, fx.list, fx.buffer, fx.cache)).toEqual({
        ok: true,
        value: { consumed: 0, opened: 0, closed: 0 },
      });
      expect(fx.type('c**')).toEqual({ ok: true, value: { consumed: 3, opened: 0, closed: 1 } });
      expect(formatSpans(fx.list)).toEqual([...PARKED, '2 7 bold']);
    });

    it('should keep scanning correctly across reallocations', () => {
      const fx = createFixture(2);
      fx.type('**');
      fx.type('bold**');
      expect(fx.buffer.storageIdentity()).toBe(1);
      expect(fx.cache.rederivations).toBe(2);
      expect(formatSpans(fx.list)).toEqual([...PARKED, '0 8 bold']);
    });
  });

  describe('contract checks', () => {
    it('should refuse a position beyond the buffer and change nothing', () => {
      const fx = createFixture();
      fx.type('_abc');
      fx.buffer.truncate(2);

      const outcome = advance(fx.state, fx.list, fx.buffer, fx.cache);
      expect(outcome).toEqual({
        ok: false,
        defect: { kind: 'position-beyond-buffer', message: 'Scanner position 4 is beyond buffer length 2' },
      });
      expect(fx.state.position).toBe(4);
      expect(formatSpans(fx.list)).toEqual([...PARKED, '0 end italic']);
    });
  });
});
