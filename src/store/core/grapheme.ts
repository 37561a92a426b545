/**
 * Grapheme cluster helpers for retreating by user-perceived character.
 */

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: 'grapheme',
});

function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i += 1) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}

/**
 * Number of codepoints in the last grapheme cluster of `text`.
 * Returns 0 for empty text.
 */
export function lastGraphemeCodepointLength(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  if (isAsciiText(text)) {
    return 1;
  }

  let last = '';
  for (const segment of graphemeSegmenter.segment(text)) {
    last = segment.segment;
  }

  let count = 0;
  for (const _ch of last) {
    count += 1;
  }
  return count;
}
