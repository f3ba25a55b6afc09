/**
 * Test Utilities - Character Tokenizer
 *
 * One token per Unicode code point, so token counts in tests equal
 * string lengths and expected chunk boundaries can be computed by hand.
 */

import type { Tokenizer } from '../chunker/tokenizer.js';

export const charTokenizer: Tokenizer = Object.freeze({
  count: (text: string): number => Array.from(text).length,
  encode: (text: string): number[] => Array.from(text, (char) => char.codePointAt(0) ?? 0),
  decode: (tokens: readonly number[]): string => String.fromCodePoint(...tokens),
});
