/**
 * Tokenizer
 *
 * Token counting and encoding for the chunk budget. Backed by the
 * cl100k_base BPE vocabulary from gpt-tokenizer.
 *
 * A tokenizer is a plain value with no mutable state, so one instance
 * can be shared by every chunker in the process.
 */

import { encode, decode } from 'gpt-tokenizer/encoding/cl100k_base';

/**
 * Subword tokenizer used to measure and cut chunk text.
 */
export interface Tokenizer {
  /** Number of tokens in `text` (0 for the empty string) */
  count(text: string): number;
  encode(text: string): number[];
  decode(tokens: readonly number[]): string;
}

/**
 * Create a cl100k_base tokenizer.
 *
 * @example
 * ```typescript
 * const tokenizer = createTokenizer();
 * tokenizer.count('hello world'); // 2
 * ```
 */
export function createTokenizer(): Tokenizer {
  return Object.freeze({
    count(text: string): number {
      if (!text) return 0;
      return encode(text).length;
    },
    encode(text: string): number[] {
      return encode(text);
    },
    decode(tokens: readonly number[]): string {
      return decode([...tokens]);
    },
  });
}

let defaultTokenizer: Tokenizer | null = null;

/**
 * Shared tokenizer for chunkers constructed without one.
 * Built on first use.
 */
export function getDefaultTokenizer(): Tokenizer {
  if (!defaultTokenizer) {
    defaultTokenizer = createTokenizer();
  }
  return defaultTokenizer;
}
