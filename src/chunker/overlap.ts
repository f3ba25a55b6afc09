/**
 * Overlap Inserter
 *
 * Prepends the tail of each chunk to the next one so context survives
 * a split boundary.
 */

import type { Tokenizer } from './tokenizer.js';

/**
 * Add overlap from the end of each chunk to the start of the next.
 *
 * Atomic chunks (tables, code fences) never receive a prefix: they stay
 * byte-identical to the source block. The overlap always comes from the
 * previous chunk's own text, never from a prefix it received itself.
 * No overlap is added after a chunk of `overlapTokens` tokens or fewer.
 *
 * @param chunks - Raw chunk texts in document order
 * @param overlapTokens - Tokens to copy; 0 or less disables overlap
 * @param tokenizer - Tokenizer used to slice token tails
 * @param atomicIndices - Positions in `chunks` that hold atomic blocks
 * @returns New list with overlap applied
 */
export function applyOverlap(
  chunks: readonly string[],
  overlapTokens: number,
  tokenizer: Tokenizer,
  atomicIndices: ReadonlySet<number> = new Set()
): string[] {
  if (overlapTokens <= 0 || chunks.length <= 1) {
    return [...chunks];
  }

  const result: string[] = [];

  chunks.forEach((chunk, i) => {
    const previous = i > 0 ? chunks[i - 1] : undefined;
    if (previous === undefined || atomicIndices.has(i)) {
      result.push(chunk);
      return;
    }

    const previousTokens = tokenizer.encode(previous);
    if (previousTokens.length <= overlapTokens) {
      result.push(chunk);
      return;
    }

    const overlap = tokenizer.decode(previousTokens.slice(-overlapTokens));
    result.push(overlap + chunk);
  });

  return result;
}
