/**
 * Small Chunk Merger
 *
 * Folds chunks below the minimum size into a neighbor, as long as the
 * merged text still fits the maximum budget.
 */

import type { Tokenizer } from './tokenizer.js';

const MERGE_SEPARATOR = '\n\n';

/**
 * Merge chunks smaller than `minTokens` with their neighbors.
 *
 * Scans left to right: an undersized accumulator absorbs the next chunk
 * when the result fits `maxTokens`. A trailing undersized chunk is
 * merged backward into the previous output when it fits, and otherwise
 * kept as is, so the last chunk may stay below `minTokens`.
 *
 * @param chunks - Chunk texts in document order
 * @param minTokens - Size below which a chunk is merged; 0 or less disables merging
 * @param maxTokens - Budget a merged chunk must stay within
 * @param tokenizer - Tokenizer used for counting
 * @returns New list of chunk texts
 */
export function mergeSmallChunks(
  chunks: readonly string[],
  minTokens: number,
  maxTokens: number,
  tokenizer: Tokenizer
): string[] {
  if (chunks.length === 0 || minTokens <= 0) {
    return [...chunks];
  }

  const result: string[] = [];
  let current = '';

  for (const chunk of chunks) {
    if (!current) {
      current = chunk;
      continue;
    }

    if (tokenizer.count(current) < minTokens) {
      const merged = current + MERGE_SEPARATOR + chunk;
      if (tokenizer.count(merged) <= maxTokens) {
        current = merged;
        continue;
      }
    }

    result.push(current);
    current = chunk;
  }

  if (current) {
    const last = result.length - 1;
    const previous = result[last];
    if (previous !== undefined && tokenizer.count(current) < minTokens) {
      const merged = previous + MERGE_SEPARATOR + current;
      if (tokenizer.count(merged) <= maxTokens) {
        result[last] = merged;
        return result;
      }
    }
    result.push(current);
  }

  return result;
}
