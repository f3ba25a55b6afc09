/**
 * Recursive Splitter
 *
 * Splits a non-atomic segment into pieces that fit a token budget,
 * trying structural separators from coarsest (H1 headings) to finest
 * (single spaces). When no separator helps, the text is cut into the
 * longest runs of characters that fit.
 *
 * Recursion walks an index into SEPARATORS instead of slicing the list,
 * so depth is bounded by the separator count plus the fan-out of parts
 * that are still oversized.
 */

import { HEADING_SPLIT_PATTERNS, SEPARATORS } from './config.js';
import type { Tokenizer } from './tokenizer.js';

/**
 * Split text into pieces of at most `maxTokens` tokens.
 *
 * @param text - Text to split (never an atomic block)
 * @param maxTokens - Token budget per piece
 * @param tokenizer - Tokenizer used for counting and hard splits
 * @param separators - Separators in priority order
 * @returns Pieces in document order
 * @throws RangeError if maxTokens is below 1
 *
 * @example
 * ```typescript
 * const pieces = recursiveSplit(sectionText, 462, tokenizer);
 * ```
 */
export function recursiveSplit(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer,
  separators: readonly string[] = SEPARATORS
): string[] {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new RangeError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
  return splitFrom(text, maxTokens, tokenizer, separators, 0);
}

function splitFrom(
  text: string,
  maxTokens: number,
  tokenizer: Tokenizer,
  separators: readonly string[],
  index: number
): string[] {
  if (tokenizer.count(text) <= maxTokens) {
    return [text];
  }

  const separator = separators[index];
  if (separator === undefined) {
    return hardSplit(text, maxTokens, tokenizer);
  }

  const headingPattern = HEADING_SPLIT_PATTERNS[separator];
  const parts = (headingPattern ? text.split(headingPattern) : text.split(separator)).filter(
    (part) => part.trim().length > 0
  );

  if (parts.length <= 1) {
    return splitFrom(text, maxTokens, tokenizer, separators, index + 1);
  }

  // Heading parts still carry their heading line, so a newline is enough to rejoin
  const rejoin = headingPattern ? '\n' : separator;
  const result: string[] = [];
  let current = '';

  for (const part of parts) {
    const candidate = current ? current + rejoin + part : part;
    if (tokenizer.count(candidate) <= maxTokens) {
      current = candidate;
      continue;
    }

    if (current) {
      result.push(current);
    }

    if (tokenizer.count(part) > maxTokens) {
      result.push(...splitFrom(part, maxTokens, tokenizer, separators, index + 1));
      current = '';
    } else {
      current = part;
    }
  }

  if (current) {
    result.push(current);
  }

  return result;
}

/**
 * Cut text into consecutive pieces of at most `maxTokens` tokens.
 *
 * Pieces end on character boundaries and are re-counted, since a
 * substring can encode to more tokens than the span it was cut from
 * (multibyte scripts such as CJK). Joining the pieces gives back `text`.
 * A single character wider than the budget becomes a piece on its own.
 */
export function hardSplit(text: string, maxTokens: number, tokenizer: Tokenizer): string[] {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new RangeError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
  const chars = Array.from(text);
  const result: string[] = [];

  let start = 0;
  while (start < chars.length) {
    const end = fittingEnd(chars, start, maxTokens, tokenizer);
    result.push(chars.slice(start, end).join(''));
    start = end;
  }

  return result;
}

/**
 * End of the longest run of characters from `start` that fits the
 * budget. Always advances by at least one character.
 */
function fittingEnd(
  chars: readonly string[],
  start: number,
  maxTokens: number,
  tokenizer: Tokenizer
): number {
  const fits = (end: number): boolean =>
    tokenizer.count(chars.slice(start, end).join('')) <= maxTokens;

  // Grow the window until it overflows, then binary search the boundary
  let low = start + 1;
  let span = maxTokens;
  let high = Math.min(start + span, chars.length);
  while (fits(high)) {
    if (high === chars.length) return high;
    low = high;
    span *= 2;
    high = Math.min(start + span, chars.length);
  }

  while (high - low > 1) {
    const mid = Math.floor((low + high) / 2);
    if (fits(mid)) {
      low = mid;
    } else {
      high = mid;
    }
  }

  return low;
}
