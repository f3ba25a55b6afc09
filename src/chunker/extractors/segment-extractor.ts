/**
 * Segment Extractor
 *
 * Walks normalized markdown line by line and separates atomic blocks
 * from splittable text:
 * - Fenced code blocks (``` or ~~~) → atomic
 * - Pipe tables with a separator row → atomic
 * - Everything else → plain text for the recursive splitter
 */

import { FENCE_RE, TABLE_ROW_RE, TABLE_SEPARATOR_RE } from '../config.js';
import type { Segment } from '../types.js';

/**
 * Split document text into ordered segments.
 *
 * Runs of `|` lines without a separator row are pipe-delimited prose,
 * not tables, and are folded back into the surrounding text.
 *
 * @param text - Normalized document content
 * @returns Segments in document order. Whitespace-only text between
 *   blocks produces no segment.
 */
export function extractSegments(text: string): Segment[] {
  const segments: Segment[] = [];
  const lines = text.split('\n');
  let pending: string[] = [];
  let i = 0;

  const flush = (): void => {
    const joined = pending.join('\n');
    if (joined.trim()) {
      segments.push({ text: joined, isAtomic: false });
    }
    pending = [];
  };

  while (i < lines.length) {
    const line = lines[i] ?? '';

    const fence = FENCE_RE.exec(line);
    if (fence?.[1]) {
      flush();
      const marker = fence[1];
      const closing = new RegExp(`^${escapeRegExp(marker.charAt(0))}{${marker.length},}$`);
      const block = [line];
      i++;

      // An unterminated fence runs to the end of the document
      while (i < lines.length) {
        const inner = lines[i] ?? '';
        block.push(inner);
        i++;
        if (closing.test(inner)) break;
      }

      segments.push({ text: block.join('\n'), isAtomic: true });
      continue;
    }

    if (TABLE_ROW_RE.test(line)) {
      const rows = [line];
      i++;
      while (i < lines.length && TABLE_ROW_RE.test(lines[i] ?? '')) {
        rows.push(lines[i] ?? '');
        i++;
      }

      const table = rows.join('\n');
      if (TABLE_SEPARATOR_RE.test(table)) {
        flush();
        segments.push({ text: table, isAtomic: true });
      } else {
        pending.push(...rows);
      }
      continue;
    }

    pending.push(line);
    i++;
  }

  flush();
  return segments;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
