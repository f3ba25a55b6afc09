/**
 * Chunker
 *
 * Main orchestration for the chunking pipeline.
 *
 * Architecture:
 * 1. Document → trimmed content
 * 2. Extract segments (fenced code and tables are atomic)
 * 3. Recursively split non-atomic segments within the token budget
 * 4. Add overlap between consecutive chunks, skipping atomic ones
 * 5. Merge chunks below the minimum size into neighbors
 * 6. Per fragment: page number, section path, token count, content
 *    type and ID → Chunk
 *
 * Everything runs synchronously and in memory. The tokenizer is the
 * only shared resource; each call owns its own SectionPathTracker.
 */

import { createHash } from 'node:crypto';

import type { Chunk, ChunkConfig, ChunkMetadata, Chunker, Document } from './types.js';
import { SEPARATORS, PAGE_MARKER_RE, PAGE_MARKER_STRIP_RE } from './config.js';
import { extractSegments } from './extractors/index.js';
import { recursiveSplit } from './splitter.js';
import { applyOverlap } from './overlap.js';
import { mergeSmallChunks } from './merger.js';
import { SectionPathTracker } from './section-tracker.js';
import { classifyContent } from './classifier.js';
import { getDefaultTokenizer, type Tokenizer } from './tokenizer.js';
import { resolveChunkConfig } from '../config/loader.js';
import { ChunkError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

/**
 * Options for constructing a MarkdownChunker.
 */
export interface MarkdownChunkerOptions {
  /**
   * Tokenizer for budgets and overlap.
   * Defaults to the shared cl100k_base tokenizer.
   */
  tokenizer?: Tokenizer;

  /** Receives one info line per document and one error line per failure */
  logger?: Logger;
}

/**
 * Recursive markdown-aware chunker with token counting.
 *
 * - Tables and fenced code blocks are never split
 * - Heading boundaries are preferred split points
 * - Consecutive chunks overlap by a configurable number of tokens
 * - Each chunk records its heading path and content type
 *
 * @example
 * ```typescript
 * const chunker = new MarkdownChunker({ tokenizer: createTokenizer() });
 * const chunks = chunker.chunk(
 *   { doc_id: 'rm0090', content, doc_type: 'pdf', chip: 'STM32F407' },
 *   { max_tokens: 256 }
 * );
 * ```
 */
export class MarkdownChunker implements Chunker {
  /** Separators in priority order */
  static readonly SEPARATORS: readonly string[] = SEPARATORS;

  private readonly tokenizer: Tokenizer;
  private readonly logger: Logger;

  constructor(options: MarkdownChunkerOptions = {}) {
    this.tokenizer = options.tokenizer ?? getDefaultTokenizer();
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Split a document into chunks.
   *
   * @throws ValidationError if the config is invalid (before any work)
   * @throws ChunkError on any failure while chunking
   */
  chunk(document: Document, config: Partial<ChunkConfig> = {}): Chunk[] {
    const resolved = resolveChunkConfig(config);

    try {
      return this.chunkDocument(document, resolved);
    } catch (error) {
      if (error instanceof ChunkError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to chunk document ${document.doc_id}: ${message}`);
      throw new ChunkError(document.doc_id, error);
    }
  }

  private chunkDocument(document: Document, config: ChunkConfig): Chunk[] {
    const content = document.content.trim();
    if (!content) {
      return [];
    }

    const { max_tokens: maxTokens, overlap_tokens: overlapTokens, min_tokens: minTokens } = config;

    // Leave room for the overlap prefix so overlapped chunks stay within maxTokens
    const splitBudget = overlapTokens > 0 ? Math.max(maxTokens - overlapTokens, 1) : maxTokens;

    const rawChunks: string[] = [];
    const atomicIndices = new Set<number>();

    for (const segment of extractSegments(content)) {
      const text = segment.text.trim();
      if (!text) continue;

      if (segment.isAtomic) {
        // Atomic blocks pass through whole, even above the budget
        atomicIndices.add(rawChunks.length);
        rawChunks.push(text);
      } else {
        rawChunks.push(...recursiveSplit(text, splitBudget, this.tokenizer));
      }
    }

    const overlapped = applyOverlap(rawChunks, overlapTokens, this.tokenizer, atomicIndices);
    const merged = mergeSmallChunks(overlapped, minTokens, maxTokens, this.tokenizer);

    const tracker = new SectionPathTracker();
    const chunks: Chunk[] = [];

    merged.forEach((fragment, index) => {
      const trimmed = fragment.trim();
      if (!trimmed) return;

      const page = extractPageNumber(trimmed);
      const text = stripPageMarkers(trimmed);
      if (!text) return;

      tracker.update(text);

      const metadata: ChunkMetadata = Object.freeze({
        doc_id: document.doc_id,
        doc_type: document.doc_type,
        chip: document.chip,
        section_path: tracker.path,
        page,
        content_type: classifyContent(text),
      });

      chunks.push(
        Object.freeze({
          chunk_id: generateChunkId(document.doc_id, index, text),
          content: text,
          token_count: this.tokenizer.count(text),
          metadata,
        })
      );
    });

    this.logger.info?.(
      `Chunked ${document.doc_id} into ${chunks.length} chunks ` +
        `(max_tokens=${maxTokens}, overlap=${overlapTokens})`
    );

    return chunks;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Page number from the first `<!-- PAGE:N -->` marker, or 0.
 */
export function extractPageNumber(text: string): number {
  const match = PAGE_MARKER_RE.exec(text);
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Remove every page marker (and the newline after it), then trim.
 */
export function stripPageMarkers(text: string): string {
  return text.replace(PAGE_MARKER_STRIP_RE, '').trim();
}

/**
 * Deterministic chunk ID: `{docId}_chunk_{index:04d}_{sha256[:8]}`.
 *
 * `index` is the fragment's position before empty fragments are
 * dropped, so IDs can skip numbers but never repeat.
 */
export function generateChunkId(docId: string, index: number, content: string): string {
  const hash = createHash('sha256').update(content, 'utf8').digest('hex').slice(0, 8);
  return `${docId}_chunk_${String(index).padStart(4, '0')}_${hash}`;
}

/**
 * Create a chunker.
 */
export function createChunker(options: MarkdownChunkerOptions = {}): MarkdownChunker {
  return new MarkdownChunker(options);
}

/**
 * Chunk one document with the shared tokenizer and console logging.
 */
export function chunkDocument(document: Document, config: Partial<ChunkConfig> = {}): Chunk[] {
  return new MarkdownChunker().chunk(document, config);
}
