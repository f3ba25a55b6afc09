/**
 * Chunker Module
 *
 * Public API for the chunking engine.
 *
 * @example
 * ```typescript
 * import { MarkdownChunker, createTokenizer } from './chunker/index.js';
 *
 * const chunker = new MarkdownChunker({ tokenizer: createTokenizer() });
 * const chunks = chunker.chunk(document, { max_tokens: 512 });
 * ```
 */

// Types
export type {
  Chunk,
  ChunkConfig,
  ChunkMetadata,
  Chunker,
  ContentType,
  Document,
  Segment,
} from './types.js';

// Orchestration
export {
  MarkdownChunker,
  createChunker,
  chunkDocument,
  extractPageNumber,
  stripPageMarkers,
  generateChunkId,
  type MarkdownChunkerOptions,
} from './chunker.js';

// Pipeline stages
export { extractSegments } from './extractors/index.js';
export { recursiveSplit, hardSplit } from './splitter.js';
export { applyOverlap } from './overlap.js';
export { mergeSmallChunks } from './merger.js';
export { SectionPathTracker } from './section-tracker.js';
export {
  classifyContent,
  CONTENT_TYPES,
  CLASSIFICATION_RULES,
  type ClassificationRule,
} from './classifier.js';

// Tokenizer
export { createTokenizer, getDefaultTokenizer, type Tokenizer } from './tokenizer.js';

// Configuration
export { SEPARATORS } from './config.js';
