/**
 * hwdoc-chunker - Library Entry Point
 *
 * Boundary-aware chunking for hardware documentation (datasheets,
 * reference manuals, register maps) that has already been normalized
 * to markdown by a format parser.
 *
 * @example Chunk a document
 * ```typescript
 * import { MarkdownChunker, createTokenizer } from 'hwdoc-chunker';
 *
 * const chunker = new MarkdownChunker({ tokenizer: createTokenizer() });
 * const chunks = chunker.chunk({
 *   doc_id: 'stm32f407_rm',
 *   content: markdown,
 *   doc_type: 'pdf',
 *   chip: 'STM32F407',
 * });
 * ```
 *
 * @example Use the [chunk] table of a project config
 * ```typescript
 * import { loadConfig, chunkDocument } from 'hwdoc-chunker';
 *
 * const config = loadConfig('.rag/config.toml');
 * const chunks = chunkDocument(document, config.chunk);
 * ```
 *
 * @packageDocumentation
 */

// Chunking engine
export {
  MarkdownChunker,
  createChunker,
  chunkDocument,
  extractSegments,
  recursiveSplit,
  hardSplit,
  applyOverlap,
  mergeSmallChunks,
  SectionPathTracker,
  classifyContent,
  CONTENT_TYPES,
  CLASSIFICATION_RULES,
  extractPageNumber,
  stripPageMarkers,
  generateChunkId,
  createTokenizer,
  getDefaultTokenizer,
  SEPARATORS,
} from './chunker/index.js';

export type {
  Chunk,
  ChunkConfig,
  ChunkMetadata,
  Chunker,
  ContentType,
  Document,
  Segment,
  ClassificationRule,
  MarkdownChunkerOptions,
  Tokenizer,
} from './chunker/index.js';

// Configuration
export {
  ConfigSchema,
  ChunkConfigSchema,
  DEFAULT_CHUNK_CONFIG,
  CONFIG_TEMPLATE,
  loadConfig,
  resolveChunkConfig,
} from './config/index.js';
export type { Config, ConfigInput } from './config/index.js';

// Errors
export {
  ChunkerLibError,
  ChunkError,
  ConfigError,
  FileNotFoundError,
  ValidationError,
} from './errors/index.js';

// Logging
export { consoleLogger, silentLogger } from './utils/index.js';
export type { Logger } from './utils/index.js';
