/**
 * Chunker Types
 *
 * Data contracts for the chunking engine:
 *   Document → Segment[] → string[] → Chunk[]
 *
 * Field names are snake_case because the same shapes are written to
 * TOML config files and used as storage keys downstream.
 */

/**
 * Content type taxonomy for hardware documentation chunks.
 *
 * `api_reference` is reserved: the classifier never produces it, a
 * C header parser is expected to assign it instead.
 */
export type ContentType =
  | 'code'
  | 'register_table'
  | 'register_description'
  | 'timing_spec'
  | 'config_procedure'
  | 'errata'
  | 'pin_mapping'
  | 'electrical_spec'
  | 'api_reference'
  | 'table'
  | 'section'
  | 'prose';

/**
 * A normalized document handed over by a format parser.
 *
 * `content` is markdown: headings, fenced blocks, pipe tables and
 * optional `<!-- PAGE:N -->` markers from PDF extraction.
 */
export interface Document {
  readonly doc_id: string;
  readonly content: string;
  readonly doc_type: string;
  readonly chip: string;
}

/**
 * Token budget settings (the `[chunk]` table of the project config).
 */
export interface ChunkConfig {
  /** Upper bound on tokens per chunk (atomic blocks excepted) */
  readonly max_tokens: number;
  /** Tokens copied from the end of one chunk to the start of the next */
  readonly overlap_tokens: number;
  /** Chunks below this size are merged into a neighbor when possible */
  readonly min_tokens: number;
}

/**
 * A run of document text. Atomic segments (fenced code blocks and real
 * tables) are never split.
 */
export interface Segment {
  text: string;
  isAtomic: boolean;
}

/**
 * Retrieval metadata attached to every chunk.
 */
export interface ChunkMetadata {
  readonly doc_id: string;
  readonly doc_type: string;
  readonly chip: string;
  /** Active heading titles joined with " > " */
  readonly section_path: string;
  /** First page marker seen in the chunk, 0 when there is none */
  readonly page: number;
  readonly content_type: ContentType;
}

/**
 * A bounded-size fragment of a document, ready for embedding.
 */
export interface Chunk {
  /** `{doc_id}_chunk_{index:04d}_{sha256[:8]}`, used as the storage key */
  readonly chunk_id: string;
  readonly content: string;
  readonly token_count: number;
  readonly metadata: ChunkMetadata;
}

/**
 * A chunking strategy.
 *
 * Implementations must be synchronous and free of I/O so that documents
 * can be chunked from parallel workers.
 */
export interface Chunker {
  /**
   * Split a document into chunks.
   *
   * @param document - Normalized document to chunk
   * @param config - Token budget overrides; missing fields use defaults
   * @throws ChunkError on any internal failure
   * @throws ValidationError when the config is invalid
   */
  chunk(document: Document, config?: Partial<ChunkConfig>): Chunk[];
}
