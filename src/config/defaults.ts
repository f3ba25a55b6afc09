/**
 * Default Configuration Values
 *
 * Used when a config file has no [chunk] table or leaves fields out,
 * and when a chunker is called without a config.
 */

import type { ChunkConfig } from '../chunker/types.js';

/**
 * Default token budget
 */
export const DEFAULT_CHUNK_CONFIG: ChunkConfig = Object.freeze({
  max_tokens: 512,
  overlap_tokens: 50,
  min_tokens: 50,
});

/**
 * Config file template (TOML format) for the [chunk] table
 */
export const CONFIG_TEMPLATE = `# Chunking Settings
# Token counts use the cl100k_base vocabulary.
# Tables and fenced code blocks are never split, even above max_tokens.
[chunk]
max_tokens = ${DEFAULT_CHUNK_CONFIG.max_tokens}
overlap_tokens = ${DEFAULT_CHUNK_CONFIG.overlap_tokens}
min_tokens = ${DEFAULT_CHUNK_CONFIG.min_tokens}
`;
