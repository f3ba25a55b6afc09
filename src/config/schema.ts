/**
 * Configuration Schema
 *
 * Defines the shape of the [chunk] table of a project config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';
import { DEFAULT_CHUNK_CONFIG } from './defaults.js';

/**
 * Chunk budget configuration
 * Every field is optional in input; missing fields take the defaults
 */
export const ChunkConfigSchema = z.object({
  max_tokens: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_CHUNK_CONFIG.max_tokens)
    .describe('Maximum tokens per chunk (atomic tables and code blocks may exceed it)'),
  overlap_tokens: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CHUNK_CONFIG.overlap_tokens)
    .describe('Tokens repeated from the end of one chunk at the start of the next'),
  min_tokens: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CHUNK_CONFIG.min_tokens)
    .describe('Chunks below this size are merged into a neighbor when possible'),
});

/**
 * Root configuration schema
 * Only the [chunk] table belongs to this library; other tables of the
 * project config are stripped.
 */
export const ConfigSchema = z.object({
  chunk: ChunkConfigSchema.default({}),
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config as written in the file, before defaults are applied
 */
export type ConfigInput = z.input<typeof ConfigSchema>;
