/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export { ConfigSchema, ChunkConfigSchema } from './schema.js';
export type { Config, ConfigInput } from './schema.js';

// Defaults
export { DEFAULT_CHUNK_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export { loadConfig, resolveChunkConfig } from './loader.js';
