/**
 * Error handling module
 *
 * Custom error classes for the chunking library. Every error carries a
 * recovery hint and a numeric code identifying its kind.
 *
 * Usage:
 *   import { ChunkError } from './errors/index.js';
 *
 *   try {
 *     chunker.chunk(document);
 *   } catch (error) {
 *     if (error instanceof ChunkError) logger.error(error.message);
 *   }
 */

export {
  ChunkerLibError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  ChunkError,
} from './types.js';
