/**
 * Configuration Loader
 *
 * Handles the config lifecycle for the chunking library:
 * 1. Load config.toml from the given path
 * 2. Validate the [chunk] table with the Zod schema
 * 3. Fill missing fields from defaults
 * 4. Provide type-safe, frozen access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { ZodError } from 'zod';
import { ChunkConfigSchema, ConfigSchema, type Config } from './schema.js';
import type { ChunkConfig } from '../chunker/types.js';
import { ConfigError, FileNotFoundError, ValidationError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

/**
 * Load and validate a project config file.
 *
 * @param configPath - Path to config.toml
 * @param logger - Receives an info line once the file is loaded
 * @throws FileNotFoundError if the file does not exist
 * @throws ConfigError if the TOML is malformed or the [chunk] table is invalid
 */
export function loadConfig(configPath: string, logger: Logger = consoleLogger): Config {
  if (!fs.existsSync(configPath)) {
    throw new FileNotFoundError(configPath);
  }

  let parsed: unknown;
  try {
    parsed = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    logger.error(`Failed to load config from ${configPath}: ${message}`);
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = ConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error)
        .map((issue) => `  - ${issue}`)
        .join('\n')}`,
      `Fix the [chunk] table in ${configPath}`
    );
  }

  logger.info?.(`Loaded config from ${configPath}`);
  return Object.freeze({ chunk: Object.freeze(validationResult.data.chunk) });
}

/**
 * Merge chunk config overrides with the defaults and validate the result.
 *
 * @param overrides - Fields to override; undefined fields keep their default
 * @returns A complete, frozen chunk config
 * @throws ValidationError if any value is not a valid integer in range
 *
 * @example
 * ```typescript
 * resolveChunkConfig({ max_tokens: 256 });
 * // { max_tokens: 256, overlap_tokens: 50, min_tokens: 50 }
 * ```
 */
export function resolveChunkConfig(overrides: Partial<ChunkConfig> = {}): ChunkConfig {
  const validationResult = ChunkConfigSchema.safeParse(overrides);
  if (!validationResult.success) {
    throw new ValidationError('Invalid chunk configuration', formatIssues(validationResult.error));
  }
  return Object.freeze(validationResult.data);
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
