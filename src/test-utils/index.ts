/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { charTokenizer } from '../../test-utils/index.js';
 *
 * const chunker = new MarkdownChunker({ tokenizer: charTokenizer, logger: silentLogger });
 * ```
 */

export { charTokenizer } from './char-tokenizer.js';
export { createRecordingLogger, type RecordingLogger } from './recording-logger.js';
