/**
 * Test Utilities - Recording Logger
 *
 * Logger that keeps every message so tests can assert on log output.
 */

import type { Logger } from '../utils/logger.js';

export interface RecordingLogger extends Logger {
  readonly errors: string[];
  readonly warnings: string[];
  readonly infos: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const errors: string[] = [];
  const warnings: string[] = [];
  const infos: string[] = [];

  return {
    errors,
    warnings,
    infos,
    error: (message: string) => errors.push(message),
    warn: (message: string) => warnings.push(message),
    info: (message: string) => infos.push(message),
  };
}
