/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Injected logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';
