/**
 * Extractors
 *
 * Turn normalized document text into segments ready for splitting.
 */

export { extractSegments } from './segment-extractor.js';
