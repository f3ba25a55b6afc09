/**
 * Content Type Classifier
 *
 * Assigns each chunk one label from the hardware documentation taxonomy
 * using an ordered list of structural and keyword rules. The first rule
 * that matches wins, so the order below is part of the behavior: errata
 * beats register_description when both keyword families appear, and
 * any table outranks the prose families.
 */

import { FENCE_RE, HEADING_LINE_RE, TABLE_SEPARATOR_RE } from './config.js';
import type { ContentType } from './types.js';

/**
 * Every content type label, including the reserved `api_reference`.
 */
export const CONTENT_TYPES: ReadonlySet<ContentType> = new Set<ContentType>([
  'code',
  'register_table',
  'register_description',
  'timing_spec',
  'config_procedure',
  'errata',
  'pin_mapping',
  'electrical_spec',
  'api_reference',
  'table',
  'section',
  'prose',
]);

// ============================================================================
// Keyword families
// ============================================================================

const REGISTER_KW_RE =
  /\b(?:register|offset|reset\s*value|bit\s*field|read[/\s-]write|read[/\s-]only|write[/\s-]only|base\s*address)\b|0x[0-9A-Fa-f]{8}/i;

const TIMING_KW_RE =
  /\b\d+\s*(?:ns|µs|us|ms|MHz|kHz|GHz)\b|\b(?:setup\s*time|hold\s*time|propagation\s*delay|clock\s*(?:speed|frequency|period)|baud\s*rate)\b/i;

const CONFIG_PROCEDURE_KW_RE =
  /\b(?:step\s*\d|initialization\s*sequence|programming\s*procedure|following\s*steps|must\s*be\s*set|should\s*be\s*configured)\b/i;

const ERRATA_KW_RE =
  /\b(?:errat(?:a|um)|workaround|limitation|silicon\s*bug|advisory|known\s*issue)\b|ES\d{4}/i;

const PIN_MAPPING_KW_RE =
  /\b(?:alternate\s*function|AF\d+|pin\s*(?:mapping|assignment|configuration)|remap)\b|\bGPIO[A-Z]\d*\b/i;

// Unit symbols like Ω are not word characters for \b, hence the look-ahead
const ELECTRICAL_KW_RE =
  /\b\d+\.?\d*\s*(?:mA|µA|uA|kΩ)(?![\p{L}\p{N}_])|\b(?:power\s*supply|current\s*consumption|voltage\s*(?:range|level))\b|\bV(?:DD|CC|SS|DDA|BAT|REF)\b/iu;

// ============================================================================
// Rule cascade
// ============================================================================

/**
 * One step of the cascade: a predicate over chunk text and the label it
 * assigns.
 */
export interface ClassificationRule {
  readonly label: ContentType;
  readonly matches: (text: string) => boolean;
}

const isTable = (text: string): boolean => TABLE_SEPARATOR_RE.test(text);

const tableWith =
  (keywords: RegExp) =>
  (text: string): boolean =>
    isTable(text) && keywords.test(text);

const has =
  (pattern: RegExp) =>
  (text: string): boolean =>
    pattern.test(text);

/**
 * Rules in priority order. Text matching none of them is `prose`.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  // 1. Fenced code
  { label: 'code', matches: has(FENCE_RE) },

  // 2. Tables, refined by keyword family
  { label: 'register_table', matches: tableWith(REGISTER_KW_RE) },
  { label: 'pin_mapping', matches: tableWith(PIN_MAPPING_KW_RE) },
  { label: 'electrical_spec', matches: tableWith(ELECTRICAL_KW_RE) },
  { label: 'timing_spec', matches: tableWith(TIMING_KW_RE) },
  { label: 'table', matches: isTable },

  // 3. Prose keyword families
  { label: 'errata', matches: has(ERRATA_KW_RE) },
  { label: 'config_procedure', matches: has(CONFIG_PROCEDURE_KW_RE) },
  { label: 'register_description', matches: has(REGISTER_KW_RE) },
  { label: 'timing_spec', matches: has(TIMING_KW_RE) },
  { label: 'pin_mapping', matches: has(PIN_MAPPING_KW_RE) },
  { label: 'electrical_spec', matches: has(ELECTRICAL_KW_RE) },

  // 4. Structural fallback
  { label: 'section', matches: has(HEADING_LINE_RE) },
];

/**
 * Classify chunk text. Pure: the same text always gets the same label.
 *
 * @example
 * ```typescript
 * classifyContent('| Register | Offset |\n|---|---|\n| CR1 | 0x00 |'); // 'register_table'
 * classifyContent('Just some text.'); // 'prose'
 * ```
 */
export function classifyContent(text: string): ContentType {
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.matches(text)) {
      return rule.label;
    }
  }
  return 'prose';
}
