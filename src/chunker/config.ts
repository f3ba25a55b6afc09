/**
 * Chunker Configuration
 *
 * Split separators and the markup patterns shared by the extractor,
 * splitter, section tracker and classifier.
 */

/**
 * Separators in priority order (first entry is tried first).
 *
 * The three heading entries are not split on literally: they select a
 * look-ahead pattern from HEADING_SPLIT_PATTERNS so the heading line
 * stays attached to the content that follows it.
 */
export const SEPARATORS: readonly string[] = [
  '\n# ', // H1 headings
  '\n## ', // H2 headings
  '\n### ', // H3 and deeper
  '\n\n', // Paragraph boundaries
  '\n', // Line breaks
  ' ', // Word boundaries
];

/**
 * Look-ahead split patterns for the heading separators.
 * Also match a heading at the very start of the text.
 */
export const HEADING_SPLIT_PATTERNS: Readonly<Record<string, RegExp>> = {
  '\n# ': /(?=(?:^|\n)# )/,
  '\n## ': /(?=(?:^|\n)## )/,
  '\n### ': /(?=(?:^|\n)###+ )/,
};

/** `# Title` through `###### Title` on its own line */
export const HEADING_RE = /^(#{1,6})[ \t]+(.+)$/gm;

/** Non-global form of HEADING_RE for presence checks */
export const HEADING_LINE_RE = /^#{1,6}[ \t]+.+$/m;

/** Opening of a fenced block: 3+ backticks or 3+ tildes */
export const FENCE_RE = /^(`{3,}|~{3,})/m;

/** A line that looks like a pipe table row */
export const TABLE_ROW_RE = /^\|.+\|$/;

/** Table separator row, e.g. `|---|:---:|` */
export const TABLE_SEPARATOR_RE = /^\|[\s:]*-+[\s:]*\|/m;

/** Page marker injected by the PDF parser: `<!-- PAGE:N -->` */
export const PAGE_MARKER_RE = /<!-- PAGE:(\d+) -->/;

/** Same marker plus its trailing newline, for stripping */
export const PAGE_MARKER_STRIP_RE = /<!-- PAGE:\d+ -->\n?/g;
