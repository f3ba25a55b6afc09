/**
 * Section Path Tracker
 *
 * Keeps a stack of active headings while chunks are emitted in
 * document order. Levels on the stack strictly increase from bottom to
 * top. One tracker belongs to one document; never share it.
 *
 * Only `#` heading lines count. Bold runs at body size are not promoted
 * to sub-headings: that signal proved too unreliable in PDF output.
 *
 * Lines are matched without regard to code fences, so a `# comment`
 * line inside a fenced shell or Python block also updates the path.
 */

import { HEADING_RE } from './config.js';

interface HeadingEntry {
  level: number;
  title: string;
}

export class SectionPathTracker {
  private readonly stack: HeadingEntry[] = [];

  /**
   * Current section path, e.g. `"SPI > Configuration > DMA"`.
   * Empty before the first heading.
   */
  get path(): string {
    return this.stack.map((entry) => entry.title).join(' > ');
  }

  /** Current depth of the heading stack */
  get depth(): number {
    return this.stack.length;
  }

  /**
   * Apply every heading in `text`, in order of appearance.
   *
   * Each heading pops entries at the same or a deeper level, then is
   * pushed itself.
   */
  update(text: string): void {
    for (const match of text.matchAll(HEADING_RE)) {
      const hashes = match[1] ?? '';
      const title = (match[2] ?? '').trim();
      const level = hashes.length;

      while (this.stack.length > 0 && (this.stack[this.stack.length - 1]?.level ?? 0) >= level) {
        this.stack.pop();
      }

      this.stack.push({ level, title });
    }
  }
}
