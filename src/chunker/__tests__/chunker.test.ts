/**
 * Chunker Module Tests
 *
 * End-to-end behavior of MarkdownChunker:
 * - Empty input, atomic blocks, heading splits and section paths
 * - Overlap, small chunk merging, page markers and chunk IDs
 * - Failure wrapping and logging
 *
 * Most cases inject the character tokenizer so expected chunk
 * boundaries are plain string lengths.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  MarkdownChunker,
  chunkDocument,
  createChunker,
  extractPageNumber,
  stripPageMarkers,
  generateChunkId,
  createTokenizer,
  type Document,
  type Tokenizer,
} from '../index.js';
import { ChunkError, ValidationError } from '../../errors/index.js';
import { silentLogger } from '../../utils/logger.js';
import { charTokenizer, createRecordingLogger } from '../../test-utils/index.js';

function makeDocument(content: string, overrides: Partial<Document> = {}): Document {
  return { doc_id: 'test_doc', content, doc_type: 'markdown', chip: '', ...overrides };
}

const charChunker = new MarkdownChunker({ tokenizer: charTokenizer, logger: silentLogger });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MarkdownChunker', () => {
  describe('empty input', () => {
    it('should return no chunks for empty content', () => {
      expect(charChunker.chunk(makeDocument(''))).toEqual([]);
    });

    it('should return no chunks for whitespace-only content', () => {
      expect(charChunker.chunk(makeDocument('  \n\t \n'))).toEqual([]);
    });
  });

  describe('single chunk', () => {
    it('should keep short content as one chunk with metadata', () => {
      const chunks = charChunker.chunk(
        makeDocument('  Plain text.  ', { doc_id: 'doc1', doc_type: 'pdf', chip: 'STM32F4' })
      );

      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toEqual({
        chunk_id: generateChunkId('doc1', 0, 'Plain text.'),
        content: 'Plain text.',
        token_count: 11,
        metadata: {
          doc_id: 'doc1',
          doc_type: 'pdf',
          chip: 'STM32F4',
          section_path: '',
          page: 0,
          content_type: 'prose',
        },
      });
    });

    it('should return frozen chunks', () => {
      const [chunk] = charChunker.chunk(makeDocument('Plain text.'));

      expect(Object.isFrozen(chunk)).toBe(true);
      expect(Object.isFrozen(chunk?.metadata)).toBe(true);
    });
  });

  describe('atomic blocks', () => {
    it('should emit a table as one chunk classified as table', () => {
      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(
        makeDocument('| A | B |\n|---|---|\n| 1 | 2 |\n')
      );

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe('| A | B |\n|---|---|\n| 1 | 2 |');
      expect(chunks[0]?.metadata.content_type).toBe('table');
    });

    it('should emit a fenced block as one chunk classified as code', () => {
      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(
        makeDocument('```c\nvoid init(void) { }\n```')
      );

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.metadata.content_type).toBe('code');
    });

    it('should classify a register table', () => {
      const table =
        '| Register | Offset | Reset | Access |\n' +
        '|----------|--------|-------|--------|\n' +
        '| CR1 | 0x00 | 0x0000 | RW |';

      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(makeDocument(table));

      expect(chunks[0]?.metadata.content_type).toBe('register_table');
    });

    it('should never split an oversized table', () => {
      const rows = Array.from(
        { length: 30 },
        (_, i) => `| REG${i} | 0x${(i * 4).toString(16).padStart(2, '0')} | 0x0000 | RW |`
      );
      const table = [
        '| Register | Offset | Reset | Access |',
        '|----------|--------|-------|--------|',
        ...rows,
      ].join('\n');

      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(makeDocument(table), {
        max_tokens: 50,
        overlap_tokens: 0,
      });

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe(table);
      expect(chunks[0]?.content).toContain('| REG0 | 0x00 |');
      expect(chunks[0]?.content).toContain('| REG29 | 0x74 |');
      expect(chunks[0]?.token_count).toBeGreaterThan(50);
    });

    it('should keep a table intact in exactly one chunk among prose', () => {
      const table =
        '| Register | Offset | Reset |\n' +
        '|----------|--------|-------|\n' +
        '| CR1      | 0x00   | 0x0000 |\n' +
        '| CR2      | 0x04   | 0x0000 |\n' +
        '| SR       | 0x08   | 0x0002 |\n' +
        '| DR       | 0x0C   | 0x0000 |';
      const content = `Some intro text.\n\n${table}\n\nSome outro text.`;

      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(makeDocument(content), {
        max_tokens: 50,
        overlap_tokens: 0,
      });

      expect(chunks.filter((c) => c.content.includes(table))).toHaveLength(1);
      expect(chunks.filter((c) => c.content.includes('| CR1'))).toHaveLength(1);
    });

    it('should not prefix an atomic block with overlap', () => {
      const chunks = charChunker.chunk(makeDocument('Intro paragraph here.\n\n```c\nint x;\n```'), {
        max_tokens: 100,
        overlap_tokens: 5,
        min_tokens: 0,
      });

      expect(chunks.map((c) => c.content)).toEqual([
        'Intro paragraph here.',
        '```c\nint x;\n```',
      ]);
      expect(chunks.map((c) => c.metadata.content_type)).toEqual(['prose', 'code']);
    });
  });

  describe('splitting', () => {
    it('should split at heading boundaries and track the section path', () => {
      const content =
        '# SPI\nSerial peripheral.\n## Config\nSet CPOL.\n## Registers\nCR1 and CR2.';

      const chunks = charChunker.chunk(makeDocument(content, { doc_id: 'spi' }), {
        max_tokens: 30,
        overlap_tokens: 0,
        min_tokens: 0,
      });

      expect(chunks.map((c) => c.content)).toEqual([
        '# SPI\nSerial peripheral.',
        '## Config\nSet CPOL.',
        '## Registers\nCR1 and CR2.',
      ]);
      expect(chunks.map((c) => c.metadata.section_path)).toEqual([
        'SPI',
        'SPI > Config',
        'SPI > Registers',
      ]);
      expect(chunks.map((c) => c.token_count)).toEqual([24, 19, 25]);
      expect(chunks[2]?.chunk_id).toBe(generateChunkId('spi', 2, '## Registers\nCR1 and CR2.'));
    });

    it('should hard split text without separators', () => {
      const chunks = charChunker.chunk(makeDocument('abcdefghijklmnopqrstuvwxy'), {
        max_tokens: 10,
        overlap_tokens: 0,
        min_tokens: 0,
      });

      expect(chunks.map((c) => c.content)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxy']);
    });

    it('should keep hard split CJK prose within max_tokens', () => {
      const content = '寄存器配置完成后启动外设时钟。'.repeat(40);

      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(makeDocument(content), {
        max_tokens: 30,
        overlap_tokens: 0,
        min_tokens: 0,
      });

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.map((c) => c.content).join('')).toBe(content);
      for (const chunk of chunks) {
        expect(chunk.token_count).toBeLessThanOrEqual(30);
      }
    });

    it('should produce unique chunk IDs', () => {
      const content = Array.from({ length: 20 }, (_, i) => `Paragraph ${i} text.`).join('\n\n');

      const chunks = charChunker.chunk(makeDocument(content), {
        max_tokens: 40,
        overlap_tokens: 5,
        min_tokens: 0,
      });

      expect(chunks.length).toBeGreaterThan(1);
      expect(new Set(chunks.map((c) => c.chunk_id)).size).toBe(chunks.length);
    });
  });

  describe('overlap', () => {
    it('should prepend the tail of the previous chunk', () => {
      const chunks = charChunker.chunk(makeDocument('aaaa bbbb cccc dddd eeee ffff'), {
        max_tokens: 20,
        overlap_tokens: 5,
        min_tokens: 0,
      });

      expect(chunks.map((c) => c.content)).toEqual(['aaaa bbbb cccc', 'ccccdddd eeee ffff']);
      for (const chunk of chunks) {
        expect(chunk.token_count).toBeLessThanOrEqual(20);
      }
    });

    it('should keep overlapped chunks within max_tokens', () => {
      const content = Array.from(
        { length: 10 },
        (_, i) => `Section ${i}. ` + 'word '.repeat(40)
      ).join('\n\n');

      const chunks = new MarkdownChunker({ logger: silentLogger }).chunk(makeDocument(content), {
        max_tokens: 100,
        overlap_tokens: 20,
        min_tokens: 0,
      });

      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(chunk.token_count).toBeLessThanOrEqual(100);
      }
    });
  });

  describe('small chunk merging', () => {
    it('should merge a short lead-in into the following table', () => {
      const table = '| A | B |\n|---|---|\n| 1 | 2 |';

      const chunks = charChunker.chunk(makeDocument(`Note:\n${table}`));

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe(`Note:\n\n${table}`);
      expect(chunks[0]?.metadata.content_type).toBe('table');
    });
  });

  describe('page markers', () => {
    it('should take the page from the first marker and strip all markers', () => {
      const chunks = charChunker.chunk(
        makeDocument('<!-- PAGE:3 -->\nSome text on page three.\n<!-- PAGE:4 -->\nMore text.')
      );

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.content).toBe('Some text on page three.\nMore text.');
      expect(chunks[0]?.metadata.page).toBe(3);
    });

    it('should drop fragments that only held a marker without renumbering', () => {
      const chunks = charChunker.chunk(
        makeDocument('First part here.\n\n<!-- PAGE:2 -->\n\nSecond part.', { doc_id: 'd' }),
        { max_tokens: 17, overlap_tokens: 0, min_tokens: 0 }
      );

      expect(chunks.map((c) => c.content)).toEqual(['First part here.', 'Second part.']);
      expect(chunks.map((c) => c.chunk_id)).toEqual([
        generateChunkId('d', 0, 'First part here.'),
        generateChunkId('d', 2, 'Second part.'),
      ]);
    });

    it('should return nothing for a marker-only document', () => {
      expect(charChunker.chunk(makeDocument('<!-- PAGE:1 -->'))).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('should reject an invalid config before chunking', () => {
      const logger = createRecordingLogger();
      const chunker = new MarkdownChunker({ tokenizer: charTokenizer, logger });

      expect(() => chunker.chunk(makeDocument('text'), { max_tokens: 0 })).toThrow(
        ValidationError
      );
      expect(logger.errors).toEqual([]);
    });

    it('should expose the separator priority list', () => {
      expect(MarkdownChunker.SEPARATORS).toEqual(['\n# ', '\n## ', '\n### ', '\n\n', '\n', ' ']);
    });
  });

  describe('logging and failures', () => {
    it('should log one info line per document', () => {
      const logger = createRecordingLogger();
      const chunker = new MarkdownChunker({ tokenizer: charTokenizer, logger });

      chunker.chunk(makeDocument('Plain text.', { doc_id: 'doc1' }));

      expect(logger.infos).toEqual(['Chunked doc1 into 1 chunks (max_tokens=512, overlap=50)']);
    });

    it('should wrap internal failures in a ChunkError naming the document', () => {
      const failing: Tokenizer = {
        count: () => {
          throw new Error('boom');
        },
        encode: () => [],
        decode: () => '',
      };
      const logger = createRecordingLogger();
      const chunker = new MarkdownChunker({ tokenizer: failing, logger });

      let caught: unknown;
      try {
        chunker.chunk(makeDocument('Some text', { doc_id: 'bad_doc' }));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ChunkError);
      if (caught instanceof ChunkError) {
        expect(caught.message).toBe('Failed to chunk document bad_doc: boom');
        expect(caught.docId).toBe('bad_doc');
        expect(caught.cause.message).toBe('boom');
      }
      expect(logger.errors).toEqual(['Failed to chunk document bad_doc: boom']);
    });

    it('should rethrow a ChunkError unchanged', () => {
      const inner = new ChunkError('inner_doc', new Error('nested'));
      const failing: Tokenizer = {
        count: () => {
          throw inner;
        },
        encode: () => [],
        decode: () => '',
      };
      const logger = createRecordingLogger();
      const chunker = new MarkdownChunker({ tokenizer: failing, logger });

      expect(() => chunker.chunk(makeDocument('Some text'))).toThrow(inner);
      expect(logger.errors).toEqual([]);
    });
  });
});

describe('createChunker', () => {
  it('should build a chunker with the given tokenizer', () => {
    const chunker = createChunker({ tokenizer: charTokenizer, logger: silentLogger });

    expect(chunker.chunk(makeDocument('abc'))[0]?.token_count).toBe(3);
  });
});

describe('chunkDocument', () => {
  it('should chunk with the shared tokenizer and log to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const chunks = chunkDocument(makeDocument('hello world', { doc_id: 'doc2' }));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.token_count).toBe(createTokenizer().count('hello world'));
    expect(log).toHaveBeenCalledWith('Chunked doc2 into 1 chunks (max_tokens=512, overlap=50)');
  });
});

describe('helpers', () => {
  it('should extract the first page number', () => {
    expect(extractPageNumber('a <!-- PAGE:12 --> b <!-- PAGE:13 -->')).toBe(12);
    expect(extractPageNumber('no markers')).toBe(0);
  });

  it('should strip markers with their trailing newline', () => {
    expect(stripPageMarkers('<!-- PAGE:1 -->\nText\n<!-- PAGE:2 -->')).toBe('Text');
  });

  it('should format chunk IDs with a padded index and a content hash', () => {
    // sha256("abc") = ba7816bf...
    expect(generateChunkId('doc', 7, 'abc')).toBe('doc_chunk_0007_ba7816bf');
  });
});
