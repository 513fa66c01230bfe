import { describe, it, expect } from 'vitest';
import { MarkdownParser } from '../../../src/services/document/parsers/MarkdownParser.js';
import { ParseError } from '../../../src/types/errors.js';

const SOURCE = [
  '---',
  'title: Sample',
  '---',
  '',
  '# Heading with teh typo',
  '',
  'First paragraph.',
  '',
  '- list item one',
  '- list item two',
  '',
  '> quoted paragraph',
  '',
  '| a | b |',
  '| - | - |',
  '| c | d |',
  '',
  '```js',
  'const teh = 1;',
  '```',
  '',
  'Second *emphasis* paragraph.',
  '',
  'See [the link](https://example.com/page) here.',
  '',
  'An image ![alt](cover.png) inline.',
  '',
].join('\n');

describe('MarkdownParser', () => {
  const parser = new MarkdownParser();

  it('extracts only top-level paragraphs as blocks', () => {
    const document = parser.parseSource(SOURCE, '/books/sample.md');

    expect(document.format).toBe('markup');
    expect(document.sourcePath).toBe('/books/sample.md');
    expect(document.blocks.map((block) => block.content)).toEqual([
      'First paragraph.',
      'Second emphasis paragraph.',
    ]);
  });

  it('gives every block a frozen paragraph reference', () => {
    const document = parser.parseSource(SOURCE, 'sample.md');

    for (const block of document.blocks) {
      expect(Object.isFrozen(block.metadata)).toBe(true);
      expect(block.metadata.kind).toBe('markdown-paragraph');
      expect(block.metadata.node.type).toBe('paragraph');
    }
  });

  it.each([
    ['a backslash', 'Teh first line\\\nsecond line.\n'],
    ['two trailing spaces', 'Teh first line  \nsecond line.\n'],
  ])('turns a hard line break written with %s into a newline', (_label, source) => {
    const document = parser.parseSource(source, '/docs/breaks.md');
    expect(document.blocks.map((block) => block.content)).toEqual(['Teh first line\nsecond line.']);
  });

  it('returns no blocks for a document without paragraphs', () => {
    const document = parser.parseSource('# Only a heading\n\n- and a list\n', 'empty.md');
    expect(document.blocks).toHaveLength(0);
  });

  it('recognizes Markdown extensions case-insensitively', () => {
    expect(parser.canParse('notes.md')).toBe(true);
    expect(parser.canParse('NOTES.MARKDOWN')).toBe(true);
    expect(parser.canParse('notes.txt')).toBe(false);
    expect(parser.canParse('book.epub')).toBe(false);
  });

  it('raises ParseError for a file that cannot be read', async () => {
    await expect(parser.parse('/nonexistent/dir/missing.md')).rejects.toBeInstanceOf(ParseError);
  });
});
