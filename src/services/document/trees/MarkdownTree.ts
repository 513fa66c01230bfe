/**
 * MarkdownTree - mdast-backed structural tree
 *
 * Keeps the original Markdown source next to its mdast root. Writes are
 * recorded per paragraph and spliced into the source by position offsets on
 * serialization, so everything that was not rewritten keeps its exact bytes.
 */

import type { Nodes, Paragraph, Root } from 'mdast';
import type { StructuralTree } from '../types/StructuralTree.js';
import { ReconstructionError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';

/**
 * Back-reference from a block to a top-level mdast paragraph
 */
export interface MarkdownBlockRef {
  readonly kind: 'markdown-paragraph';
  readonly node: Paragraph;
}

/**
 * Plain text of an mdast node. Hard line breaks become `\n`, like soft ones.
 */
export function nodeText(node: Nodes): string {
  if (node.type === 'break') {
    return '\n';
  }
  if ('value' in node) {
    return node.value;
  }
  if ('children' in node) {
    const children: Nodes[] = node.children;
    return children.map((child) => nodeText(child)).join('');
  }
  return '';
}

// Characters that would be read back as inline markup
const INLINE_MARKUP = /[\\`*_[\]<&~|]/g;

// Line starts that would open a heading, block quote, list or setext underline
const BLOCK_MARKERS: Array<[RegExp, string]> = [
  [/^(#{1,6})(?=\s|$)/, '\\$1'],
  [/^>/, '\\>'],
  [/^([-+])(?=\s|$)/, '\\$1'],
  [/^(\d{1,9})([.)])(?=\s|$)/, '$1\\$2'],
  [/^(=+|-+)(\s*)$/, '\\$1$2'],
];

/**
 * Render plain text as the body of exactly one Markdown paragraph: inline
 * markup characters are escaped, every line loses its indentation and any
 * marker that would start another block, and blank lines are dropped.
 */
export function escapeMarkdownText(text: string): string {
  return text
    .replace(INLINE_MARKUP, (char) => `\\${char}`)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => BLOCK_MARKERS.reduce((escaped, [pattern, replacement]) => escaped.replace(pattern, replacement), line))
    .join('\n');
}

export class MarkdownTree implements StructuralTree<MarkdownBlockRef, Paragraph> {
  private readonly replacements = new Map<Paragraph, string>();
  private paragraphs: Set<Paragraph> | null = null;

  constructor(
    readonly source: string,
    readonly root: Root
  ) {}

  resolve(metadata: MarkdownBlockRef): Paragraph {
    const paragraphs =
      this.paragraphs ??
      new Set(this.root.children.filter((child): child is Paragraph => child.type === 'paragraph'));
    this.paragraphs = paragraphs;

    const node = metadata?.node;
    if (metadata?.kind !== 'markdown-paragraph' || !node || !paragraphs.has(node)) {
      throw new ReconstructionError('Block metadata does not reference a paragraph of this Markdown tree', {
        kind: metadata?.kind,
      });
    }
    return node;
  }

  write(node: Paragraph, text: string): void {
    if (text === nodeText(node)) {
      this.replacements.delete(node);
      return;
    }

    const escaped = escapeMarkdownText(text);
    if (escaped.length === 0) {
      logger.warn(
        { line: node.position?.start.line },
        '[MarkdownTree] Rewritten paragraph is blank, keeping the source text'
      );
      this.replacements.delete(node);
      return;
    }
    this.replacements.set(node, escaped);
  }

  async serialize(): Promise<Buffer> {
    const edits = [...this.replacements].map(([node, text]) => {
      const start = node.position?.start.offset;
      const end = node.position?.end.offset;
      if (start === undefined || end === undefined) {
        throw new ReconstructionError('Markdown paragraph has no source position', {
          line: node.position?.start.line,
        });
      }
      return { start, end, text };
    });
    edits.sort((a, b) => a.start - b.start);

    let output = '';
    let cursor = 0;
    for (const edit of edits) {
      output += this.source.slice(cursor, edit.start) + edit.text;
      cursor = edit.end;
    }
    output += this.source.slice(cursor);

    return Buffer.from(output, 'utf8');
  }
}
