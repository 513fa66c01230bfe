/**
 * MarkdownParser - Markdown to Document
 *
 * Parses Markdown with remark (GFM tables and front matter recognized) and
 * extracts one block per top-level paragraph. Headings, list items, table
 * cells, block quotes, code and HTML stay in the tree and are never corrected.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { remark } from 'remark';
import remarkFrontmatter from 'remark-frontmatter';
import remarkGfm from 'remark-gfm';
import type { Nodes, Paragraph } from 'mdast';
import type { IDocumentParser } from '../interfaces/IDocumentParser.js';
import type { Block, Document } from '../types/Document.js';
import { MarkdownTree, nodeText, type MarkdownBlockRef } from '../trees/MarkdownTree.js';
import { ParseError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';

export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'] as const;

// Inline nodes whose targets would be lost if the paragraph were rewritten as plain text
const PROTECTED_INLINE_TYPES = new Set<string>([
  'link',
  'linkReference',
  'image',
  'imageReference',
  'footnoteReference',
  'html',
]);

function containsProtectedInline(node: Nodes): boolean {
  if (PROTECTED_INLINE_TYPES.has(node.type)) {
    return true;
  }
  if (!('children' in node)) {
    return false;
  }
  const children: Nodes[] = node.children;
  return children.some((child) => containsProtectedInline(child));
}

export class MarkdownParser implements IDocumentParser<MarkdownBlockRef> {
  readonly format = 'markup' as const;

  private readonly processor = remark().use(remarkGfm).use(remarkFrontmatter, ['yaml', 'toml']);

  canParse(filepath: string): boolean {
    const extension = path.extname(filepath).toLowerCase();
    return MARKDOWN_EXTENSIONS.some((candidate) => candidate === extension);
  }

  async parse(filepath: string): Promise<Document<MarkdownBlockRef>> {
    let source: string;
    try {
      source = await readFile(filepath, 'utf8');
    } catch (error) {
      throw new ParseError(filepath, error instanceof Error ? error.message : String(error), error);
    }

    return this.parseSource(source, filepath);
  }

  /**
   * Parse Markdown already held in memory
   */
  parseSource(source: string, sourcePath: string): Document<MarkdownBlockRef> {
    let tree: MarkdownTree;
    try {
      tree = new MarkdownTree(source, this.processor.parse(source));
    } catch (error) {
      throw new ParseError(sourcePath, error instanceof Error ? error.message : String(error), error);
    }

    const blocks: Block<MarkdownBlockRef>[] = [];
    let protectedCount = 0;

    for (const child of tree.root.children) {
      if (child.type !== 'paragraph') {
        continue;
      }
      if (containsProtectedInline(child)) {
        protectedCount++;
        continue;
      }

      const content = nodeText(child);
      if (content.trim().length === 0) {
        continue;
      }

      blocks.push({ content, metadata: this.createRef(child) });
    }

    logger.debug(
      {
        sourcePath,
        blockCount: blocks.length,
        topLevelNodes: tree.root.children.length,
        protectedParagraphs: protectedCount,
      },
      '[MarkdownParser] Extracted paragraph blocks'
    );

    return { format: this.format, sourcePath, tree, blocks };
  }

  private createRef(node: Paragraph): MarkdownBlockRef {
    const ref: MarkdownBlockRef = { kind: 'markdown-paragraph', node };
    return Object.freeze(ref);
  }
}
