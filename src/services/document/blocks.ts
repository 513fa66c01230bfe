/**
 * Block helpers for stages and the orchestrator.
 *
 * Stages never build blocks themselves: they produce new content strings and
 * go through these helpers, which carry every metadata reference over as-is.
 */

import type { Block, Document } from './types/Document.js';

/**
 * Copy a document with fresh block objects. Metadata references and the tree
 * are shared with the original.
 */
export function snapshotDocument<TMeta>(document: Document<TMeta>): Document<TMeta> {
  return {
    ...document,
    blocks: document.blocks.map((block) => ({ content: block.content, metadata: block.metadata })),
  };
}

/**
 * Return a copy of `document` whose block contents are `contents`, index for index.
 */
export function withContents<TMeta>(document: Document<TMeta>, contents: readonly string[]): Document<TMeta> {
  if (contents.length !== document.blocks.length) {
    throw new RangeError(
      `Expected ${document.blocks.length} content strings, received ${contents.length}`
    );
  }

  const blocks: Block<TMeta>[] = document.blocks.map((block, index) => ({
    content: contents[index] ?? block.content,
    metadata: block.metadata,
  }));

  return { ...document, blocks };
}

/**
 * Rewrite every block's content with a synchronous function.
 */
export function mapContents<TMeta>(
  document: Document<TMeta>,
  fn: (content: string, index: number) => string
): Document<TMeta> {
  return withContents(
    document,
    document.blocks.map((block, index) => fn(block.content, index))
  );
}

/**
 * Number of blocks whose content differs between two aligned block lists.
 */
export function countChangedBlocks(
  before: ReadonlyArray<Pick<Block, 'content'>>,
  after: ReadonlyArray<Pick<Block, 'content'>>
): number {
  let changes = 0;
  const length = Math.min(before.length, after.length);
  for (let i = 0; i < length; i++) {
    if (before[i]?.content !== after[i]?.content) {
      changes++;
    }
  }
  return changes;
}

export function blockContents(document: Document): string[] {
  return document.blocks.map((block) => block.content);
}
