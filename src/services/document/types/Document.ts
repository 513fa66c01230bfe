import type { StructuralTree } from './StructuralTree.js';

export type DocumentFormat = 'markup' | 'ebook';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['markup', 'ebook'];

/**
 * One paragraph-granularity unit of correctable text.
 *
 * `metadata` is a non-owning back-reference into the document's tree. Stages
 * must hand it back untouched (same reference); only `content` may change.
 */
export interface Block<TMeta = unknown> {
  content: string;
  readonly metadata: TMeta;
}

/**
 * Unit passed through the pipeline: structure plus ordered blocks.
 */
export interface Document<TMeta = unknown> {
  readonly format: DocumentFormat;
  readonly sourcePath: string;
  readonly tree: StructuralTree<TMeta>;
  readonly blocks: ReadonlyArray<Block<TMeta>>;
}
