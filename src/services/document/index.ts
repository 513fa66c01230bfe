/**
 * Document Layer
 *
 * Document model, format parsers, structural trees and output reconstruction.
 */

export { DocumentLoader } from './DocumentLoader.js';
export { OutputReconstructor, defaultOutputPath } from './OutputReconstructor.js';
export { MarkdownParser, MARKDOWN_EXTENSIONS } from './parsers/MarkdownParser.js';
export { EpubParser, EPUB_EXTENSIONS } from './parsers/EpubParser.js';
export { MarkdownTree, escapeMarkdownText, nodeText } from './trees/MarkdownTree.js';
export { EpubTree } from './trees/EpubTree.js';
export { snapshotDocument, withContents, mapContents, countChangedBlocks, blockContents } from './blocks.js';

export type { MarkdownBlockRef } from './trees/MarkdownTree.js';
export type { EpubBlockRef, ContentDocument, ResolvedParagraph } from './trees/EpubTree.js';
export type { IDocumentParser } from './interfaces/IDocumentParser.js';
export type { Block, Document, DocumentFormat } from './types/Document.js';
export { DOCUMENT_FORMATS } from './types/Document.js';
export type { StructuralTree } from './types/StructuralTree.js';
