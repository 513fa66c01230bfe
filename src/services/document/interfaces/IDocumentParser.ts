import type { Document, DocumentFormat } from '../types/Document.js';

/**
 * Format-specific parser producing a Document with its tree and blocks
 */
export interface IDocumentParser<TMeta = unknown> {
  readonly format: DocumentFormat;

  /**
   * Whether the parser recognizes the file by its extension
   */
  canParse(filepath: string): boolean;

  /**
   * Read and parse the file. The source file is never modified.
   * @throws ParseError when the file cannot be read or decoded
   */
  parse(filepath: string): Promise<Document<TMeta>>;
}
