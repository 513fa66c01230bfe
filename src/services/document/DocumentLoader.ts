/**
 * DocumentLoader - format resolution and parser dispatch
 */

import * as path from 'path';
import type { IDocumentParser } from './interfaces/IDocumentParser.js';
import type { Document, DocumentFormat } from './types/Document.js';
import { MarkdownParser, MARKDOWN_EXTENSIONS } from './parsers/MarkdownParser.js';
import { EpubParser, EPUB_EXTENSIONS } from './parsers/EpubParser.js';
import { ParseError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

export class DocumentLoader {
  private readonly parsers: IDocumentParser[];

  constructor(parsers?: IDocumentParser[]) {
    this.parsers = parsers ?? [new MarkdownParser(), new EpubParser()];
  }

  /**
   * Resolve the format of a file: the declared format wins, otherwise the extension decides
   *
   * @throws ParseError when no parser recognizes the extension
   */
  resolveFormat(filepath: string, declared?: DocumentFormat): DocumentFormat {
    if (declared) {
      return declared;
    }
    const parser = this.parsers.find((candidate) => candidate.canParse(filepath));
    if (!parser) {
      throw new ParseError(
        filepath,
        `unsupported file type '${path.extname(filepath) || '(none)'}'; expected one of ${[...MARKDOWN_EXTENSIONS, ...EPUB_EXTENSIONS].join(', ')}`
      );
    }
    return parser.format;
  }

  async load(filepath: string, declared?: DocumentFormat): Promise<Document> {
    const format = this.resolveFormat(filepath, declared);
    const parser = this.parsers.find((candidate) => candidate.format === format);
    if (!parser) {
      throw new ParseError(filepath, `no parser registered for format '${format}'`);
    }

    const startTime = Date.now();
    const document = await parser.parse(filepath);

    logger.info(
      {
        sourcePath: filepath,
        format,
        blockCount: document.blocks.length,
        parseTime: Date.now() - startTime,
      },
      '[DocumentLoader] Parsed document'
    );

    return document;
  }
}
