/**
 * EpubParser - EPUB to Document
 *
 * Reads the OCF container, follows it to the OPF package document and walks
 * the XHTML content documents in spine order. Only `<p>` elements inside
 * `<body>` become blocks; headings, list items, tables and every other element
 * are excluded from correction.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import type { IDocumentParser } from '../interfaces/IDocumentParser.js';
import type { Block, Document } from '../types/Document.js';
import { EpubTree, type EpubBlockRef } from '../trees/EpubTree.js';
import { ParseError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';

export const EPUB_EXTENSIONS = ['.epub'] as const;

const CONTAINER_PATH = 'META-INF/container.xml';
const CONTENT_MEDIA_TYPES = new Set(['application/xhtml+xml', 'text/html']);

// Paragraphs holding these would lose structure if rewritten as plain text
const PROTECTED_DESCENDANTS = 'a, img, svg, math, sup, sub, ruby, br';

interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
}

export class EpubParser implements IDocumentParser<EpubBlockRef> {
  readonly format = 'ebook' as const;

  canParse(filepath: string): boolean {
    const extension = path.extname(filepath).toLowerCase();
    return EPUB_EXTENSIONS.some((candidate) => candidate === extension);
  }

  async parse(filepath: string): Promise<Document<EpubBlockRef>> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filepath);
    } catch (error) {
      throw new ParseError(filepath, error instanceof Error ? error.message : String(error), error);
    }

    return this.parseBuffer(buffer, filepath);
  }

  /**
   * Parse an EPUB archive already held in memory
   */
  async parseBuffer(buffer: Buffer, sourcePath: string): Promise<Document<EpubBlockRef>> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (error) {
      throw new ParseError(sourcePath, 'not a readable ZIP archive', error);
    }

    const packagePath = await this.findPackagePath(zip, sourcePath);
    const contentPaths = await this.listContentDocuments(zip, packagePath, sourcePath);

    const tree = new EpubTree(zip);
    const blocks: Block<EpubBlockRef>[] = [];
    let protectedCount = 0;

    for (const documentPath of contentPaths) {
      const entry = zip.file(documentPath);
      if (!entry) {
        logger.warn({ sourcePath, documentPath }, '[EpubParser] Manifest entry missing from archive');
        continue;
      }

      const $ = cheerio.load(await entry.async('string'), { xml: true });
      tree.addDocument(documentPath, $);

      $('body p').each((_, element) => {
        const paragraph = $(element);
        if (paragraph.find(PROTECTED_DESCENDANTS).length > 0) {
          protectedCount++;
          return;
        }

        const content = paragraph.text().trim();
        if (content.length === 0) {
          return;
        }

        tree.registerParagraph(element, content);
        const ref: EpubBlockRef = { documentPath, element };
        blocks.push({ content, metadata: Object.freeze(ref) });
      });
    }

    logger.debug(
      {
        sourcePath,
        packagePath,
        contentDocuments: contentPaths.length,
        blockCount: blocks.length,
        protectedParagraphs: protectedCount,
      },
      '[EpubParser] Extracted paragraph blocks'
    );

    return { format: this.format, sourcePath, tree, blocks };
  }

  private async findPackagePath(zip: JSZip, sourcePath: string): Promise<string> {
    const container = zip.file(CONTAINER_PATH);
    if (!container) {
      throw new ParseError(sourcePath, `missing ${CONTAINER_PATH}`);
    }

    const $ = cheerio.load(await container.async('string'), { xml: true });
    const packagePath = $('rootfile').first().attr('full-path');
    if (!packagePath) {
      throw new ParseError(sourcePath, 'container.xml does not name a package document');
    }
    return packagePath;
  }

  /**
   * Content document paths, spine order first, then any XHTML left out of the spine
   */
  private async listContentDocuments(zip: JSZip, packagePath: string, sourcePath: string): Promise<string[]> {
    const packageEntry = zip.file(packagePath);
    if (!packageEntry) {
      throw new ParseError(sourcePath, `package document ${packagePath} not found in archive`);
    }

    const $ = cheerio.load(await packageEntry.async('string'), { xml: true });
    const manifest = new Map<string, ManifestItem>();
    $('manifest > item').each((_, element) => {
      const item = $(element);
      const id = item.attr('id');
      const href = item.attr('href');
      const mediaType = item.attr('media-type');
      if (id && href && mediaType) {
        manifest.set(id, { id, href, mediaType });
      }
    });

    if (manifest.size === 0) {
      throw new ParseError(sourcePath, `package document ${packagePath} has an empty manifest`);
    }

    const ordered: ManifestItem[] = [];
    $('spine > itemref').each((_, element) => {
      const item = manifest.get($(element).attr('idref') ?? '');
      if (item) {
        ordered.push(item);
      }
    });
    for (const item of manifest.values()) {
      if (!ordered.includes(item)) {
        ordered.push(item);
      }
    }

    const baseDir = path.posix.dirname(packagePath);
    return ordered
      .filter((item) => CONTENT_MEDIA_TYPES.has(item.mediaType))
      .map((item) => path.posix.normalize(path.posix.join(baseDir, decodeURIComponent(item.href))));
  }
}
