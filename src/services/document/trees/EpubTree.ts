/**
 * EpubTree - EPUB archive plus parsed XHTML content documents
 *
 * The archive stays loaded for the lifetime of the tree. Content documents are
 * held as cheerio (XML mode) instances; on serialization only documents with a
 * rewritten paragraph are re-encoded, every other entry is copied as loaded.
 */

import type JSZip from 'jszip';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { StructuralTree } from '../types/StructuralTree.js';
import { ReconstructionError } from '../../../types/errors.js';

// cheerio's XML serializer writes every non-ASCII character as a hex reference
const HEX_REFERENCE = /&#x([0-9a-fA-F]+);/g;

/**
 * Turn hex character references above ASCII back into UTF-8 text. XML's own
 * special characters keep their escapes.
 */
export function restoreNonAsciiText(xml: string): string {
  return xml.replace(HEX_REFERENCE, (reference, hex: string) => {
    const codePoint = parseInt(hex, 16);
    return codePoint >= 0x80 && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : reference;
  });
}

/**
 * Back-reference from a block to a `<p>` element in one content document
 */
export interface EpubBlockRef {
  readonly documentPath: string;
  readonly element: Element;
}

export interface ContentDocument {
  readonly path: string;
  readonly $: CheerioAPI;
  dirty: boolean;
}

export interface ResolvedParagraph {
  readonly document: ContentDocument;
  readonly element: Element;
}

export class EpubTree implements StructuralTree<EpubBlockRef, ResolvedParagraph> {
  private readonly documents = new Map<string, ContentDocument>();
  private readonly originalText = new Map<Element, string>();

  constructor(readonly zip: JSZip) {}

  addDocument(path: string, $: CheerioAPI): ContentDocument {
    const document: ContentDocument = { path, $, dirty: false };
    this.documents.set(path, document);
    return document;
  }

  /**
   * Remember the text a paragraph carried at parse time
   */
  registerParagraph(element: Element, text: string): void {
    this.originalText.set(element, text);
  }

  get documentPaths(): string[] {
    return [...this.documents.keys()];
  }

  resolve(metadata: EpubBlockRef): ResolvedParagraph {
    const document = this.documents.get(metadata?.documentPath);
    const element = metadata?.element;
    if (!document || !element || !this.originalText.has(element)) {
      throw new ReconstructionError('Block metadata does not reference a paragraph of this EPUB', {
        documentPath: metadata?.documentPath,
      });
    }

    const root = document.$.root()[0];
    if (!root || !document.$.contains(root, element)) {
      throw new ReconstructionError('Paragraph element is no longer attached to its content document', {
        documentPath: document.path,
      });
    }

    return { document, element };
  }

  write(node: ResolvedParagraph, text: string): void {
    if (text === this.originalText.get(node.element)) {
      return;
    }
    node.document.$(node.element).text(text);
    node.document.dirty = true;
  }

  async serialize(): Promise<Buffer> {
    for (const document of this.documents.values()) {
      if (document.dirty) {
        this.zip.file(document.path, restoreNonAsciiText(document.$.xml()));
      }
    }

    // OCF requires the mimetype entry to stay uncompressed
    const mimetype = this.zip.file('mimetype');
    if (mimetype) {
      this.zip.file('mimetype', await mimetype.async('string'), { compression: 'STORE' });
    }

    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }
}
