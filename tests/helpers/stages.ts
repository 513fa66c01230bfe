import type { ContentOnlyStage, CountingStage, FailurePolicy } from '../../src/services/pipeline/interfaces/ICorrectionStage.js';
import type { Document } from '../../src/services/document/types/Document.js';
import type { MarkdownBlockRef } from '../../src/services/document/trees/MarkdownTree.js';
import { mapContents } from '../../src/services/document/blocks.js';
import { MarkdownParser } from '../../src/services/document/parsers/MarkdownParser.js';

export function parseMarkdown(source: string, sourcePath = '/tmp/doc.md'): Document<MarkdownBlockRef> {
  return new MarkdownParser().parseSource(source, sourcePath);
}

/**
 * Content-only stage that rewrites each block with `fn`
 */
export function contentStage(
  name: string,
  fn: (content: string) => string,
  failurePolicy?: FailurePolicy
): ContentOnlyStage {
  return {
    name,
    capability: 'content-only',
    failurePolicy,
    apply: async (document: Document) => mapContents(document, fn),
  };
}

export function replaceWordStage(from: string, to: string): ContentOnlyStage {
  return contentStage(`replace-${from}`, (content) => content.split(from).join(to));
}

export function failingStage(name: string, message = 'boom', failurePolicy?: FailurePolicy): ContentOnlyStage {
  return {
    name,
    capability: 'content-only',
    failurePolicy,
    apply: async () => {
      throw new Error(message);
    },
  };
}

export function countingStage(name: string, changeCount: number, details?: Record<string, number>): CountingStage {
  return {
    name,
    capability: 'content+changeCount',
    apply: async (document: Document) => ({ document, changeCount, details }),
  };
}
