/**
 * SpellingCorrectionStage - word-list spelling correction
 *
 * Replaces whole words found in the misspelling list, keeping the case shape
 * of the word it replaces (lower, Capitalized or UPPER).
 */

import { z } from 'zod';
import misspellings from './data/common-misspellings.json' with { type: 'json' };
import type { ContentOnlyStage, StageContext } from '../pipeline/interfaces/ICorrectionStage.js';
import type { Document } from '../document/types/Document.js';
import { mapContents } from '../document/blocks.js';

const WordListSchema = z.record(z.string().min(1));

// Letters with optional inner apostrophes ("don't", "o'clock")
const WORD_PATTERN = /[A-Za-z]+(?:'[A-Za-z]+)*/g;

export function loadDefaultCorrections(): ReadonlyMap<string, string> {
  const entries = Object.entries(WordListSchema.parse(misspellings));
  return new Map(entries.map(([wrong, right]) => [wrong.toLowerCase(), right]));
}

/**
 * Give `replacement` the case shape of `original`
 */
export function matchCase(original: string, replacement: string): string {
  if (original.length > 1 && original === original.toUpperCase()) {
    return replacement.toUpperCase();
  }
  const first = original.charAt(0);
  if (first !== first.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

export class SpellingCorrectionStage implements ContentOnlyStage {
  readonly name = 'spelling';
  readonly capability = 'content-only' as const;

  constructor(private readonly corrections: ReadonlyMap<string, string> = loadDefaultCorrections()) {}

  async apply(document: Document, context: StageContext): Promise<Document> {
    let replaced = 0;
    const result = mapContents(document, (content) =>
      this.correctText(content, () => {
        replaced++;
      })
    );

    context.logger.debug({ stage: this.name, wordsReplaced: replaced }, '[SpellingCorrectionStage] Completed');
    return result;
  }

  /**
   * Correct a single string
   */
  correctText(text: string, onReplace?: (word: string) => void): string {
    return text.replace(WORD_PATTERN, (word) => {
      const correction = this.corrections.get(word.toLowerCase());
      if (!correction) {
        return word;
      }
      onReplace?.(word);
      return matchCase(word, correction);
    });
  }
}
