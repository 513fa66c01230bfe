/**
 * GrammarCorrectionStage - rule-based grammar fixes via LanguageTool
 *
 * Only matches from a fixed set of low-risk rules are applied, each with the
 * server's first suggested replacement. A block whose corrected text no longer
 * has the same count of markup-sensitive symbols is left as it was.
 */

import type { CountingStage, StageContext, StageResult } from '../pipeline/interfaces/ICorrectionStage.js';
import type { Document } from '../document/types/Document.js';
import type { ILanguageToolClient, LanguageToolMatch } from '../languagetool/LanguageToolClient.js';
import { withContents } from '../document/blocks.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { retryWithBackoff, type RetryConfig } from '../../utils/retry.js';
import { ExternalServiceError, isAbortError } from '../../types/errors.js';

export const GRAMMAR_CATEGORIES = ['typos', 'punctuation', 'spacing', 'casing', 'simple_agreement'] as const;
export type GrammarCategory = (typeof GRAMMAR_CATEGORIES)[number];

const SAFE_RULES: Readonly<Record<GrammarCategory, readonly string[]>> = {
  typos: ['MORFOLOGIK_RULE_EN_US', 'ENGLISH_WORD_REPEAT_RULE'],
  punctuation: ['COMMA_PARENTHESIS_WHITESPACE', 'EN_QUOTES', 'UNPAIRED_BRACKETS'],
  spacing: ['WHITESPACE_RULE', 'SENTENCE_WHITESPACE'],
  casing: ['UPPERCASE_SENTENCE_START'],
  simple_agreement: ['PERSPECTIVE_AGREEMENT'],
};

const PARITY_SYMBOLS = ['[', ']', '(', ')', '`'] as const;

export type GrammarFixCounts = Record<GrammarCategory, number>;

export interface GrammarCorrectionOptions {
  client: ILanguageToolClient;
  /** Blocks checked in parallel (default 1) */
  concurrency?: number;
  retry?: Omit<RetryConfig, 'signal'>;
}

export function categorizeRule(ruleId: string): GrammarCategory | null {
  return GRAMMAR_CATEGORIES.find((category) => SAFE_RULES[category].includes(ruleId)) ?? null;
}

function emptyCounts(): GrammarFixCounts {
  return { typos: 0, punctuation: 0, spacing: 0, casing: 0, simple_agreement: 0 };
}

function countOf(text: string, symbol: string): number {
  return text.split(symbol).length - 1;
}

/**
 * True when both texts contain the same number of each link/code delimiter
 */
export function preservesMarkupSymbols(original: string, corrected: string): boolean {
  return PARITY_SYMBOLS.every((symbol) => countOf(original, symbol) === countOf(corrected, symbol));
}

/**
 * Apply the safe subset of `matches` to `text`, last offset first. Matches that
 * overlap an already-applied one or fall outside the text are ignored.
 */
export function applySafeMatches(
  text: string,
  matches: readonly LanguageToolMatch[]
): { text: string; fixes: GrammarFixCounts; reverted: boolean } {
  const fixes = emptyCounts();
  const safe = matches
    .map((match) => ({ match, category: categorizeRule(match.rule.id), replacement: match.replacements[0] }))
    .filter((entry) => entry.category !== null && entry.replacement !== undefined)
    .sort((a, b) => b.match.offset - a.match.offset);

  let corrected = text;
  let boundary = text.length;
  for (const { match, category, replacement } of safe) {
    const end = match.offset + match.length;
    if (!category || !replacement || end > boundary) continue;
    corrected = corrected.slice(0, match.offset) + replacement.value + corrected.slice(end);
    boundary = match.offset;
    fixes[category]++;
  }

  if (!preservesMarkupSymbols(text, corrected)) {
    return { text, fixes: emptyCounts(), reverted: true };
  }
  return { text: corrected, fixes, reverted: false };
}

export class GrammarCorrectionStage implements CountingStage {
  readonly name = 'grammar';
  readonly capability = 'content+changeCount' as const;

  private readonly client: ILanguageToolClient;
  private readonly concurrency: number;
  private readonly retry: Omit<RetryConfig, 'signal'>;

  constructor(options: GrammarCorrectionOptions) {
    this.client = options.client;
    this.concurrency = options.concurrency ?? 1;
    this.retry = { maxAttempts: 3, initialDelay: 500, ...options.retry };
  }

  probe(): Promise<boolean> {
    return this.client.isAvailable();
  }

  async apply(document: Document, context: StageContext): Promise<StageResult> {
    const totals = emptyCounts();
    let reverted = 0;

    const contents = await mapWithConcurrency(
      document.blocks,
      this.concurrency,
      async (block, index, signal) => {
        if (!block.content.trim()) {
          return block.content;
        }

        const matches = await this.check(block.content, signal);
        const result = applySafeMatches(block.content, matches);
        if (result.reverted) {
          context.logger.warn({ stage: this.name, blockIndex: index }, '[GrammarCorrectionStage] Validation failed; block kept as is');
          reverted++;
        }
        for (const category of GRAMMAR_CATEGORIES) {
          totals[category] += result.fixes[category];
        }
        return result.text;
      },
      { signal: context.signal }
    );

    const details: Record<string, number> = {};
    for (const category of GRAMMAR_CATEGORIES) {
      details[`${category}_fixed`] = totals[category];
    }
    const changeCount = GRAMMAR_CATEGORIES.reduce((sum, category) => sum + totals[category], 0);

    context.logger.debug({ stage: this.name, changeCount, reverted }, '[GrammarCorrectionStage] Completed');
    return { document: withContents(document, contents), changeCount, details };
  }

  private async check(text: string, signal: AbortSignal): Promise<LanguageToolMatch[]> {
    try {
      return await retryWithBackoff(() => this.client.check(text, signal), { ...this.retry, signal }, 'LanguageTool check');
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError('LanguageTool', `Check failed: ${message}`, { reason: 'check_failed' }, error);
    }
  }
}
