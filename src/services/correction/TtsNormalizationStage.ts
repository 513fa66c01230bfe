/**
 * TtsNormalizationStage - spell out text a speech engine reads badly
 *
 * Rewrites currency amounts, whole-number percentages and month-day-year dates
 * into words. Rules run in order over every block.
 */

import numberToWords from 'number-to-words';
import type { ContentOnlyStage, StageContext } from '../pipeline/interfaces/ICorrectionStage.js';
import type { Document } from '../document/types/Document.js';
import { mapContents } from '../document/blocks.js';

export interface NormalizationRule {
  readonly name: string;
  /** Must carry the `g` flag */
  readonly pattern: RegExp;
  /** Spoken form of the match, or null to leave it as written */
  render(match: RegExpMatchArray): string | null;
}

const MONTHS: Readonly<Record<string, string>> = {
  jan: 'January',
  feb: 'February',
  mar: 'March',
  apr: 'April',
  may: 'May',
  jun: 'June',
  jul: 'July',
  aug: 'August',
  sep: 'September',
  sept: 'September',
  oct: 'October',
  nov: 'November',
  dec: 'December',
};

function plural(count: number, singular: string): string {
  return count === 1 ? singular : `${singular}s`;
}

function currencyToWords(match: RegExpMatchArray): string | null {
  const dollars = parseInt((match.groups?.dollars ?? '0').replace(/,/g, ''), 10);
  const cents = parseInt(match.groups?.cents ?? '0', 10);
  // number-to-words only reads safe integers
  if (!Number.isSafeInteger(dollars)) {
    return null;
  }

  const dollarWords = `${numberToWords.toWords(dollars)} ${plural(dollars, 'dollar')}`;
  if (cents === 0) {
    return dollarWords;
  }
  const centWords = `${numberToWords.toWords(cents)} ${plural(cents, 'cent')}`;
  return dollars === 0 ? centWords : `${dollarWords} and ${centWords}`;
}

function dateToWords(match: RegExpMatchArray): string {
  const monthName = match.groups?.month ?? '';
  const key = monthName.toLowerCase();
  const month = MONTHS[key] ?? MONTHS[key.slice(0, 3)] ?? monthName;
  const day = numberToWords.toWordsOrdinal(parseInt(match.groups?.day ?? '0', 10));
  const year = numberToWords.toWords(parseInt(match.groups?.year ?? '0', 10));
  return `${month} ${day}, ${year}`;
}

export const DEFAULT_RULES: readonly NormalizationRule[] = [
  {
    name: 'currency',
    // $12.50, $3, $1,250.00; "$5.5" is left alone
    pattern: /\$(?<dollars>\d{1,3}(?:,\d{3})+|\d+)(?:\.(?<cents>\d{2}))?(?!\.?\d)/g,
    render: currencyToWords,
  },
  {
    name: 'percent',
    pattern: /(?<![\d.,])(?<value>\d+)%/g,
    render: (match) => {
      const value = parseInt(match.groups?.value ?? '0', 10);
      return Number.isSafeInteger(value) ? `${numberToWords.toWords(value)} percent` : null;
    },
  },
  {
    name: 'date',
    pattern:
      /\b(?<month>January|February|March|April|June|July|August|September|October|November|December|Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec)\.? (?<day>\d{1,2}), (?<year>\d{4})\b/g,
    render: dateToWords,
  },
];

/**
 * Apply one rule to `text`, returning the new text and the number of matches rewritten
 */
export function applyRule(text: string, rule: NormalizationRule): { text: string; replaced: number } {
  let result = '';
  let last = 0;
  let replaced = 0;
  for (const match of text.matchAll(rule.pattern)) {
    const spoken = rule.render(match);
    if (spoken === null) {
      continue;
    }
    const index = match.index ?? 0;
    result += text.slice(last, index) + spoken;
    last = index + match[0].length;
    replaced++;
  }
  return { text: result + text.slice(last), replaced };
}

export class TtsNormalizationStage implements ContentOnlyStage {
  readonly name = 'tts';
  readonly capability = 'content-only' as const;

  constructor(private readonly rules: readonly NormalizationRule[] = DEFAULT_RULES) {}

  async apply(document: Document, context: StageContext): Promise<Document> {
    const counts: Record<string, number> = {};
    const result = mapContents(document, (content) => {
      let text = content;
      for (const rule of this.rules) {
        const outcome = applyRule(text, rule);
        text = outcome.text;
        counts[rule.name] = (counts[rule.name] ?? 0) + outcome.replaced;
      }
      return text;
    });

    context.logger.debug({ stage: this.name, replacements: counts }, '[TtsNormalizationStage] Completed');
    return result;
  }

  normalize(text: string): string {
    return this.rules.reduce((current, rule) => applyRule(current, rule).text, text);
  }
}
