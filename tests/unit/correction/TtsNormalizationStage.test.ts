import { describe, it, expect } from 'vitest';
import { TtsNormalizationStage, applyRule, DEFAULT_RULES } from '../../../src/services/correction/TtsNormalizationStage.js';
import { ExecutionContext } from '../../../src/services/pipeline/ExecutionContext.js';
import { blockContents } from '../../../src/services/document/blocks.js';
import { parseMarkdown } from '../../helpers/stages.js';

const NORMALIZATIONS: Array<[string, string]> = [
  ['It costs $12.50 today.', 'It costs twelve dollars and fifty cents today.'],
  ['Only $1.00 left.', 'Only one dollar left.'],
  ['A fee of $3.', 'A fee of three dollars.'],
  ['Just $0.99 each.', 'Just ninety-nine cents each.'],
  ['Rent is $1,250 a month.', 'Rent is one thousand, two hundred fifty dollars a month.'],
  ['Sales rose 15% this year.', 'Sales rose fifteen percent this year.'],
  ['We met on Jan. 1, 2024.', 'We met on January first, two thousand, twenty-four.'],
  ['Due March 3, 2021 at noon.', 'Due March third, two thousand, twenty-one at noon.'],
  ['Filed Sept. 12, 2024.', 'Filed September twelfth, two thousand, twenty-four.'],
];

describe('TtsNormalizationStage', () => {
  const stage = new TtsNormalizationStage();

  it.each(NORMALIZATIONS)('normalizes "%s"', (input, expected) => {
    expect(stage.normalize(input)).toBe(expected);
  });

  it('leaves amounts it cannot read alone', () => {
    expect(stage.normalize('Growth of 2.5% and $5.5 are odd.')).toBe('Growth of 2.5% and $5.5 are odd.');
  });

  it('leaves numbers too long to spell out as written', () => {
    expect(stage.normalize('Debt hit $12345678901234567890 and 99999999999999999999% but $2 is fine.')).toBe(
      'Debt hit $12345678901234567890 and 99999999999999999999% but two dollars is fine.'
    );

    const currency = DEFAULT_RULES.find((rule) => rule.name === 'currency');
    if (!currency) throw new Error('currency rule missing');
    expect(applyRule('$12345678901234567890 or $4', currency)).toEqual({
      text: '$12345678901234567890 or four dollars',
      replaced: 1,
    });
  });

  it('counts the matches of a single rule', () => {
    const percent = DEFAULT_RULES.find((rule) => rule.name === 'percent');
    if (!percent) throw new Error('percent rule missing');

    expect(applyRule('10% and 20%', percent)).toEqual({ text: 'ten percent and twenty percent', replaced: 2 });
  });

  it('rewrites blocks and leaves headings alone', async () => {
    const document = parseMarkdown('# Prices in 2024: 5%\n\nPay $2.50 now.\n\nNothing to do.\n');

    const result = await stage.apply(document, new ExecutionContext());

    expect(blockContents(result)).toEqual(['Pay two dollars and fifty cents now.', 'Nothing to do.']);
  });
});
