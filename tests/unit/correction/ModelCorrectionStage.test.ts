import { describe, it, expect, vi } from 'vitest';
import {
  ModelCorrectionStage,
  buildCorrectionPrompt,
} from '../../../src/services/correction/ModelCorrectionStage.js';
import type { LLMGenerateOptions, LLMProvider } from '../../../src/services/llm/LLMProvider.js';
import { ExecutionContext } from '../../../src/services/pipeline/ExecutionContext.js';
import { blockContents } from '../../../src/services/document/blocks.js';
import { parseMarkdown } from '../../helpers/stages.js';

function providerReturning(fix: (input: string) => string): LLMProvider & { prompts: string[]; options: LLMGenerateOptions[] } {
  const prompts: string[] = [];
  const options: LLMGenerateOptions[] = [];
  return {
    prompts,
    options,
    getName: () => 'fake',
    isAvailable: vi.fn(async () => true),
    generate: vi.fn(async (prompt: string, generateOptions?: LLMGenerateOptions) => {
      prompts.push(prompt);
      options.push(generateOptions ?? {});
      const input = prompt.split('### Input\n')[1]?.split('\n\n### Response')[0] ?? '';
      return { content: fix(input), model: 'test-model' };
    }),
  };
}

describe('buildCorrectionPrompt', () => {
  it('wraps the text in the copy-editor template', () => {
    expect(buildCorrectionPrompt('She go home.')).toBe(
      '### Instruction\n' +
        'You are a copy editor. Fix grammar, spelling, and punctuation while keeping character names, slang, and factual content unchanged. Respond with the corrected text only.\n' +
        '\n' +
        '### Input\n' +
        'She go home.\n' +
        '\n' +
        '### Response\n'
    );
  });

  it('inserts replacement patterns literally', () => {
    expect(buildCorrectionPrompt('Costs $& more')).toContain('### Input\nCosts $& more\n');
  });
});

describe('ModelCorrectionStage', () => {
  it('replaces each block with the completion', async () => {
    const provider = providerReturning((input) => input.replace('go', 'goes'));
    const stage = new ModelCorrectionStage({ provider, temperature: 0.3, model: 'test-model' });
    const context = new ExecutionContext();

    const result = await stage.apply(parseMarkdown('She go home.\n\nHe go out.\n'), context);

    expect(blockContents(result)).toEqual(['She goes home.', 'He goes out.']);
    expect(provider.options[0]).toEqual({
      temperature: 0.3,
      maxTokens: 256,
      model: 'test-model',
      stop: ['###', '\n\n\n'],
      signal: expect.any(AbortSignal),
    });
  });

  it('defaults to a low temperature', async () => {
    const provider = providerReturning((input) => input);
    await new ModelCorrectionStage({ provider }).apply(parseMarkdown('Fine text.\n'), new ExecutionContext());

    expect(provider.options[0]?.temperature).toBe(0.1);
  });

  it('propagates provider failures', async () => {
    const provider: LLMProvider = {
      getName: () => 'fake',
      isAvailable: vi.fn(async () => false),
      generate: vi.fn(async () => {
        throw new Error('model not loaded');
      }),
    };

    await expect(
      new ModelCorrectionStage({ provider }).apply(parseMarkdown('Text.\n'), new ExecutionContext())
    ).rejects.toThrow('model not loaded');
  });

  it('does not send further blocks after a failed completion', async () => {
    const prompts: string[] = [];
    const provider: LLMProvider = {
      getName: () => 'fake',
      isAvailable: vi.fn(async () => true),
      generate: vi.fn(async (prompt: string) => {
        prompts.push(prompt);
        throw new Error('model not loaded');
      }),
    };

    await expect(
      new ModelCorrectionStage({ provider }).apply(parseMarkdown('One.\n\nTwo.\n\nThree.\n'), new ExecutionContext())
    ).rejects.toThrow('model not loaded');
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(prompts).toEqual([buildCorrectionPrompt('One.')]);
  });

  it('probes the provider', async () => {
    const provider = providerReturning((input) => input);
    await expect(new ModelCorrectionStage({ provider }).probe()).resolves.toBe(true);
  });
});
