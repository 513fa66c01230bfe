/**
 * ModelCorrectionStage - LLM-based copy editing
 *
 * Each non-blank block is sent to the configured provider wrapped in a
 * copy-editor prompt; the completion replaces the block content.
 */

import type { ContentOnlyStage, StageContext } from '../pipeline/interfaces/ICorrectionStage.js';
import type { Document } from '../document/types/Document.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { withContents } from '../document/blocks.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';

export const COPY_EDITOR_PROMPT = `### Instruction
You are a copy editor. Fix grammar, spelling, and punctuation while keeping character names, slang, and factual content unchanged. Respond with the corrected text only.

### Input
{text}

### Response
`;

// Section markers and runs of blank lines end the completion
const STOP_SEQUENCES = ['###', '\n\n\n'];

export interface ModelCorrectionOptions {
  provider: LLMProvider;
  /** Sampling temperature, 0 to 2 (default 0.1) */
  temperature?: number;
  concurrency?: number;
  maxTokens?: number;
  model?: string;
}

export function buildCorrectionPrompt(text: string): string {
  return COPY_EDITOR_PROMPT.replace('{text}', () => text);
}

export class ModelCorrectionStage implements ContentOnlyStage {
  readonly name = 'model';
  readonly capability = 'content-only' as const;

  private readonly provider: LLMProvider;
  private readonly temperature: number;
  private readonly concurrency: number;
  private readonly maxTokens: number;
  private readonly model?: string;

  constructor(options: ModelCorrectionOptions) {
    this.provider = options.provider;
    this.temperature = options.temperature ?? 0.1;
    this.concurrency = options.concurrency ?? 1;
    this.maxTokens = options.maxTokens ?? 256;
    this.model = options.model;
  }

  probe(): Promise<boolean> {
    return this.provider.isAvailable();
  }

  async apply(document: Document, context: StageContext): Promise<Document> {
    let tokens = 0;

    const contents = await mapWithConcurrency(
      document.blocks,
      this.concurrency,
      async (block, index, signal) => {
        if (!block.content.trim()) {
          return block.content;
        }

        const response = await this.provider.generate(buildCorrectionPrompt(block.content), {
          temperature: this.temperature,
          maxTokens: this.maxTokens,
          model: this.model,
          stop: STOP_SEQUENCES,
          signal,
        });
        tokens += response.usage?.completionTokens ?? 0;

        if (response.content !== block.content) {
          context.logger.debug(
            {
              stage: this.name,
              blockIndex: index,
              wordsBefore: block.content.split(/\s+/).length,
              wordsAfter: response.content.split(/\s+/).length,
            },
            '[ModelCorrectionStage] Block corrected'
          );
        }
        return response.content;
      },
      { signal: context.signal }
    );

    context.logger.info(
      { stage: this.name, provider: this.provider.getName(), blocks: document.blocks.length, tokens },
      '[ModelCorrectionStage] Completed'
    );
    return withContents(document, contents);
  }
}
