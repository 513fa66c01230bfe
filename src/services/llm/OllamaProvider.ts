/**
 * Local LLM Provider (Ollama)
 *
 * Runs correction models served by Ollama through its generate endpoint.
 * https://ollama.ai/
 *
 * Usage:
 * 1. Install Ollama and pull or create the correction model
 * 2. Set OLLAMA_API_URL (default http://localhost:11434) and OLLAMA_MODEL
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LLMProvider, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { getEnv } from '../../config/env.js';
import { AppError, ExternalServiceError, isAbortError } from '../../types/errors.js';

export interface OllamaConfig {
  apiUrl: string;
  model: string;
  timeout: number;
}

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const GenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string().default(''),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaProvider implements LLMProvider {
  private config: OllamaConfig;
  private client: AxiosInstance;

  constructor(config?: Partial<OllamaConfig>, client?: AxiosInstance) {
    const env = getEnv();
    this.config = {
      apiUrl: env.OLLAMA_API_URL,
      model: env.OLLAMA_MODEL,
      timeout: env.OLLAMA_TIMEOUT,
      ...config,
    };

    this.client =
      client ??
      createHttpClient({
        baseURL: this.config.apiUrl,
        timeout: this.config.timeout || HTTP_TIMEOUTS.LONG,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  getName(): string {
    return 'ollama';
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.client.get('/api/tags', { timeout: HTTP_TIMEOUTS.SHORT });
      const tags = TagsResponseSchema.parse(response.data);
      // Ollama reports untagged models as "<name>:latest"
      const wanted = this.config.model.includes(':') ? this.config.model : `${this.config.model}:latest`;
      return tags.models.some((model) => model.name === this.config.model || model.name === wanted);
    } catch (error) {
      logger.debug({ error, apiUrl: this.config.apiUrl }, 'Ollama not available');
      return false;
    }
  }

  async generate(prompt: string, options?: LLMGenerateOptions): Promise<LLMResponse> {
    const model = options?.model || this.config.model;
    const temperature = options?.temperature ?? 0.1;

    try {
      const generateResponse = await this.client.post(
        '/api/generate',
        {
          model,
          prompt,
          options: {
            temperature,
            ...(options?.maxTokens && { num_predict: options.maxTokens }),
            ...(options?.stop && { stop: options.stop }),
          },
          stream: false,
        },
        { signal: options?.signal }
      );

      const data = GenerateResponseSchema.parse(generateResponse.data);
      const content = data.response.trim();
      if (!content) {
        throw new ExternalServiceError('Ollama', 'Empty response from Ollama', {
          reason: 'empty_response',
          provider: 'ollama',
          model,
          endpoint: 'generate',
        });
      }

      return {
        content,
        model: data.model || model,
        usage:
          data.eval_count !== undefined
            ? {
                promptTokens: data.prompt_eval_count ?? 0,
                completionTokens: data.eval_count,
                totalTokens: (data.prompt_eval_count ?? 0) + data.eval_count,
              }
            : undefined,
      };
    } catch (error) {
      if (error instanceof AppError || isAbortError(error)) {
        throw error;
      }
      logger.error({ error, model, apiUrl: this.config.apiUrl }, 'Error calling Ollama');
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(
        'Ollama',
        `Failed to generate completion from Ollama: ${errorMessage}`,
        {
          reason: 'completion_failed',
          provider: 'ollama',
          model,
          apiUrl: this.config.apiUrl,
        },
        error
      );
    }
  }

  getConfig(): OllamaConfig {
    return { ...this.config };
  }
}
