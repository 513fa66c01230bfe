/**
 * LLM Provider Abstraction
 *
 * Text-completion interface used by model-based correction, so the stage can
 * run against Ollama or a test double.
 */

export interface LLMProvider {
  /**
   * Complete a raw prompt
   * @param prompt Full prompt text, template already applied
   * @param options Optional generation settings
   */
  generate(prompt: string, options?: LLMGenerateOptions): Promise<LLMResponse>;

  /**
   * Check if the provider is reachable and the configured model is present
   */
  isAvailable(): Promise<boolean>;

  getName(): string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  maxTokens?: number;
  model?: string;
  /** Sequences that end generation */
  stop?: string[];
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}
