export * from './services/document/index.js';
export * from './services/pipeline/index.js';
export * from './services/correction/index.js';
export { LanguageToolClient } from './services/languagetool/LanguageToolClient.js';
export type { ILanguageToolClient, LanguageToolConfig, LanguageToolMatch } from './services/languagetool/LanguageToolClient.js';
export { OllamaProvider } from './services/llm/OllamaProvider.js';
export type { OllamaConfig } from './services/llm/OllamaProvider.js';
export type { LLMProvider, LLMGenerateOptions, LLMResponse } from './services/llm/LLMProvider.js';
export * from './types/errors.js';
export { getEnv } from './config/env.js';
export type { Env } from './config/env.js';
