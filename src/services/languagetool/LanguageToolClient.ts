/**
 * LanguageTool HTTP client
 *
 * Talks to a LanguageTool server (self-hosted or public) through its v2 API.
 * https://languagetool.org/http-api/
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { getEnv } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { ExternalServiceError } from '../../types/errors.js';

const MatchSchema = z.object({
  message: z.string().default(''),
  offset: z.number().int().nonnegative(),
  length: z.number().int().nonnegative(),
  replacements: z.array(z.object({ value: z.string() })).default([]),
  rule: z.object({ id: z.string() }),
});

const CheckResponseSchema = z.object({
  matches: z.array(MatchSchema),
});

export type LanguageToolMatch = z.infer<typeof MatchSchema>;

export interface ILanguageToolClient {
  /**
   * Check `text` and return the server's matches, offsets in UTF-16 code units
   */
  check(text: string, signal?: AbortSignal): Promise<LanguageToolMatch[]>;
  isAvailable(): Promise<boolean>;
}

export interface LanguageToolConfig {
  apiUrl: string;
  language: string;
  timeout: number;
}

export class LanguageToolClient implements ILanguageToolClient {
  private readonly config: LanguageToolConfig;
  private readonly client: AxiosInstance;

  constructor(config?: Partial<LanguageToolConfig>, client?: AxiosInstance) {
    const env = getEnv();
    this.config = {
      apiUrl: env.LANGUAGETOOL_API_URL,
      language: env.LANGUAGETOOL_LANGUAGE,
      timeout: env.LANGUAGETOOL_TIMEOUT,
      ...config,
    };

    this.client =
      client ??
      createHttpClient({
        baseURL: this.config.apiUrl,
        timeout: this.config.timeout || HTTP_TIMEOUTS.STANDARD,
      });
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.client.get('/v2/languages', { timeout: HTTP_TIMEOUTS.SHORT });
      return response.status === 200;
    } catch (error) {
      logger.debug({ error, apiUrl: this.config.apiUrl }, 'LanguageTool not available');
      return false;
    }
  }

  async check(text: string, signal?: AbortSignal): Promise<LanguageToolMatch[]> {
    const body = new URLSearchParams({ text, language: this.config.language });
    const response = await this.client.post('/v2/check', body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      signal,
    });

    const parsed = CheckResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ExternalServiceError('LanguageTool', 'Unexpected response body from /v2/check', {
        reason: 'invalid_response',
        apiUrl: this.config.apiUrl,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data.matches;
  }

  getConfig(): LanguageToolConfig {
    return { ...this.config };
  }
}
