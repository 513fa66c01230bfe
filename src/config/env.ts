/**
 * Environment Variable Parsing
 *
 * Centralized, typed access to every environment variable Proofline reads.
 * Values are parsed by hand with defaults; invalid enum values fall back to
 * the default and are reported once through the logger.
 */

// Load dotenv early so variables are visible before the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

function parseEnumEnv<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T {
  if (!value) return defaultValue;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    logger.warn({ name, value, allowed }, `Invalid value for ${name}, using default '${defaultValue}'`);
    return defaultValue;
  }
  return match;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY: boolean;

  // Pipeline Configuration
  FAILURE_POLICY: 'abort' | 'skip';
  PIPELINE_TIMEOUT_MS: number;
  CORRECTION_CONCURRENCY: number;
  CORRECTION_TEMPERATURE: number;

  // LanguageTool Configuration
  LANGUAGETOOL_API_URL: string;
  LANGUAGETOOL_LANGUAGE: string;
  LANGUAGETOOL_TIMEOUT: number;

  // Ollama / Local LLM Configuration
  OLLAMA_API_URL: string;
  OLLAMA_MODEL: string;
  OLLAMA_TIMEOUT: number;
}

let cachedEnv: Env | null = null;

function loadEnv(): Env {
  return {
    NODE_ENV: parseEnumEnv('NODE_ENV', process.env.NODE_ENV, ['development', 'production', 'test'] as const, 'development'),

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: parseBooleanEnv(process.env.LOG_PRETTY, false),

    FAILURE_POLICY: parseEnumEnv('FAILURE_POLICY', process.env.FAILURE_POLICY, ['abort', 'skip'] as const, 'skip'),
    PIPELINE_TIMEOUT_MS: parseNumericEnv(process.env.PIPELINE_TIMEOUT_MS, 0),
    CORRECTION_CONCURRENCY: Math.max(1, parseNumericEnv(process.env.CORRECTION_CONCURRENCY, 1)),
    CORRECTION_TEMPERATURE: parseFloatEnv(process.env.CORRECTION_TEMPERATURE, 0.1),

    LANGUAGETOOL_API_URL: process.env.LANGUAGETOOL_API_URL || 'http://localhost:8081',
    LANGUAGETOOL_LANGUAGE: process.env.LANGUAGETOOL_LANGUAGE || 'en-US',
    LANGUAGETOOL_TIMEOUT: parseNumericEnv(process.env.LANGUAGETOOL_TIMEOUT, 10000),

    OLLAMA_API_URL: process.env.OLLAMA_API_URL || 'http://localhost:11434',
    OLLAMA_MODEL: process.env.OLLAMA_MODEL || 'grmr-v3',
    OLLAMA_TIMEOUT: parseNumericEnv(process.env.OLLAMA_TIMEOUT, 120000),
  };
}

/**
 * Get the parsed environment (cached after the first call)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
}

/**
 * Drop the cached environment so the next getEnv() re-reads process.env
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}
