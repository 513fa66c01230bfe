/**
 * StageRegistry - named stage factories and chain assembly
 *
 * Turns a stage selection (explicit list, model mode, or the default chain)
 * into configured stage instances, and probes the ones backed by an external
 * model or service before the run starts.
 */

import { z } from 'zod';
import type { CorrectionStage } from './interfaces/ICorrectionStage.js';
import type { ILanguageToolClient } from '../languagetool/LanguageToolClient.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { LanguageToolClient } from '../languagetool/LanguageToolClient.js';
import { OllamaProvider } from '../llm/OllamaProvider.js';
import { SpellingCorrectionStage } from '../correction/SpellingCorrectionStage.js';
import { GrammarCorrectionStage } from '../correction/GrammarCorrectionStage.js';
import { ModelCorrectionStage } from '../correction/ModelCorrectionStage.js';
import { TtsNormalizationStage } from '../correction/TtsNormalizationStage.js';
import { getEnv } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { ConfigurationError, StageUnavailableError } from '../../types/errors.js';

export const MODEL_MODES = ['replace', 'hybrid', 'supplement'] as const;
export type ModelMode = (typeof MODEL_MODES)[number];

export const DEFAULT_CHAIN: readonly string[] = ['spelling', 'grammar', 'tts'];

export const MODEL_MODE_CHAINS: Readonly<Record<ModelMode, readonly string[]>> = {
  replace: ['model', 'tts'],
  hybrid: ['model', 'spelling', 'grammar', 'tts'],
  supplement: ['spelling', 'grammar', 'model', 'tts'],
};

export const ChainOptionsSchema = z
  .object({
    /** Explicit ordered stage names; mutually exclusive with modelMode */
    stages: z.array(z.string().min(1)).optional(),
    modelMode: z.enum(MODEL_MODES).optional(),
    temperature: z.number().min(0).max(2).optional(),
    concurrency: z.number().int().min(1).optional(),
    language: z.string().min(2).optional(),
    model: z.string().min(1).optional(),
    /** Check model/service availability before running (default true) */
    probe: z.boolean().optional(),
  })
  .strict();

export type ChainOptions = z.infer<typeof ChainOptionsSchema>;

export interface ResolvedStageOptions {
  temperature: number;
  concurrency: number;
  language: string;
  model: string;
}

/**
 * Service handles shared by the stages a registry builds. Missing handles are
 * created from the environment on first use.
 */
export interface StageDependencies {
  languageTool?: ILanguageToolClient;
  llm?: LLMProvider;
}

export type StageFactory = (options: ResolvedStageOptions, deps: Required<StageDependencies>) => CorrectionStage;

export interface ResolvedChain {
  names: string[];
  /** Selected by the caller (stage list or model mode) rather than the default chain */
  explicit: boolean;
}

export class StageRegistry {
  private readonly factories = new Map<string, StageFactory>();

  constructor(private readonly deps: StageDependencies = {}) {
    this.register('spelling', () => new SpellingCorrectionStage());
    this.register(
      'grammar',
      (options, services) => new GrammarCorrectionStage({ client: services.languageTool, concurrency: options.concurrency })
    );
    this.register(
      'model',
      (options, services) =>
        new ModelCorrectionStage({
          provider: services.llm,
          temperature: options.temperature,
          concurrency: options.concurrency,
          model: options.model,
        })
    );
    this.register('tts', () => new TtsNormalizationStage());
  }

  register(name: string, factory: StageFactory): void {
    this.factories.set(name, factory);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Validate options and work out which stages to run, in order
   *
   * @throws ConfigurationError on invalid options, conflicting selections or duplicates
   * @throws StageUnavailableError on an unknown stage name
   */
  resolveChain(options: ChainOptions = {}): ResolvedChain {
    const parsed = this.parseOptions(options);

    if (parsed.stages && parsed.modelMode) {
      throw new ConfigurationError('Choose either an explicit stage list or a model mode, not both', {
        stages: parsed.stages,
        modelMode: parsed.modelMode,
      });
    }

    const names = parsed.stages ?? (parsed.modelMode ? MODEL_MODE_CHAINS[parsed.modelMode] : DEFAULT_CHAIN);
    const seen = new Set<string>();
    for (const name of names) {
      if (!this.has(name)) {
        throw new StageUnavailableError(name, `unknown stage; available stages are ${this.names().join(', ')}`);
      }
      if (seen.has(name)) {
        throw new ConfigurationError(`Stage '${name}' is listed more than once`, { stages: names });
      }
      seen.add(name);
    }

    return { names: [...names], explicit: parsed.stages !== undefined || parsed.modelMode !== undefined };
  }

  /**
   * Build the configured stage chain. Stages in the default chain that fail
   * their probe are dropped with a warning; requested stages must pass.
   */
  async buildChain(options: ChainOptions = {}): Promise<CorrectionStage[]> {
    const { names, explicit } = this.resolveChain(options);
    const resolved = this.resolveOptions(options);
    const services = this.services(resolved);

    const stages: CorrectionStage[] = [];
    for (const name of names) {
      const factory = this.factories.get(name);
      if (!factory) {
        throw new StageUnavailableError(name, 'unknown stage');
      }
      const stage = factory(resolved, services);

      if (options.probe !== false && stage.probe && !(await stage.probe())) {
        if (explicit) {
          throw new StageUnavailableError(name, 'backing model or service did not respond');
        }
        logger.warn({ stage: name }, '[StageRegistry] Stage unavailable, dropping it from the default chain');
        continue;
      }
      stages.push(stage);
    }

    logger.debug({ stages: stages.map((stage) => stage.name), explicit }, '[StageRegistry] Built stage chain');
    return stages;
  }

  private parseOptions(options: ChainOptions): ChainOptions {
    const result = ChainOptionsSchema.safeParse(options);
    if (!result.success) {
      throw new ConfigurationError('Invalid stage options', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }
    return result.data;
  }

  private resolveOptions(options: ChainOptions): ResolvedStageOptions {
    const env = getEnv();
    return {
      temperature: options.temperature ?? env.CORRECTION_TEMPERATURE,
      concurrency: options.concurrency ?? env.CORRECTION_CONCURRENCY,
      language: options.language ?? env.LANGUAGETOOL_LANGUAGE,
      model: options.model ?? env.OLLAMA_MODEL,
    };
  }

  private services(options: ResolvedStageOptions): Required<StageDependencies> {
    return {
      languageTool: this.deps.languageTool ?? new LanguageToolClient({ language: options.language }),
      llm: this.deps.llm ?? new OllamaProvider({ model: options.model }),
    };
  }
}
