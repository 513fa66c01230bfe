/**
 * PipelineRunner - one document through parse, correct and rebuild
 */

import * as path from 'path';
import type { Logger } from 'pino';
import type { CorrectionStage, FailurePolicy } from './interfaces/ICorrectionStage.js';
import type { ExecutionLogSink, ExecutionRecord } from './types/ExecutionRecord.js';
import type { DocumentFormat } from '../document/types/Document.js';
import type { ChainOptions } from './StageRegistry.js';
import type { ChainStatus } from './ChainOrchestrator.js';
import { DocumentLoader } from '../document/DocumentLoader.js';
import { OutputReconstructor, defaultOutputPath } from '../document/OutputReconstructor.js';
import { StageRegistry } from './StageRegistry.js';
import { ChainOrchestrator } from './ChainOrchestrator.js';
import { ExecutionContext } from './ExecutionContext.js';
import { getEnv } from '../../config/env.js';
import { runContext } from '../../utils/logger.js';

export interface PipelineRunOptions {
  inputPath: string;
  /** Default: `<name>_corrected<ext>` beside the input */
  outputPath?: string;
  /** Overrides extension-based format detection */
  format?: DocumentFormat;
  /** Stage selection and options, resolved through the registry */
  chain?: ChainOptions;
  /** Ready-made stages; bypasses the registry */
  stages?: CorrectionStage[];
  failurePolicy?: FailurePolicy;
  timeoutMs?: number;
  signal?: AbortSignal;
  sinks?: ExecutionLogSink[];
  runId?: string;
  logger?: Logger;
}

export interface PipelineRunSummary {
  runId: string;
  inputPath: string;
  outputPath: string;
  format: DocumentFormat;
  status: ChainStatus;
  blockCount: number;
  records: ExecutionRecord[];
  completedStages: string[];
  failedStages: string[];
  skippedStages: string[];
  bytesWritten: number;
  durationMs: number;
}

export interface PipelineRunnerDependencies {
  loader?: DocumentLoader;
  registry?: StageRegistry;
  orchestrator?: ChainOrchestrator;
  reconstructor?: OutputReconstructor;
}

export class PipelineRunner {
  private readonly loader: DocumentLoader;
  private readonly registry: StageRegistry;
  private readonly orchestrator: ChainOrchestrator;
  private readonly reconstructor: OutputReconstructor;

  constructor(deps: PipelineRunnerDependencies = {}) {
    this.loader = deps.loader ?? new DocumentLoader();
    this.registry = deps.registry ?? new StageRegistry();
    this.orchestrator = deps.orchestrator ?? new ChainOrchestrator();
    this.reconstructor = deps.reconstructor ?? new OutputReconstructor();
  }

  /**
   * Parse the input, run the stage chain and write the reconstructed document.
   *
   * Parse, configuration, invariant and reconstruction errors propagate, as
   * does a stage failure under the `abort` policy; no output is written then.
   */
  async run(options: PipelineRunOptions): Promise<PipelineRunSummary> {
    const env = getEnv();
    const startTime = Date.now();

    const document = await this.loader.load(options.inputPath, options.format);
    const stages = options.stages ?? (await this.registry.buildChain(options.chain));

    const context = new ExecutionContext({
      runId: options.runId,
      failurePolicy: options.failurePolicy ?? env.FAILURE_POLICY,
      timeoutMs: options.timeoutMs ?? env.PIPELINE_TIMEOUT_MS,
      signal: options.signal,
      sinks: options.sinks,
      logger: options.logger,
    });

    try {
      return await runContext.run({ runId: context.runId, sourceFile: path.basename(options.inputPath) }, async () => {
        const result = await this.orchestrator.run(document, stages, context);
        if (result.status === 'cancelled') {
          context.logger.warn(
            { reason: context.cancellationReason, skippedStages: result.skippedStages },
            '[PipelineRunner] Run cancelled, writing output of the last successful stage'
          );
        }

        const outputPath = options.outputPath ?? defaultOutputPath(options.inputPath);
        const written = await this.reconstructor.writeOutput(result.document, outputPath);

        const summary: PipelineRunSummary = {
          runId: context.runId,
          inputPath: options.inputPath,
          outputPath: written.outputPath,
          format: document.format,
          status: result.status,
          blockCount: document.blocks.length,
          records: result.records,
          completedStages: result.completedStages,
          failedStages: result.failedStages,
          skippedStages: result.skippedStages,
          bytesWritten: written.bytes,
          durationMs: Date.now() - startTime,
        };

        context.logger.info(
          {
            status: summary.status,
            outputPath: summary.outputPath,
            blockCount: summary.blockCount,
            durationMs: summary.durationMs,
          },
          '[PipelineRunner] Run finished'
        );
        return summary;
      });
    } finally {
      context.dispose();
    }
  }
}
