/**
 * Pipeline Layer
 *
 * Stage contract, execution context, chain orchestration and run wiring.
 */

export { ChainOrchestrator } from './ChainOrchestrator.js';
export { ExecutionContext, LoggerExecutionSink } from './ExecutionContext.js';
export { PipelineRunner } from './PipelineRunner.js';
export {
  StageRegistry,
  ChainOptionsSchema,
  DEFAULT_CHAIN,
  MODEL_MODES,
  MODEL_MODE_CHAINS,
} from './StageRegistry.js';
export { assertBlockInvariants, assertChangeCount } from './invariants.js';

export type { ChainResult, ChainStatus } from './ChainOrchestrator.js';
export type { ExecutionContextOptions } from './ExecutionContext.js';
export type { PipelineRunOptions, PipelineRunSummary, PipelineRunnerDependencies } from './PipelineRunner.js';
export type {
  ChainOptions,
  ModelMode,
  ResolvedChain,
  ResolvedStageOptions,
  StageDependencies,
  StageFactory,
} from './StageRegistry.js';
export type {
  CorrectionStage,
  ContentOnlyStage,
  CountingStage,
  FailurePolicy,
  StageCapability,
  StageContext,
  StageResult,
} from './interfaces/ICorrectionStage.js';
export type { ExecutionLogSink, ExecutionRecord, ExecutionStatus } from './types/ExecutionRecord.js';
