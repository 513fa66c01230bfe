import type { Logger } from 'pino';
import type { Document } from '../../document/types/Document.js';

export type FailurePolicy = 'abort' | 'skip';

/**
 * Declared result shape of a stage. The orchestrator branches on this flag,
 * never on the value a stage returns.
 */
export type StageCapability = 'content-only' | 'content+changeCount';

/**
 * Result of a stage that reports its own change count
 */
export interface StageResult {
  document: Document;
  changeCount: number;
  /** Stage-specific statistics, e.g. fixes per category */
  details?: Record<string, number>;
}

/**
 * What a stage may see of the running pipeline
 */
export interface StageContext {
  readonly runId: string;
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

interface StageBase {
  readonly name: string;
  /** Overrides the run's failure policy for this stage */
  readonly failurePolicy?: FailurePolicy;
  /**
   * Whether the stage's backing model or service can be used right now
   */
  probe?(): Promise<boolean>;
}

export interface ContentOnlyStage extends StageBase {
  readonly capability: 'content-only';
  apply(document: Document, context: StageContext): Promise<Document>;
}

export interface CountingStage extends StageBase {
  readonly capability: 'content+changeCount';
  apply(document: Document, context: StageContext): Promise<StageResult>;
}

/**
 * A pluggable unit that rewrites block content. Stages must return the same
 * number of blocks, in the same order, with the same metadata references.
 */
export type CorrectionStage = ContentOnlyStage | CountingStage;
