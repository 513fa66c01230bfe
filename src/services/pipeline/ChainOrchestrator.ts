/**
 * ChainOrchestrator - ordered stage execution
 *
 * Runs stages strictly in sequence over a working document, timing each one,
 * recording its outcome, enforcing block invariants and applying the failure
 * policy. Stages only ever see a snapshot of the working document, so a stage
 * that fails half-way cannot leave partial edits behind.
 */

import * as path from 'path';
import { performance } from 'perf_hooks';
import type { Document } from '../document/types/Document.js';
import type { CorrectionStage } from './interfaces/ICorrectionStage.js';
import type { ExecutionRecord } from './types/ExecutionRecord.js';
import type { ExecutionContext } from './ExecutionContext.js';
import { snapshotDocument, countChangedBlocks } from '../document/blocks.js';
import { assertBlockInvariants, assertChangeCount } from './invariants.js';
import { InvariantViolationError, StageExecutionError } from '../../types/errors.js';

export type ChainStatus = 'completed' | 'completed_with_failures' | 'cancelled';

export interface ChainResult {
  /** Output of the last successful stage (the input if none succeeded) */
  document: Document;
  /** Records of this run, in stage declaration order */
  records: ExecutionRecord[];
  status: ChainStatus;
  completedStages: string[];
  failedStages: string[];
  /** Stages never started because the run was cancelled */
  skippedStages: string[];
}

interface StageOutcome {
  document: Document;
  changes: number;
  details?: Record<string, number>;
}

export class ChainOrchestrator {
  /**
   * Run `stages` in order over `document`.
   *
   * @throws StageExecutionError when a stage fails under the `abort` policy
   * @throws InvariantViolationError when a stage returns misaligned blocks
   */
  async run(document: Document, stages: readonly CorrectionStage[], context: ExecutionContext): Promise<ChainResult> {
    const sourceFile = path.basename(document.sourcePath);
    const records: ExecutionRecord[] = [];
    const completedStages: string[] = [];
    const failedStages: string[] = [];
    let skippedStages: string[] = [];
    let working = document;

    const record = (entry: ExecutionRecord) => {
      records.push(entry);
      context.record(entry);
    };

    context.logger.info(
      { sourceFile, stages: stages.map((stage) => stage.name), blockCount: document.blocks.length },
      '[ChainOrchestrator] Starting stage chain'
    );

    for (let index = 0; index < stages.length; index++) {
      const stage = stages[index];
      if (!stage) continue;

      if (context.cancelled) {
        skippedStages = stages.slice(index).map((pending) => pending.name);
        break;
      }

      context.logger.debug({ stage: stage.name, capability: stage.capability }, '[ChainOrchestrator] Invoking stage');
      const startTime = performance.now();

      let outcome: StageOutcome;
      try {
        outcome = await this.invoke(stage, working, context);
      } catch (error) {
        if (error instanceof InvariantViolationError) {
          throw error;
        }

        const stageError = error instanceof StageExecutionError ? error : new StageExecutionError(stage.name, error);
        record({
          stage: stage.name,
          sourceFile,
          changes: null,
          durationMs: Math.round(performance.now() - startTime),
          status: 'failed',
          error: stageError.message,
        });
        failedStages.push(stage.name);

        if (context.cancelled) {
          skippedStages = stages.slice(index + 1).map((pending) => pending.name);
          break;
        }

        const policy = stage.failurePolicy ?? context.failurePolicy;
        if (policy === 'abort') {
          context.logger.error({ stage: stage.name, policy }, '[ChainOrchestrator] Aborting chain after stage failure');
          throw stageError;
        }

        context.logger.warn({ stage: stage.name, policy }, '[ChainOrchestrator] Continuing with pre-stage content');
        continue;
      }

      working = snapshotDocument(outcome.document);

      record({
        stage: stage.name,
        sourceFile,
        changes: outcome.changes,
        durationMs: Math.round(performance.now() - startTime),
        status: 'ok',
        error: null,
        ...(outcome.details && { details: outcome.details }),
      });
      completedStages.push(stage.name);
    }

    const status: ChainStatus = context.cancelled
      ? 'cancelled'
      : failedStages.length > 0
        ? 'completed_with_failures'
        : 'completed';

    context.logger.info(
      { sourceFile, status, completedStages, failedStages, skippedStages },
      '[ChainOrchestrator] Stage chain finished'
    );

    return { document: working, records, status, completedStages, failedStages, skippedStages };
  }

  /**
   * Call a stage on a snapshot and normalize its result by its declared capability
   */
  private async invoke(stage: CorrectionStage, working: Document, context: ExecutionContext): Promise<StageOutcome> {
    const input = snapshotDocument(working);

    switch (stage.capability) {
      case 'content-only': {
        const result = await stage.apply(input, context);
        assertBlockInvariants(stage.name, working, result);
        return { document: result, changes: countChangedBlocks(working.blocks, result.blocks) };
      }
      case 'content+changeCount': {
        const result = await stage.apply(input, context);
        assertBlockInvariants(stage.name, working, result?.document);
        return {
          document: result.document,
          changes: assertChangeCount(stage.name, result.changeCount),
          details: result.details,
        };
      }
    }
  }
}
