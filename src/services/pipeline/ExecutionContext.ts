/**
 * ExecutionContext - state scoped to one pipeline run
 *
 * Owns the run's log sinks, the execution records collected so far, and the
 * cancellation signal (external signal and/or timeout). Create one per run and
 * dispose it when the run ends.
 */

import { randomBytes } from 'crypto';
import type { Logger } from 'pino';
import type { FailurePolicy, StageContext } from './interfaces/ICorrectionStage.js';
import type { ExecutionLogSink, ExecutionRecord } from './types/ExecutionRecord.js';
import { createChildLogger } from '../../utils/logger.js';

export interface ExecutionContextOptions {
  runId?: string;
  /** Policy for stages that do not declare their own (default: skip) */
  failurePolicy?: FailurePolicy;
  /** External cancellation */
  signal?: AbortSignal;
  /** Cancel the run after this many milliseconds; 0 or undefined disables */
  timeoutMs?: number;
  /** Extra destinations for execution records; the structured log is always written */
  sinks?: ExecutionLogSink[];
  logger?: Logger;
}

/**
 * Writes each record to the run's logger, one structured entry per stage
 */
export class LoggerExecutionSink implements ExecutionLogSink {
  constructor(private readonly log: Logger) {}

  write(record: ExecutionRecord): void {
    if (record.status === 'ok') {
      this.log.info({ ...record }, `Stage ${record.stage} executed successfully.`);
    } else {
      this.log.error({ ...record }, `Stage ${record.stage} failed.`);
    }
  }
}

export class ExecutionContext implements StageContext {
  readonly runId: string;
  readonly failurePolicy: FailurePolicy;
  readonly logger: Logger;

  private readonly controller = new AbortController();
  private readonly sinks: ExecutionLogSink[];
  private readonly records: ExecutionRecord[] = [];
  private readonly timer: NodeJS.Timeout | null;
  private readonly externalSignal?: AbortSignal;
  private readonly onExternalAbort = () => {
    this.cancel(this.externalSignal?.reason ?? new Error('Pipeline run cancelled'));
  };

  constructor(options: ExecutionContextOptions = {}) {
    this.runId = options.runId ?? `run-${Date.now()}-${randomBytes(4).toString('hex')}`;
    this.failurePolicy = options.failurePolicy ?? 'skip';
    this.logger = options.logger ?? createChildLogger({ runId: this.runId });
    this.sinks = [new LoggerExecutionSink(this.logger), ...(options.sinks ?? [])];

    this.externalSignal = options.signal;
    if (this.externalSignal?.aborted) {
      this.cancel(this.externalSignal.reason);
    } else {
      this.externalSignal?.addEventListener('abort', this.onExternalAbort, { once: true });
    }

    const timeoutMs = options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      const timeoutError = new Error(`Pipeline run timed out after ${timeoutMs}ms`);
      timeoutError.name = 'TimeoutError';
      this.timer = setTimeout(() => this.cancel(timeoutError), timeoutMs);
      this.timer.unref();
    } else {
      this.timer = null;
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Why the run was cancelled, as a message
   */
  get cancellationReason(): string | null {
    if (!this.cancelled) return null;
    const reason: unknown = this.controller.signal.reason;
    return reason instanceof Error ? reason.message : String(reason);
  }

  cancel(reason?: unknown): void {
    if (!this.controller.signal.aborted) {
      this.logger.warn({ reason: reason instanceof Error ? reason.message : reason }, 'Pipeline run cancelled');
      this.controller.abort(reason);
    }
  }

  record(record: ExecutionRecord): void {
    this.records.push(record);
    for (const sink of this.sinks) {
      sink.write(record);
    }
  }

  get executionRecords(): readonly ExecutionRecord[] {
    return this.records;
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.externalSignal?.removeEventListener('abort', this.onExternalAbort);
  }
}
