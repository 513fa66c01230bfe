export type ExecutionStatus = 'ok' | 'failed';

/**
 * One record per stage invocation
 */
export interface ExecutionRecord {
  stage: string;
  /** Base name of the input file */
  sourceFile: string;
  changes: number | null;
  durationMs: number;
  status: ExecutionStatus;
  error: string | null;
  details?: Record<string, number>;
}

/**
 * Destination for execution records (structured log, JSON file, test collector)
 */
export interface ExecutionLogSink {
  write(record: ExecutionRecord): void;
}
