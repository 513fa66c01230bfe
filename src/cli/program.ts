/**
 * Command-line surface: `proofline <input> [options]`
 */

import { writeFile, mkdir } from 'fs/promises';
import * as path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import type { DocumentFormat } from '../services/document/types/Document.js';
import type { ExecutionRecord } from '../services/pipeline/types/ExecutionRecord.js';
import type { ModelMode } from '../services/pipeline/StageRegistry.js';
import { DOCUMENT_FORMATS } from '../services/document/types/Document.js';
import { MODEL_MODES } from '../services/pipeline/StageRegistry.js';
import { PipelineRunner, type PipelineRunOptions, type PipelineRunSummary } from '../services/pipeline/PipelineRunner.js';
import { AppError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export type CliOptions = {
  output?: string;
  format?: DocumentFormat;
  stages?: string[];
  modelMode?: ModelMode;
  temperature?: number;
  concurrency?: number;
  language?: string;
  model?: string;
  failFast?: boolean;
  timeout?: number;
  logJson?: string;
  probe: boolean;
};

export function parseStageList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Map parsed command-line options onto runner options
 */
export function toRunOptions(inputPath: string, options: CliOptions): PipelineRunOptions {
  return {
    inputPath: path.resolve(inputPath),
    ...(options.output && { outputPath: path.resolve(options.output) }),
    ...(options.format && { format: options.format }),
    ...(options.failFast && { failurePolicy: 'abort' as const }),
    ...(options.timeout !== undefined && { timeoutMs: options.timeout }),
    chain: {
      ...(options.stages && { stages: options.stages }),
      ...(options.modelMode && { modelMode: options.modelMode }),
      ...(options.temperature !== undefined && { temperature: options.temperature }),
      ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
      ...(options.language && { language: options.language }),
      ...(options.model && { model: options.model }),
      probe: options.probe,
    },
  };
}

export function formatSummary(summary: PipelineRunSummary): string {
  const lines = [`Status: ${summary.status}`, `Blocks: ${summary.blockCount}`];
  for (const record of summary.records) {
    const outcome = record.status === 'ok' ? `${record.changes ?? 0} changes` : `failed: ${record.error ?? 'unknown error'}`;
    lines.push(`  ${record.stage.padEnd(10)} ${outcome} (${record.durationMs}ms)`);
  }
  for (const stage of summary.skippedStages) {
    lines.push(`  ${stage.padEnd(10)} skipped`);
  }
  lines.push(`Output: ${summary.outputPath}`);
  return lines.join('\n');
}

async function writeRecords(file: string, runId: string | undefined, records: ExecutionRecord[]): Promise<void> {
  await mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await writeFile(file, `${JSON.stringify({ runId, records }, null, 2)}\n`, 'utf-8');
}

export function createProgram(runner: PipelineRunner = new PipelineRunner()): Command {
  const program = new Command();

  program
    .name('proofline')
    .description('Correct and normalize Markdown or EPUB documents for speech synthesis')
    .version('0.1.0')
    .argument('<input>', 'Markdown (.md, .markdown) or EPUB (.epub) file')
    .option('-o, --output <path>', 'Output path (default: <name>_corrected.<ext> beside the input)')
    .addOption(new Option('-f, --format <format>', 'Input format, overrides the extension').choices(DOCUMENT_FORMATS))
    .option('-s, --stages <list>', 'Comma-separated stage names, run in order', parseStageList)
    .addOption(new Option('-m, --model-mode <mode>', 'Where model correction sits in the chain').choices(MODEL_MODES))
    .option('-t, --temperature <value>', 'Sampling temperature for model correction (0-2)', parseNumber)
    .option('-c, --concurrency <n>', 'Blocks processed in parallel within a stage', parseInteger)
    .option('--language <code>', 'LanguageTool language code')
    .option('--model <name>', 'Ollama model for model correction')
    .option('--fail-fast', 'Abort the run on the first stage failure')
    .option('--timeout <ms>', 'Cancel the run after this many milliseconds', parseInteger)
    .option('--log-json <path>', 'Write the execution records to a JSON file')
    .option('--no-probe', 'Do not check model and service availability before running')
    .action(async (input: string) => {
      const options = program.opts<CliOptions>();
      const collected: ExecutionRecord[] = [];
      let runId: string | undefined;

      try {
        const summary = await runner.run({
          ...toRunOptions(input, options),
          sinks: [{ write: (record) => collected.push(record) }],
        });
        runId = summary.runId;
        console.log(formatSummary(summary));
        if (summary.status === 'cancelled') {
          process.exitCode = 1;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(
          { error: message, code: error instanceof AppError ? error.code : undefined },
          '[proofline] Run failed'
        );
        console.error(`proofline: ${message}`);
        process.exitCode = 1;
      } finally {
        if (options.logJson) {
          await writeRecords(options.logJson, runId, collected);
        }
      }
    });

  return program;
}
