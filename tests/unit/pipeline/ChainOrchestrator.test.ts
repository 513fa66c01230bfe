import { describe, it, expect } from 'vitest';
import { ChainOrchestrator } from '../../../src/services/pipeline/ChainOrchestrator.js';
import { ExecutionContext } from '../../../src/services/pipeline/ExecutionContext.js';
import type { ContentOnlyStage } from '../../../src/services/pipeline/interfaces/ICorrectionStage.js';
import type { ExecutionRecord } from '../../../src/services/pipeline/types/ExecutionRecord.js';
import type { Document } from '../../../src/services/document/types/Document.js';
import { blockContents } from '../../../src/services/document/blocks.js';
import { InvariantViolationError, StageExecutionError } from '../../../src/types/errors.js';
import {
  contentStage,
  countingStage,
  failingStage,
  parseMarkdown,
  replaceWordStage,
} from '../../helpers/stages.js';

const SOURCE = '# Title\n\nTeh cat sat.\n\nA dog ran.\n';

describe('ChainOrchestrator', () => {
  const orchestrator = new ChainOrchestrator();

  it('records zero changes for a stage that changes nothing', async () => {
    const document = parseMarkdown(SOURCE);
    const context = new ExecutionContext();

    const result = await orchestrator.run(document, [contentStage('noop', (content) => content)], context);

    expect(result.status).toBe('completed');
    expect(blockContents(result.document)).toEqual(['Teh cat sat.', 'A dog ran.']);
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ stage: 'noop', changes: 0, status: 'ok', error: null });
  });

  it('counts changed blocks for content-only stages', async () => {
    const document = parseMarkdown(SOURCE, '/books/doc.md');
    const context = new ExecutionContext();

    const result = await orchestrator.run(document, [replaceWordStage('Teh', 'The')], context);

    expect(blockContents(result.document)).toEqual(['The cat sat.', 'A dog ran.']);
    expect(result.records[0]).toMatchObject({
      stage: 'replace-Teh',
      sourceFile: 'doc.md',
      changes: 1,
      status: 'ok',
      error: null,
    });
    expect(result.records[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('keeps the tree and metadata references across stages', async () => {
    const document = parseMarkdown(SOURCE);
    const context = new ExecutionContext();

    const result = await orchestrator.run(
      document,
      [replaceWordStage('Teh', 'The'), contentStage('upper', (content) => content.toUpperCase())],
      context
    );

    expect(result.document.tree).toBe(document.tree);
    result.document.blocks.forEach((block, index) => {
      expect(block.metadata).toBe(document.blocks[index]?.metadata);
    });
    expect(blockContents(result.document)).toEqual(['THE CAT SAT.', 'A DOG RAN.']);
  });

  it('uses the reported count for counting stages', async () => {
    const document = parseMarkdown(SOURCE);
    const context = new ExecutionContext();

    const result = await orchestrator.run(document, [countingStage('counted', 7, { typos_fixed: 7 })], context);

    expect(result.records[0]).toMatchObject({ stage: 'counted', changes: 7, details: { typos_fixed: 7 } });
  });

  it('rejects a negative change count as an invariant violation', async () => {
    const document = parseMarkdown(SOURCE);
    const context = new ExecutionContext();

    await expect(orchestrator.run(document, [countingStage('bad-count', -1)], context)).rejects.toBeInstanceOf(
      InvariantViolationError
    );
    expect(context.executionRecords).toHaveLength(0);
  });

  describe('failure policy', () => {
    it('continues with pre-failure content under skip', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext({ failurePolicy: 'skip' });

      const result = await orchestrator.run(
        document,
        [failingStage('broken'), replaceWordStage('Teh', 'The')],
        context
      );

      expect(result.status).toBe('completed_with_failures');
      expect(result.failedStages).toEqual(['broken']);
      expect(result.completedStages).toEqual(['replace-Teh']);
      expect(result.records).toHaveLength(2);
      expect(result.records[0]).toMatchObject({
        stage: 'broken',
        changes: null,
        status: 'failed',
        error: "Stage 'broken' failed: boom",
      });
      expect(blockContents(result.document)).toEqual(['The cat sat.', 'A dog ran.']);
    });

    it('rethrows a StageExecutionError under abort', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext({ failurePolicy: 'abort' });
      const neverRun = replaceWordStage('Teh', 'The');

      const run = orchestrator.run(document, [failingStage('broken', 'service down'), neverRun], context);

      await expect(run).rejects.toBeInstanceOf(StageExecutionError);
      expect(context.executionRecords).toHaveLength(1);
      expect(context.executionRecords[0]?.error).toBe("Stage 'broken' failed: service down");
    });

    it('lets a stage override the run policy', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext({ failurePolicy: 'skip' });

      await expect(
        orchestrator.run(document, [failingStage('critical', 'boom', 'abort')], context)
      ).rejects.toThrow("Stage 'critical' failed: boom");
    });

    it('discards in-place edits made by a stage that then fails', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext();
      const mutateThenFail: ContentOnlyStage = {
        name: 'mutate-then-fail',
        capability: 'content-only',
        apply: async (input: Document) => {
          for (const block of input.blocks) {
            block.content = 'damaged';
          }
          throw new Error('half way');
        },
      };

      const result = await orchestrator.run(document, [mutateThenFail], context);

      expect(blockContents(result.document)).toEqual(['Teh cat sat.', 'A dog ran.']);
      expect(blockContents(document)).toEqual(['Teh cat sat.', 'A dog ran.']);
    });
  });

  describe('invariants', () => {
    it('fails immediately when a stage drops a block', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext({ failurePolicy: 'skip' });
      const dropper: ContentOnlyStage = {
        name: 'dropper',
        capability: 'content-only',
        apply: async (input: Document) => ({ ...input, blocks: input.blocks.slice(1) }),
      };

      await expect(orchestrator.run(document, [dropper], context)).rejects.toThrow(
        "Stage 'dropper' violated block invariants: block count changed"
      );
      expect(context.executionRecords).toHaveLength(0);
    });

    it('fails when a stage replaces block metadata', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext();
      const rebuilder: ContentOnlyStage = {
        name: 'rebuilder',
        capability: 'content-only',
        apply: async (input: Document) => ({
          ...input,
          blocks: input.blocks.map((block) => ({ content: block.content, metadata: { copied: true } })),
        }),
      };

      await expect(orchestrator.run(document, [rebuilder], context)).rejects.toBeInstanceOf(InvariantViolationError);
    });

    it('fails when a stage reorders blocks', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext();
      const reverser: ContentOnlyStage = {
        name: 'reverser',
        capability: 'content-only',
        apply: async (input: Document) => ({ ...input, blocks: [...input.blocks].reverse() }),
      };

      await expect(orchestrator.run(document, [reverser], context)).rejects.toThrow(
        'block metadata changed or blocks were reordered'
      );
    });
  });

  describe('cancellation', () => {
    it('runs nothing when the context is already cancelled', async () => {
      const document = parseMarkdown(SOURCE);
      const controller = new AbortController();
      controller.abort(new Error('stopped by user'));
      const context = new ExecutionContext({ signal: controller.signal });

      const result = await orchestrator.run(document, [replaceWordStage('Teh', 'The')], context);

      expect(result.status).toBe('cancelled');
      expect(result.records).toHaveLength(0);
      expect(result.skippedStages).toEqual(['replace-Teh']);
      expect(result.document).toBe(document);
      expect(context.cancellationReason).toBe('stopped by user');
    });

    it('stops between stages and keeps the last successful output', async () => {
      const document = parseMarkdown(SOURCE);
      const controller = new AbortController();
      const context = new ExecutionContext({ signal: controller.signal });
      const fixThenCancel = contentStage('fix-then-cancel', (content) => {
        controller.abort();
        return content.replace('Teh', 'The');
      });

      const result = await orchestrator.run(
        document,
        [fixThenCancel, contentStage('upper', (content) => content.toUpperCase()), failingStage('later')],
        context
      );

      expect(result.status).toBe('cancelled');
      expect(result.completedStages).toEqual(['fix-then-cancel']);
      expect(result.skippedStages).toEqual(['upper', 'later']);
      expect(blockContents(result.document)).toEqual(['The cat sat.', 'A dog ran.']);
    });

    it('ends the chain when a stage fails because the run timed out', async () => {
      const document = parseMarkdown(SOURCE);
      const context = new ExecutionContext({ timeoutMs: 20, failurePolicy: 'abort' });
      const slow: ContentOnlyStage = {
        name: 'slow',
        capability: 'content-only',
        apply: (_input, stageContext) =>
          new Promise<Document>((_resolve, reject) => {
            stageContext.signal.addEventListener('abort', () => reject(stageContext.signal.reason));
          }),
      };

      const result = await orchestrator.run(document, [slow, replaceWordStage('Teh', 'The')], context);
      context.dispose();

      expect(result.status).toBe('cancelled');
      expect(result.skippedStages).toEqual(['replace-Teh']);
      const [record] = result.records;
      expect(record).toMatchObject<Partial<ExecutionRecord>>({
        stage: 'slow',
        status: 'failed',
        error: "Stage 'slow' failed: Pipeline run timed out after 20ms",
      });
    });
  });
});
