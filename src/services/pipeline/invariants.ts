import type { Document } from '../document/types/Document.js';
import { InvariantViolationError } from '../../types/errors.js';

/**
 * Check that a stage handed back a document aligned with the one it received:
 * same tree, format and source, same block count, and the same metadata
 * reference at every index.
 *
 * @throws InvariantViolationError on the first mismatch
 */
export function assertBlockInvariants(stage: string, before: Document, after: Document | null | undefined): void {
  if (!after || !Array.isArray(after.blocks)) {
    throw new InvariantViolationError(stage, 'stage did not return a document with blocks');
  }
  if (after.tree !== before.tree) {
    throw new InvariantViolationError(stage, 'document tree was replaced');
  }
  if (after.format !== before.format || after.sourcePath !== before.sourcePath) {
    throw new InvariantViolationError(stage, 'document format or source path changed', {
      format: after.format,
      sourcePath: after.sourcePath,
    });
  }
  if (after.blocks.length !== before.blocks.length) {
    throw new InvariantViolationError(stage, 'block count changed', {
      before: before.blocks.length,
      after: after.blocks.length,
    });
  }

  for (let index = 0; index < before.blocks.length; index++) {
    const previous = before.blocks[index];
    const next = after.blocks[index];
    if (!previous || !next || next.metadata !== previous.metadata) {
      throw new InvariantViolationError(stage, 'block metadata changed or blocks were reordered', {
        blockIndex: index,
      });
    }
    if (typeof next.content !== 'string') {
      throw new InvariantViolationError(stage, 'block content is not a string', { blockIndex: index });
    }
  }
}

export function assertChangeCount(stage: string, changeCount: unknown): number {
  if (typeof changeCount !== 'number' || !Number.isInteger(changeCount) || changeCount < 0) {
    throw new InvariantViolationError(stage, 'reported change count is not a non-negative integer', {
      changeCount: String(changeCount),
    });
  }
  return changeCount;
}
