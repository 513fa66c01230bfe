/**
 * OutputReconstructor - write corrected blocks back into the tree and serialize
 *
 * Rendering is all-or-nothing: every block is resolved and written before the
 * tree is serialized, and the output file is only written from a fully
 * rendered buffer.
 */

import { writeFile, mkdir } from 'fs/promises';
import * as path from 'path';
import type { Document } from './types/Document.js';
import { AppError, ReconstructionError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * `<dir>/<name>_corrected<ext>` beside the input
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_corrected${parsed.ext}`);
}

export class OutputReconstructor {
  /**
   * Write every block's content into its node and serialize the tree.
   *
   * @throws ReconstructionError when a block's metadata does not resolve
   */
  async render(document: Document): Promise<Buffer> {
    const { tree } = document;

    document.blocks.forEach((block, index) => {
      let node: unknown;
      try {
        node = tree.resolve(block.metadata);
      } catch (error) {
        if (error instanceof ReconstructionError) {
          throw new ReconstructionError(`Block ${index} cannot be placed back: ${error.message}`, {
            ...error.context,
            blockIndex: index,
            sourcePath: document.sourcePath,
          });
        }
        throw error;
      }
      tree.write(node, block.content);
    });

    try {
      return await tree.serialize();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new ReconstructionError(
        `Failed to serialize ${document.format} document: ${error instanceof Error ? error.message : String(error)}`,
        { sourcePath: document.sourcePath }
      );
    }
  }

  /**
   * Render and write to `outputPath`. Nothing is written if rendering fails.
   */
  async writeOutput(document: Document, outputPath: string): Promise<{ outputPath: string; bytes: number }> {
    const output = await this.render(document);

    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, output);

    logger.info(
      { sourcePath: document.sourcePath, outputPath, bytes: output.length, blockCount: document.blocks.length },
      '[OutputReconstructor] Wrote reconstructed document'
    );

    return { outputPath, bytes: output.length };
  }
}
