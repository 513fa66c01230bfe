/**
 * Structural tree abstraction shared by the Markdown and EPUB variants.
 *
 * A tree owns the parsed document structure. Blocks refer into it through
 * opaque metadata; only the output reconstructor calls `write`.
 */
export interface StructuralTree<TMeta, TNode = unknown> {
  /**
   * Locate the node a block's metadata points at.
   * @throws ReconstructionError when the reference no longer resolves
   */
  resolve(metadata: TMeta): TNode;

  /**
   * Replace the text payload of a resolved node. Writing the text the node
   * already carries leaves its original bytes untouched.
   */
  write(node: TNode, text: string): void;

  /**
   * Serialize the tree, including every write, to the format's bytes.
   */
  serialize(): Promise<Buffer>;
}
