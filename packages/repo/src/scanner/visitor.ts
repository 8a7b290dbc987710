import type { FileNode } from './types';

/**
 * Outcome of visiting one node.
 * - `continue`: descend into the node (directories) and carry on
 * - `skip-subtree`: do not descend, carry on with siblings
 * - `stop`: end the whole traversal
 */
export type VisitResult = 'continue' | 'skip-subtree' | 'stop';

export type FileVisitor = (node: FileNode) => VisitResult | Promise<VisitResult>;

/**
 * Depth-first, pre-order traversal starting at (and including) `root`.
 * @returns `'stopped'` when a visitor ended the traversal early
 */
export async function visitRecursively(
  root: FileNode,
  visitor: FileVisitor,
): Promise<'completed' | 'stopped'> {
  const result = await visitor(root);
  if (result === 'stop') return 'stopped';
  if (result === 'skip-subtree' || !root.isDirectory) return 'completed';

  for (const child of await root.children()) {
    if ((await visitRecursively(child, visitor)) === 'stopped') {
      return 'stopped';
    }
  }
  return 'completed';
}
