import type { ExclusionPolicy } from './exclusion';
import type { FileNode } from './types';

const INDENT = '  ';

/**
 * Renders an indented outline of the included files under `node`, one entry
 * per line, directories suffixed with `/`. Excluded directories are omitted
 * together with everything below them.
 */
export async function renderSourceTree(
  node: FileNode,
  policy: ExclusionPolicy,
  depth = 0,
): Promise<string> {
  if (policy.isFileExcluded(node) || policy.isDirectoryExcluded(node)) {
    return '';
  }

  const indent = INDENT.repeat(depth);
  let result = `${indent}${node.name}/\n`;

  for (const child of await node.children()) {
    if (child.isDirectory) {
      result += await renderSourceTree(child, policy, depth + 1);
    } else if (policy.isFileIncluded(child)) {
      result += `${indent}${INDENT}${child.name}\n`;
    }
  }

  return result;
}
