import path from 'node:path';

/**
 * Deepest directory that is an ancestor of (or equal to) every given
 * directory. `undefined` for an empty list or for directories on different
 * filesystem roots.
 */
export function findHighestCommonRoot(directories: readonly string[]): string | undefined {
  const unique = [...new Set(directories.map((dir) => path.resolve(dir)))];
  if (unique.length === 0) return undefined;

  const fsRoot = path.parse(unique[0]).root;
  if (unique.some((dir) => path.parse(dir).root !== fsRoot)) {
    return undefined;
  }

  const segmentLists = unique.map((dir) =>
    path.relative(fsRoot, dir).split(path.sep).filter(Boolean),
  );
  const common: string[] = [];
  for (let i = 0; i < segmentLists[0].length; i++) {
    const segment = segmentLists[0][i];
    if (!segmentLists.every((segments) => segments[i] === segment)) break;
    common.push(segment);
  }
  return path.join(fsRoot, ...common);
}
