import path from 'node:path';
import type { Project } from './types';

export interface ProjectOptions {
  name?: string;
  contentRoots?: string[];
  isInContent?: (filePath: string) => boolean;
}

/** Whether a `path.relative` result points above or away from its base. */
export function leavesBase(relative: string): boolean {
  return (
    relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)
  );
}

export function isWithin(parent: string, child: string): boolean {
  return !leavesBase(path.relative(parent, child));
}

/**
 * Builds a project rooted at `baseDir`. Without explicit content roots the
 * base directory is the only one, and every file under a content root counts
 * as project content.
 */
export function createProject(baseDir: string, options: ProjectOptions = {}): Project {
  const resolvedBase = path.resolve(baseDir);
  const contentRoots = (options.contentRoots ?? [resolvedBase]).map((root) =>
    path.resolve(resolvedBase, root),
  );

  return {
    name: options.name ?? path.basename(resolvedBase),
    baseDir: resolvedBase,
    contentRoots,
    isInContent:
      options.isInContent ??
      ((filePath: string) => contentRoots.some((root) => isWithin(root, filePath))),
  };
}
