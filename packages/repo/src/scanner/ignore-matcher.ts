import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import type { Logger } from '@promptctx/shared';
import type { Fs } from './file-tree';
import { leavesBase } from './project';
import type { IgnoreMatcher } from './types';

export const GITIGNORE = '.gitignore';

/**
 * Matches absolute paths against gitignore rules anchored at `rootDir`.
 * Paths outside `rootDir` never match.
 */
export function createGitignoreMatcher(rootDir: string, rules: string): IgnoreMatcher {
  const ig = ignore().add(rules);
  const root = path.resolve(rootDir);

  return {
    matches(filePath: string, isDirectory = false): boolean {
      const relative = path.relative(root, path.resolve(filePath));
      if (!relative || leavesBase(relative)) {
        return false;
      }
      const posixPath = relative.split(path.sep).join('/');
      // Directory rules such as `secret/` only match paths with a trailing slash
      return ig.ignores(isDirectory ? `${posixPath}/` : posixPath);
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Loads `<rootDir>/.gitignore`. A missing file yields `null`; an unreadable or
 * unparsable one is logged and also yields `null`, so every file passes.
 */
export async function loadGitignoreMatcher(
  rootDir: string,
  logger: Logger,
  fs: Fs = nodeFs,
): Promise<IgnoreMatcher | null> {
  const gitignorePath = path.join(rootDir, GITIGNORE);
  try {
    const rules = await fs.readFile(gitignorePath, 'utf-8');
    return createGitignoreMatcher(rootDir, rules);
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    await logger.warn(
      `Error initializing gitignore matcher from ${gitignorePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
}
