import * as fs from 'fs/promises';
import * as path from 'path';
import { UsageError } from '@promptctx/shared';

export * from './scanner';
export * from './tokens/counter';

/**
 * Files whose presence marks a project root, checked in order.
 */
export const PROJECT_ROOT_MARKERS = [
  '.git',
  'package.json',
  'pom.xml',
  'build.gradle',
  'settings.gradle',
  'pyproject.toml',
  'go.mod',
  'Cargo.toml',
] as const;

/**
 * Finds the project root starting from the current directory: the nearest
 * parent containing one of {@link PROJECT_ROOT_MARKERS}.
 */
export async function findProjectRoot(cwd: string = process.cwd()): Promise<string> {
  const root = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await isProjectRoot(currentDir)) {
      return currentDir;
    }

    if (currentDir === root) {
      break;
    }
    currentDir = path.dirname(currentDir);
  }

  throw new UsageError(
    `Could not detect project root from ${cwd}. Ensure you are inside a git repository or a directory with a build file.`,
  );
}

async function isProjectRoot(dir: string): Promise<boolean> {
  for (const marker of PROJECT_ROOT_MARKERS) {
    if (await exists(path.join(dir, marker))) {
      return true;
    }
  }
  return false;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
