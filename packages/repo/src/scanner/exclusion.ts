import type { ExclusionConfig, FileNode, IgnoreMatcher } from './types';

/**
 * Decides which directories and files take part in a scan.
 */
export class ExclusionPolicy {
  constructor(
    private readonly config: ExclusionConfig,
    private readonly matcher: IgnoreMatcher | null = null,
  ) {}

  get excludeDocComments(): boolean {
    return this.config.excludeDocComments;
  }

  isDirectoryExcluded(node: FileNode): boolean {
    return (
      node.isDirectory &&
      (this.config.excludedDirectoryNames.has(node.name) || this.isFileExcluded(node))
    );
  }

  /** Only ignore rules exclude files; without a matcher nothing is excluded. */
  isFileExcluded(node: FileNode): boolean {
    if (!this.config.useGitignore || !this.matcher) {
      return false;
    }
    return this.matcher.matches(node.path, node.isDirectory);
  }

  isFileIncluded(node: FileNode): boolean {
    if (node.isDirectory || !node.extension) {
      return false;
    }
    return (
      this.config.includedFileExtensions.has(node.extension.toLowerCase()) &&
      !this.isFileExcluded(node)
    );
  }
}

/**
 * Normalises raw settings into an {@link ExclusionConfig} snapshot.
 * Extensions are lowercased and may be given with or without a leading dot.
 */
export function toExclusionConfig(settings: {
  excludedDirectories: readonly string[];
  includedFileExtensions: readonly string[];
  useGitignore: boolean;
  excludeDocComments: boolean;
}): ExclusionConfig {
  return {
    excludedDirectoryNames: new Set(settings.excludedDirectories),
    includedFileExtensions: new Set(
      settings.includedFileExtensions.map((ext) => ext.replace(/^\./, '').toLowerCase()),
    ),
    useGitignore: settings.useGitignore,
    excludeDocComments: settings.excludeDocComments,
  };
}
