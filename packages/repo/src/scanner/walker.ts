import { toError } from '@promptctx/shared';
import type { TokenCounter } from '../tokens/counter';
import { stripDocComments } from './doc-comments';
import type { ExclusionPolicy } from './exclusion';
import type { FileNode, Project } from './types';
import { visitRecursively, type VisitResult } from './visitor';

export interface ContentWalkerOptions {
  project: Project;
  policy: ExclusionPolicy;
  tokenCounter: TokenCounter;
  /** The walk stops once the running token count reaches this value */
  maxTokens: number;
}

export interface WalkOutcome {
  content: string;
  /** Running token count over the processed file texts */
  tokens: number;
  fileCount: number;
  skippedFileCount: number;
  skippedDirectoryCount: number;
  stoppedEarly: boolean;
}

export function fileHeader(filePath: string): string {
  return `\n--- ${filePath} ---\n`;
}

/**
 * Collects the contents of every included file under a directory, each
 * preceded by a header naming its absolute path.
 */
export class ContentWalker {
  constructor(private readonly options: ContentWalkerOptions) {}

  async walk(root: FileNode): Promise<WalkOutcome> {
    const { project, policy, tokenCounter, maxTokens } = this.options;
    const parts: string[] = [];
    const outcome: WalkOutcome = {
      content: '',
      tokens: 0,
      fileCount: 0,
      skippedFileCount: 0,
      skippedDirectoryCount: 0,
      stoppedEarly: false,
    };

    const visit = async (node: FileNode): Promise<VisitResult> => {
      if (node.isDirectory) {
        if (policy.isDirectoryExcluded(node)) {
          outcome.skippedDirectoryCount++;
          return 'skip-subtree';
        }
        return 'continue';
      }

      if (
        !project.isInContent(node.path) ||
        policy.isFileExcluded(node) ||
        !policy.isFileIncluded(node)
      ) {
        outcome.skippedFileCount++;
        return 'continue';
      }

      outcome.fileCount++;
      parts.push(fileHeader(node.path));

      let text: string;
      try {
        text = await node.readText();
      } catch (error) {
        parts.push(`Error reading file: ${toError(error).message}\n`);
        return 'continue';
      }

      const processed = policy.excludeDocComments ? stripDocComments(text) : text;
      parts.push(processed, '\n');
      outcome.tokens += tokenCounter.count(processed);

      return outcome.tokens >= maxTokens ? 'stop' : 'continue';
    };

    outcome.stoppedEarly = (await visitRecursively(root, visit)) === 'stopped';
    outcome.content = parts.join('');
    return outcome;
  }
}
