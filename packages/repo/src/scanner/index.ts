import { randomUUID } from 'node:crypto';
import nodeFs from 'node:fs/promises';
import {
  alwaysReady,
  eventEnvelope,
  logger as defaultLogger,
  nextTickExecutor,
  runWhenReady,
  ScanError,
  toError,
  type CallbackExecutor,
  type Logger,
  type ReadinessGate,
} from '@promptctx/shared';
import { TiktokenCounter, type TokenCounter } from '../tokens/counter';
import { findHighestCommonRoot } from './common-root';
import { ExclusionPolicy } from './exclusion';
import { loadFileNode, type Fs } from './file-tree';
import { loadGitignoreMatcher } from './ignore-matcher';
import { LoggerNotificationSink } from './notifications';
import { renderSourceTree } from './tree';
import { truncateToTokens } from './truncate';
import type {
  ExclusionConfig,
  NotificationSink,
  Project,
  ScanContentResult,
  ScanRequest,
} from './types';
import { ContentWalker } from './walker';

export * from './types';
export * from './common-root';
export * from './doc-comments';
export * from './exclusion';
export * from './file-tree';
export * from './format';
export * from './ignore-matcher';
export * from './notifications';
export * from './project';
export * from './tree';
export * from './truncate';
export * from './utils';
export * from './visitor';
export * from './walker';

export const DIRECTORY_STRUCTURE_HEADER = 'Directory Structure:\n';
export const FILE_CONTENTS_HEADER = '\n\nFile Contents:\n';

export interface ProjectScannerOptions {
  /** Called once per scan for a fresh settings snapshot */
  settings: () => ExclusionConfig;
  tokenCounter?: TokenCounter;
  notifications?: NotificationSink;
  logger?: Logger;
  /** Scans wait for this gate before touching the file system */
  readiness?: ReadinessGate;
  /** Context the scan result is delivered on */
  deliver?: CallbackExecutor;
  fs?: Fs;
}

/**
 * Assembles a directory outline plus file contents for a project, bounded
 * by a token budget.
 *
 * @example
 * ```typescript
 * const scanner = new ProjectScanner({ settings: () => exclusionConfig });
 * const result = await scanner.scanProject(createProject('/work/demo'), { maxTokens: 8000 });
 * ```
 */
export class ProjectScanner {
  private readonly settings: () => ExclusionConfig;
  private readonly tokenCounter: TokenCounter;
  private readonly logger: Logger;
  private readonly notifications: NotificationSink;
  private readonly readiness: ReadinessGate;
  private readonly deliver: CallbackExecutor;
  private readonly fs: Fs;

  constructor(options: ProjectScannerOptions) {
    this.settings = options.settings;
    this.tokenCounter = options.tokenCounter ?? new TiktokenCounter();
    this.logger = options.logger ?? defaultLogger;
    this.notifications = options.notifications ?? new LoggerNotificationSink(this.logger);
    this.readiness = options.readiness ?? alwaysReady;
    this.deliver = options.deliver ?? nextTickExecutor;
    this.fs = options.fs ?? nodeFs;
  }

  /**
   * Scans `request.startDirectory`, or the common root of the project's
   * content roots when none is given.
   *
   * Rejects with {@link ScanError} when no start directory is given and the
   * project has no content roots.
   */
  scanProject(project: Project, request: ScanRequest): Promise<ScanContentResult> {
    return runWhenReady(this.readiness, () => this.runScan(project, request), this.deliver);
  }

  private async runScan(project: Project, request: ScanRequest): Promise<ScanContentResult> {
    const runId = randomUUID();
    const startTime = Date.now();
    const isTokenCalculation = request.isTokenCalculation ?? false;
    const scanLogger = this.logger.child({ project: project.name });

    try {
      const config = this.settings();
      const ignoreRoot = request.startDirectory ?? project.baseDir;
      const matcher = config.useGitignore
        ? await loadGitignoreMatcher(ignoreRoot, scanLogger, this.fs)
        : null;
      const policy = new ExclusionPolicy(config, matcher);

      const rootDir = request.startDirectory ?? this.resolveCommonRoot(project);
      await scanLogger.log({
        ...eventEnvelope(runId),
        type: 'ScanStarted',
        payload: { rootDir, maxTokens: request.maxTokens, isTokenCalculation },
      });

      const rootNode = await loadFileNode(rootDir, this.fs);
      const header =
        DIRECTORY_STRUCTURE_HEADER + (await renderSourceTree(rootNode, policy)) + FILE_CONTENTS_HEADER;

      const walker = new ContentWalker({
        project,
        policy,
        tokenCounter: this.tokenCounter,
        maxTokens: request.maxTokens,
      });
      const walk = await walker.walk(rootNode);
      if (walk.stoppedEarly) {
        await scanLogger.debug(`Token budget of ${request.maxTokens} reached, stopped walking ${rootDir}`);
      }

      const fullContent = header + walk.content;
      const content = isTokenCalculation
        ? fullContent
        : truncateToTokens(fullContent, request.maxTokens, {
            tokenCounter: this.tokenCounter,
            notify: (message) => this.notifications.notify(project, message),
          });

      const result: ScanContentResult = {
        content,
        tokenCount: this.tokenCounter.count(content),
        fileCount: walk.fileCount,
        skippedFileCount: walk.skippedFileCount,
        skippedDirectoryCount: walk.skippedDirectoryCount,
      };

      await scanLogger.log({
        ...eventEnvelope(runId),
        type: 'ScanCompleted',
        payload: {
          rootDir,
          tokenCount: result.tokenCount,
          fileCount: result.fileCount,
          skippedFileCount: result.skippedFileCount,
          skippedDirectoryCount: result.skippedDirectoryCount,
          durationMs: Date.now() - startTime,
        },
      });
      return result;
    } catch (error) {
      await scanLogger.log({
        ...eventEnvelope(runId),
        type: 'ScanFailed',
        payload: { error: toError(error).message },
      });
      throw error;
    }
  }

  private resolveCommonRoot(project: Project): string {
    const commonRoot = findHighestCommonRoot(project.contentRoots);
    if (!commonRoot) {
      throw new ScanError(`No content roots found for project "${project.name}"`, {
        details: { baseDir: project.baseDir },
      });
    }
    return commonRoot;
  }
}
