import * as fs from 'fs/promises';
import path from 'path';
import { Command } from 'commander';
import {
  CollectingNotificationSink,
  createProject,
  findProjectRoot,
  ProjectScanner,
  toExclusionConfig,
  type Project,
  type ScanContentResult,
} from '@promptctx/repo';
import type { Config, ConfigInput, Logger } from '@promptctx/shared';
import { OutputRenderer, type ScanOutput } from '../output/renderer';
import { createLogger, globalOptions, loadConfig, parsePositiveInt } from './shared';

export interface ScanCommandOptions {
  maxTokens?: string;
  calc?: boolean;
  gitignore?: boolean;
  stripDocs?: boolean;
  output?: string;
}

export interface ProjectScanRun {
  project: Project;
  config: Config;
  result: ScanContentResult;
  notifications: string[];
}

/** The project at `dir`, or at the detected project root when it is omitted. */
export async function resolveProject(dir: string | undefined): Promise<Project> {
  const baseDir = dir ? path.resolve(dir) : await findProjectRoot(process.cwd());
  return createProject(baseDir);
}

export async function scanProject(
  project: Project,
  config: Config,
  logger: Logger,
  isTokenCalculation: boolean,
): Promise<{ result: ScanContentResult; notifications: string[] }> {
  const notifications = new CollectingNotificationSink();
  const scanner = new ProjectScanner({
    settings: () => toExclusionConfig(config.scanner),
    notifications,
    logger,
  });
  const result = await scanner.scanProject(project, {
    maxTokens: config.scanner.maxTokens,
    isTokenCalculation,
  });
  return { result, notifications: notifications.messages.map((n) => n.message) };
}

function scannerFlags(options: ScanCommandOptions): ConfigInput {
  return {
    scanner: {
      maxTokens: parsePositiveInt(options.maxTokens, '--max-tokens'),
      // Only an explicit --no-gitignore overrides the config files
      useGitignore: options.gitignore === false ? false : undefined,
      excludeDocComments: options.stripDocs ? true : undefined,
    },
  };
}

export function toScanOutput(run: ProjectScanRun): ScanOutput {
  return {
    project: run.project.name,
    rootDir: run.project.baseDir,
    maxTokens: run.config.scanner.maxTokens,
    tokenCount: run.result.tokenCount,
    fileCount: run.result.fileCount,
    skippedFileCount: run.result.skippedFileCount,
    skippedDirectoryCount: run.result.skippedDirectoryCount,
    notifications: run.notifications,
  };
}

export async function runScanCommand(
  program: Command,
  dir: string | undefined,
  options: ScanCommandOptions,
  isTokenCalculation: boolean,
): Promise<ProjectScanRun> {
  const globalOpts = globalOptions(program);
  const project = await resolveProject(dir);
  const config = loadConfig(program, project.baseDir, scannerFlags(options));
  const logger = createLogger(config, Boolean(globalOpts.verbose));

  if (globalOpts.verbose) {
    new OutputRenderer(Boolean(globalOpts.json)).log(`Scanning ${project.baseDir}`);
  }
  const { result, notifications } = await scanProject(project, config, logger, isTokenCalculation);
  return { project, config, result, notifications };
}

export function registerScanCommand(program: Command) {
  program
    .command('scan')
    .argument('[dir]', 'Directory to scan (defaults to the detected project root)')
    .description('Assemble the directory tree and file contents of a project')
    .option('--max-tokens <n>', 'Window context budget in tokens')
    .option('--calc', 'Only count tokens: no truncation and no content output')
    .option('--no-gitignore', 'Do not apply the .gitignore rules')
    .option('--strip-docs', 'Remove documentation comments from file contents')
    .option('-o, --output <file>', 'Write the assembled content to a file instead of stdout')
    .action(async (dir: string | undefined, options: ScanCommandOptions) => {
      const globalOpts = globalOptions(program);
      const renderer = new OutputRenderer(Boolean(globalOpts.json));
      const calc = Boolean(options.calc);
      const run = await runScanCommand(program, dir, options, calc);

      if (!calc) {
        if (options.output) {
          await fs.writeFile(options.output, run.result.content, 'utf8');
          renderer.log(`Wrote project context to ${options.output}`);
        } else if (!globalOpts.json) {
          renderer.content(run.result.content);
        }
      }
      renderer.scanSummary(toScanOutput(run));
    });
}
