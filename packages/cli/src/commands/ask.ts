import * as fs from 'fs/promises';
import { Command } from 'commander';
import { createProviderAdapter, type ProviderAdapter } from '@promptctx/adapters';
import { PromptExecutionService, type EditorInfo } from '@promptctx/core';
import { createProject, findProjectRoot, type Project } from '@promptctx/repo';
import {
  ProviderConfigSchema,
  UsageError,
  type Config,
  type ConfigInput,
  type Logger,
  type ProviderConfig,
} from '@promptctx/shared';
import { OutputRenderer } from '../output/renderer';
import { scanProject } from './scan';
import { createLogger, globalOptions, loadConfig } from './shared';

export interface PromptCommandOptions {
  selection?: string;
  language?: string;
  withProject?: boolean | string;
  provider?: string;
  model?: string;
}

export interface PromptSetup {
  config: Config;
  logger: Logger;
  provider: ProviderAdapter;
  service: PromptExecutionService;
  editorInfo: EditorInfo;
  context?: string;
  contextTokens?: number;
}

const ProviderTypeSchema = ProviderConfigSchema.shape.type.removeDefault();

function providerFlags(options: PromptCommandOptions): ConfigInput {
  let type: ProviderConfig['type'] | undefined;
  if (options.provider !== undefined) {
    const parsed = ProviderTypeSchema.safeParse(options.provider);
    if (!parsed.success) {
      throw new UsageError(
        `Invalid --provider "${options.provider}". Must be one of: ${ProviderTypeSchema.options.join(', ')}.`,
      );
    }
    type = parsed.data;
  }
  return { provider: { type, model: options.model } };
}

async function readSelection(file: string | undefined): Promise<string | undefined> {
  if (!file) {
    return undefined;
  }
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new UsageError(`Cannot read selection file: ${file}`, { cause: error });
  }
}

/**
 * Working directory for configuration lookup: the project root when one can
 * be detected, the current directory otherwise.
 */
async function configRoot(project: Project | undefined): Promise<string> {
  if (project) {
    return project.baseDir;
  }
  const cwd = process.cwd();
  return findProjectRoot(cwd).catch((error: unknown) => {
    if (error instanceof UsageError) {
      return cwd;
    }
    throw error;
  });
}

/**
 * Loads configuration, the provider and, with `--with-project`, the
 * scanned project context shared by `ask` and `chat`.
 */
export async function preparePrompt(
  program: Command,
  options: PromptCommandOptions,
): Promise<PromptSetup> {
  const globalOpts = globalOptions(program);

  let project: Project | undefined;
  if (options.withProject) {
    const dir = typeof options.withProject === 'string' ? options.withProject : undefined;
    project = dir ? createProject(dir) : createProject(await findProjectRoot(process.cwd()));
  }

  const config = loadConfig(program, await configRoot(project), providerFlags(options));
  const logger = createLogger(config, Boolean(globalOpts.verbose));
  const provider = createProviderAdapter(config.provider);
  const service = new PromptExecutionService({
    maxMessages: config.conversation.maxMessages,
    logger,
  });

  const editorInfo: EditorInfo = {
    language: options.language,
    selectedText: await readSelection(options.selection),
  };

  if (!project) {
    return { config, logger, provider, service, editorInfo };
  }
  const { result } = await scanProject(project, config, logger, false);
  return {
    config,
    logger,
    provider,
    service,
    editorInfo,
    context: result.content,
    contextTokens: result.tokenCount,
  };
}

export function addPromptOptions(command: Command): Command {
  return command
    .option('--selection <file>', 'File whose content is sent as the selected code')
    .option('--language <name>', 'Language of the selected code')
    .option('--with-project [dir]', 'Attach the scanned project context')
    .option('--provider <type>', 'Override the provider type (openai, fake)')
    .option('--model <name>', 'Override the model name');
}

export function registerAskCommand(program: Command) {
  addPromptOptions(
    program
      .command('ask')
      .argument('<prompt>', 'The question to ask')
      .description('Send one prompt, with optional selection and project context'),
  ).action(async (prompt: string, options: PromptCommandOptions) => {
    const globalOpts = globalOptions(program);
    const renderer = new OutputRenderer(Boolean(globalOpts.json));
    const setup = await preparePrompt(program, options);

    if (globalOpts.verbose) {
      renderer.log(`Asking ${setup.config.provider.type}/${setup.config.provider.model}`);
    }

    const reply = await setup.service.executeQuery({
      userPrompt: prompt,
      editorInfo: setup.editorInfo,
      context: setup.context,
      provider: setup.provider,
    });

    renderer.answer({
      provider: setup.provider.id(),
      model: setup.config.provider.model,
      reply: reply ? reply.content : null,
      messageCount: setup.service.messages().length,
      contextTokens: setup.contextTokens,
    });
  });
}
