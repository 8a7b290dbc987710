import { Command } from 'commander';
import { version } from '../package.json';
import { registerAskCommand } from './commands/ask';
import { registerChatCommand } from './commands/chat';
import { registerScanCommand } from './commands/scan';
import { registerTokensCommand } from './commands/tokens';
import { globalOptions } from './commands/shared';

import { AppError, exitCodeFor } from '@promptctx/shared';

export const name = '@promptctx/cli';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('promptctx')
    .description('Project context scanner and prompt runner')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerScanCommand(program);
  registerTokensCommand(program);
  registerAskCommand(program);
  registerChatCommand(program);

  return program;
}

export function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv` and runs the matching command.
 * @returns the process exit code
 */
export async function runCli(argv: string[], program: Command = buildProgram()): Promise<number> {
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    reportError(e, globalOptions(program));
    return exitCodeFor(e);
  }
}
