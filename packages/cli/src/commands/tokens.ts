import { Command } from 'commander';
import { OutputRenderer } from '../output/renderer';
import { runScanCommand, toScanOutput, type ScanCommandOptions } from './scan';
import { globalOptions } from './shared';

export function registerTokensCommand(program: Command) {
  program
    .command('tokens')
    .argument('[dir]', 'Directory to measure (defaults to the detected project root)')
    .description('Count the tokens a project would add to the prompt context')
    .option('--max-tokens <n>', 'Window context to compare against')
    .option('--no-gitignore', 'Do not apply the .gitignore rules')
    .option('--strip-docs', 'Remove documentation comments before counting')
    .action(async (dir: string | undefined, options: ScanCommandOptions) => {
      const renderer = new OutputRenderer(Boolean(globalOptions(program).json));
      const run = await runScanCommand(program, dir, options, true);
      renderer.scanSummary(toScanOutput(run));
    });
}
