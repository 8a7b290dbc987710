import pc from 'picocolors';
import { formatNumber, formatTokenCount } from '@promptctx/repo';

export interface ScanOutput {
  project: string;
  rootDir: string;
  maxTokens: number;
  tokenCount: number;
  fileCount: number;
  skippedFileCount: number;
  skippedDirectoryCount: number;
  notifications: string[];
}

export interface AskOutput {
  provider: string;
  model: string;
  /** `null` when the prompt was cancelled */
  reply: string | null;
  messageCount: number;
  contextTokens?: number;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  private render(data: object): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /** Assembled project context goes to stdout untouched so it can be piped. */
  content(text: string): void {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }

  scanSummary(data: ScanOutput): void {
    if (this.isJson) {
      this.render(data);
      return;
    }

    for (const message of data.notifications) {
      console.error(pc.yellow(message));
    }
    console.error(
      pc.bold(`\n${data.project}: `) +
        `${formatNumber(data.tokenCount)} tokens (${formatTokenCount(data.tokenCount, 'tokens')})`,
    );
    console.error(`  Files: ${data.fileCount} added, ${data.skippedFileCount} skipped`);
    console.error(`  Directories skipped: ${data.skippedDirectoryCount}`);
    if (data.tokenCount > data.maxTokens) {
      console.error(
        pc.red(`  Exceeds the window context of ${formatNumber(data.maxTokens)} tokens.`),
      );
      console.error(
        `  Exclude directories or extensions in ${pc.cyan('.promptctx.yaml')} or raise ${pc.cyan('--max-tokens')}.`,
      );
    }
  }

  answer(data: AskOutput): void {
    if (this.isJson) {
      this.render(data);
      return;
    }

    if (data.reply === null) {
      console.error(pc.gray('Prompt cancelled.'));
      return;
    }
    console.log(data.reply);
  }

  /** Progress lines; silent in JSON mode. */
  log(message: string): void {
    if (!this.isJson) {
      console.error(pc.gray(message));
    }
  }
}
