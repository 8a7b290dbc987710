import * as fs from 'fs/promises';
import type { PromptCtxEvent } from '../types/events';
import { redact } from '../redaction';
import { formatBindings, type Logger } from './types';

/**
 * Appends structured events, with secrets redacted, to a JSON Lines file.
 * Human-readable messages still go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: PromptCtxEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging never fails the scan or prompt that produced the event.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
