import { Command } from 'commander';
import { ConfigLoader } from '@promptctx/core';
import {
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  type Config,
  type ConfigInput,
  type Logger,
} from '@promptctx/shared';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

export function loadConfig(program: Command, cwd: string, flags: ConfigInput = {}): Config {
  return ConfigLoader.load({ configPath: globalOptions(program).config, cwd, flags });
}

/**
 * Events go to the configured JSONL file when there is one; otherwise they
 * only show up on the console with --verbose.
 */
export function createLogger(config: Config, verbose: boolean): Logger {
  if (config.logging.eventsFile) {
    return new JsonlLogger(config.logging.eventsFile);
  }
  return new ConsoleLogger({ level: verbose ? 'debug' : config.logging.level });
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`Invalid ${flag} "${value}". Must be a positive integer.`);
  }
  return parsed;
}
