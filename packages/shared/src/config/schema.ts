import { z } from 'zod';

export const DEFAULT_EXCLUDED_DIRECTORIES = [
  'build',
  '.git',
  'bin',
  '.gradle',
  '.idea',
  'target',
  '__pycache__',
  'node_modules',
  'dist',
  'out',
  'coverage',
];

export const DEFAULT_INCLUDED_EXTENSIONS = [
  'java',
  'kt',
  'groovy',
  'scala',
  'ts',
  'tsx',
  'js',
  'jsx',
  'mjs',
  'py',
  'go',
  'rs',
  'c',
  'h',
  'cpp',
  'cs',
  'rb',
  'php',
  'swift',
  'html',
  'css',
  'scss',
  'xml',
  'json',
  'yaml',
  'yml',
  'md',
  'sql',
  'sh',
];

export const ScannerConfigSchema = z.object({
  excludedDirectories: z.array(z.string()).default(DEFAULT_EXCLUDED_DIRECTORIES),
  includedFileExtensions: z
    .array(z.string().min(1))
    .default(DEFAULT_INCLUDED_EXTENSIONS)
    .describe('File extensions (without the dot) that are added to the project context'),
  useGitignore: z.boolean().default(true),
  excludeDocComments: z.boolean().default(false),
  maxTokens: z
    .number()
    .int()
    .positive()
    .default(128_000)
    .describe('Window context budget for the assembled project context'),
});

export const ProviderConfigSchema = z.object({
  type: z.enum(['openai', 'fake']).default('openai'),
  model: z.string().default('gpt-4o-mini'),
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(0.9),
  maxRetries: z.number().int().min(0).default(3),
  timeoutSeconds: z.number().positive().default(60),
});

export const ConversationConfigSchema = z.object({
  maxMessages: z.number().int().positive().default(10),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  eventsFile: z
    .string()
    .optional()
    .describe('When set, structured events are appended to this JSONL file'),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scanner: ScannerConfigSchema.default({}),
  provider: ProviderConfigSchema.default({}),
  conversation: ConversationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ConversationConfig = z.infer<typeof ConversationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
