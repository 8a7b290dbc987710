import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_EXCLUDED_DIRECTORIES } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});

    expect(config.configVersion).toBe(1);
    expect(config.scanner.excludedDirectories).toEqual(DEFAULT_EXCLUDED_DIRECTORIES);
    expect(config.scanner.useGitignore).toBe(true);
    expect(config.scanner.excludeDocComments).toBe(false);
    expect(config.scanner.maxTokens).toBe(128_000);
    expect(config.provider).toEqual({
      type: 'openai',
      model: 'gpt-4o-mini',
      temperature: 0.7,
      topP: 0.9,
      maxRetries: 3,
      timeoutSeconds: 60,
    });
    expect(config.conversation.maxMessages).toBe(10);
    expect(config.logging.level).toBe('info');
  });

  it('keeps explicit values', () => {
    const config = ConfigSchema.parse({
      scanner: { includedFileExtensions: ['java'], excludeDocComments: true },
      provider: { type: 'fake', model: 'scripted' },
    });

    expect(config.scanner.includedFileExtensions).toEqual(['java']);
    expect(config.scanner.excludeDocComments).toBe(true);
    expect(config.provider.type).toBe('fake');
  });

  it('rejects invalid budgets and unknown providers', () => {
    expect(ConfigSchema.safeParse({ scanner: { maxTokens: 0 } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ provider: { type: 'other' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ conversation: { maxMessages: -1 } }).success).toBe(false);
  });
});
