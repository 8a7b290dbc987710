import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError, ProviderConfigSchema } from '@promptctx/shared';
import { createProviderAdapter, FakeAdapter, OpenAIAdapter, type ProviderAdapter } from './index';

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = { completions: { create: vi.fn() } };
    },
    APIError: class extends Error {},
    APIConnectionTimeoutError: class extends Error {},
  };
});

describe('createProviderAdapter', () => {
  const originalKey = process.env.PROMPTCTX_TEST_KEY;

  beforeEach(() => {
    delete process.env.PROMPTCTX_TEST_KEY;
  });

  afterEach(() => {
    if (originalKey === undefined) {
      delete process.env.PROMPTCTX_TEST_KEY;
    } else {
      process.env.PROMPTCTX_TEST_KEY = originalKey;
    }
  });

  it('creates the fake adapter', () => {
    const adapter = createProviderAdapter(ProviderConfigSchema.parse({ type: 'fake', model: 'fake' }));
    expect(adapter).toBeInstanceOf(FakeAdapter);
    expect(adapter.id()).toBe('fake');
  });

  it('creates the OpenAI adapter with a key from the environment', () => {
    process.env.PROMPTCTX_TEST_KEY = 'test-secret';
    const adapter = createProviderAdapter(
      ProviderConfigSchema.parse({ type: 'openai', api_key_env: 'PROMPTCTX_TEST_KEY' }),
    );
    expect(adapter).toBeInstanceOf(OpenAIAdapter);
  });

  it('fails with ConfigError when the OpenAI key is missing', () => {
    expect(() =>
      createProviderAdapter(ProviderConfigSchema.parse({ type: 'openai', api_key_env: 'PROMPTCTX_TEST_KEY' })),
    ).toThrow(ConfigError);
  });

  it('uses custom factories', () => {
    const custom: ProviderAdapter = {
      id: () => 'custom',
      generate: async () => ({ text: 'hi' }),
    };
    const adapter = createProviderAdapter(ProviderConfigSchema.parse({ type: 'fake' }), {
      fake: () => custom,
    });
    expect(adapter).toBe(custom);
  });

  it('rejects types without a factory', () => {
    expect(() => createProviderAdapter(ProviderConfigSchema.parse({ type: 'fake' }), {})).toThrow(
      'Unknown provider type: fake',
    );
  });
});
