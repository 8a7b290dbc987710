import { ConfigError, type ProviderConfig } from '@promptctx/shared';
import type { ProviderAdapter } from './adapter';
import { FakeAdapter } from './fake/adapter';
import { OpenAIAdapter } from './openai/adapter';

/**
 * Factory function type for creating provider adapters.
 */
export type AdapterFactory = (config: ProviderConfig) => ProviderAdapter;

export const adapterFactories: Record<ProviderConfig['type'], AdapterFactory> = {
  openai: (config) => new OpenAIAdapter(config),
  fake: (config) => new FakeAdapter(config),
};

/**
 * Creates the adapter for the configured provider type.
 * @throws {ConfigError} For unknown types or incomplete provider settings
 */
export function createProviderAdapter(
  config: ProviderConfig,
  factories: Partial<Record<string, AdapterFactory>> = adapterFactories,
): ProviderAdapter {
  const factory = factories[config.type];
  if (!factory) {
    throw new ConfigError(`Unknown provider type: ${config.type}`);
  }
  return factory(config);
}
