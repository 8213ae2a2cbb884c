// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseProvider } from './base.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';
import { GoogleProvider } from './google.js';
import { OllamaProvider } from './ollama.js';
import { PROVIDER_IDS, type ProviderId } from '../constants.js';
import { ConfigurationError, UnknownProviderError } from '../errors.js';
import type { ProviderSettings, ResolvedConfig } from '../config/types.js';

export { BaseProvider } from './base.js';
export type { SendOptions } from './base.js';
export { OpenAIProvider } from './openai.js';
export { AnthropicProvider } from './anthropic.js';
export { GoogleProvider } from './google.js';
export { OllamaProvider } from './ollama.js';
export { mapProviderError, errorFromStatus } from './error-mapping.js';
export { calculateDelay, sleep } from './retry.js';
export type { BackoffOptions } from './retry.js';

/** Provider factory function type */
export type ProviderFactory = (settings: ProviderSettings) => BaseProvider;

/** Factories for the built-in providers */
const providerFactories: Record<ProviderId, ProviderFactory> = {
  openai: (settings) => new OpenAIProvider(settings),
  anthropic: (settings) => new AnthropicProvider(settings),
  google: (settings) => new GoogleProvider(settings),
  ollama: (settings) => new OllamaProvider(settings),
};

/**
 * Mapping from provider identifier to adapter instance.
 * Adding a provider means registering one more adapter.
 */
export class ProviderRegistry {
  private providers = new Map<string, BaseProvider>();

  /**
   * Register an adapter under its own name.
   */
  register(provider: BaseProvider): this {
    const name = provider.getName();
    if (this.providers.has(name)) {
      throw new ConfigurationError(`Provider '${name}' is already registered`);
    }
    this.providers.set(name, provider);
    return this;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  get(name: string): BaseProvider | undefined {
    return this.providers.get(name);
  }

  /**
   * Look up an adapter, failing with UnknownProviderError when none is registered.
   */
  resolve(name: string): BaseProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new UnknownProviderError(name, this.names());
    }
    return provider;
  }

  /**
   * Get list of registered provider names.
   */
  names(): string[] {
    return Array.from(this.providers.keys());
  }

  list(): BaseProvider[] {
    return Array.from(this.providers.values());
  }
}

/**
 * Create one built-in adapter from its settings.
 */
export function createProvider(id: ProviderId, settings: ProviderSettings): BaseProvider {
  return providerFactories[id](settings);
}

/**
 * Build a registry holding every built-in provider, configured from the
 * resolved config. Settings are shared by reference, not copied.
 */
export function createProviderRegistry(config: ResolvedConfig): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const id of PROVIDER_IDS) {
    registry.register(createProvider(id, config.providers[id]));
  }
  return registry;
}
