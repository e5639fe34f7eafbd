import { ConfigError, type Config, type ProviderConfig } from '@mender/shared';
import {
  AnthropicAdapter,
  FakeAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
  type ProviderAdapterFactory,
} from '@mender/adapters';

/**
 * Resolved oracle: the provider id from configuration and its adapter.
 */
export interface ResolvedOracle {
  providerId: string;
  adapter: ProviderAdapter;
}

/**
 * Registry for oracle adapters.
 * Maps provider types to factories and caches one adapter per configured provider.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config);
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
 *
 * const { adapter } = registry.resolveOracle('local');
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, ProviderAdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(private config: Config) {}

  /**
   * @param type - The provider type identifier (e.g., 'openai', 'anthropic')
   */
  registerFactory(type: string, factory: ProviderAdapterFactory): void {
    this.factories.set(type, factory);
  }

  registeredTypes(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Get the adapter for a configured provider, creating it on first use.
   * @throws {ConfigError} If the provider is not configured or its type has no factory
   */
  getAdapter(providerId: string): ProviderAdapter {
    const cached = this.adapters.get(providerId);
    if (cached) {
      return cached;
    }

    const providerConfig: ProviderConfig | undefined = this.config.providers[providerId];
    if (!providerConfig) {
      const known = Object.keys(this.config.providers);
      throw new ConfigError(
        `Provider '${providerId}' not found. Configured providers: ${known.length > 0 ? known.join(', ') : 'none'}`,
      );
    }

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new ConfigError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'. Known types: ${this.registeredTypes().join(', ')}`,
      );
    }

    const adapter = factory(providerConfig);
    this.adapters.set(providerId, adapter);
    return adapter;
  }

  /**
   * Resolve the oracle for a run: the explicit id when given, otherwise `defaults.oracle`.
   */
  resolveOracle(providerId?: string): ResolvedOracle {
    const id = providerId ?? this.config.defaults.oracle;
    if (!id) {
      throw new ConfigError(
        'No oracle selected. Pass --oracle <provider> or set defaults.oracle (or MENDER_ORACLE).',
      );
    }
    return { providerId: id, adapter: this.getAdapter(id) };
  }
}

/**
 * Registry with the bundled adapter types: `openai` (also any OpenAI-compatible
 * endpoint through `base_url`), `anthropic` and `fake`.
 */
export function createDefaultRegistry(config: Config): ProviderRegistry {
  const registry = new ProviderRegistry(config);
  registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
  registry.registerFactory('anthropic', (cfg) => new AnthropicAdapter(cfg));
  registry.registerFactory('fake', (cfg) => FakeAdapter.fromConfig(cfg));
  return registry;
}
