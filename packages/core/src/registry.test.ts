import { describe, expect, it, vi } from 'vitest';
import {
  ConfigError,
  ConfigSchema,
  type ConfigInput,
  type ModelResponse,
  type ProviderCapabilities,
} from '@mender/shared';
import { FakeAdapter, type ProviderAdapter } from '@mender/adapters';
import { ProviderRegistry, createDefaultRegistry } from './registry';

class MockAdapter implements ProviderAdapter {
  id() {
    return 'mock';
  }
  capabilities(): ProviderCapabilities {
    return { supportsStreaming: false, latencyClass: 'fast' };
  }
  async generate(): Promise<ModelResponse> {
    return { text: '' };
  }
}

const configWith = (input: ConfigInput) => ConfigSchema.parse(input);

describe('ProviderRegistry', () => {
  it('creates adapters through the registered factory and caches them', () => {
    const registry = new ProviderRegistry(configWith({ providers: { local: { type: 'mock', model: 'm1' } } }));
    const factory = vi.fn(() => new MockAdapter());
    registry.registerFactory('mock', factory);

    const first = registry.getAdapter('local');
    const second = registry.getAdapter('local');

    expect(first).toBeInstanceOf(MockAdapter);
    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ type: 'mock', model: 'm1' }));
  });

  it('rejects an unconfigured provider', () => {
    const registry = new ProviderRegistry(configWith({ providers: { local: { type: 'mock', model: 'm1' } } }));

    expect(() => registry.getAdapter('cloud')).toThrow(ConfigError);
    expect(() => registry.getAdapter('cloud')).toThrow("Provider 'cloud' not found. Configured providers: local");
  });

  it('rejects a provider type without a factory', () => {
    const registry = new ProviderRegistry(configWith({ providers: { local: { type: 'mystery', model: 'm1' } } }));
    registry.registerFactory('mock', () => new MockAdapter());

    expect(() => registry.getAdapter('local')).toThrow(
      "Unknown provider type 'mystery' for provider 'local'. Known types: mock",
    );
  });

  describe('resolveOracle', () => {
    it('falls back to defaults.oracle', () => {
      const registry = new ProviderRegistry(
        configWith({ providers: { local: { type: 'mock', model: 'm1' } }, defaults: { oracle: 'local' } }),
      );
      registry.registerFactory('mock', () => new MockAdapter());

      const resolved = registry.resolveOracle();

      expect(resolved.providerId).toBe('local');
      expect(resolved.adapter.id()).toBe('mock');
    });

    it('prefers the explicit id', () => {
      const registry = new ProviderRegistry(
        configWith({
          providers: { local: { type: 'mock', model: 'm1' }, other: { type: 'mock', model: 'm2' } },
          defaults: { oracle: 'local' },
        }),
      );
      registry.registerFactory('mock', () => new MockAdapter());

      expect(registry.resolveOracle('other').providerId).toBe('other');
    });

    it('fails when no oracle is selected', () => {
      const registry = new ProviderRegistry(configWith({}));

      expect(() => registry.resolveOracle()).toThrow(/No oracle selected/);
    });
  });

  it('createDefaultRegistry knows the bundled types', () => {
    const registry = createDefaultRegistry(
      configWith({ providers: { scripted: { type: 'fake', model: 'none', responses: ['a'] } } }),
    );

    expect(registry.registeredTypes()).toEqual(['openai', 'anthropic', 'fake']);
    expect(registry.getAdapter('scripted')).toBeInstanceOf(FakeAdapter);
  });
});
