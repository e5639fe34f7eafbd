import type { ModelRequest, ModelResponse, ProviderCapabilities, ProviderConfig } from '@mender/shared';
import type { AdapterContext } from './types';

/**
 * Interface for oracle adapters.
 * Adapters give the remediation loop one way to talk to every code-generation backend.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   capabilities() { return { supportsStreaming: false, latencyClass: 'fast' }; }
 *   async generate(req, ctx) { return { text: 'response' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  id(): string;
  capabilities(): ProviderCapabilities;
  /**
   * Generate a response from the model.
   * Implementations throw on transport or backend failure; an empty `text` is a valid response.
   */
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}

export type ProviderAdapterFactory = (config: ProviderConfig) => ProviderAdapter;
