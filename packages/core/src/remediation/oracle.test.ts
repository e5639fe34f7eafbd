import { describe, expect, it, vi } from 'vitest';
import { FakeAdapter, executeProviderRequest, type AdapterContext, type ProviderAdapter } from '@mender/adapters';
import { MemoryLogger, OracleError, RateLimitError, type ModelRequest, type ModelResponse, type ProviderCapabilities } from '@mender/shared';
import { ProviderOracle } from './oracle';

const request = { messages: [{ role: 'user' as const, content: 'fix it' }] };

/** Backend that never answers until the request is aborted. */
class StalledAdapter implements ProviderAdapter {
  calls = 0;

  id() {
    return 'stalled';
  }
  capabilities(): ProviderCapabilities {
    return { supportsStreaming: false, latencyClass: 'slow' };
  }
  generate(_req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'stalled', 'model', (signal) => {
      this.calls += 1;
      return new Promise<ModelResponse>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('Request was aborted.')));
      });
    });
  }
}

describe('ProviderOracle', () => {
  const logger = new MemoryLogger();

  it('returns the response text', async () => {
    const oracle = new ProviderOracle(new FakeAdapter(['patched']), { logger, timeoutMs: 1000 });

    await expect(oracle.propose(request, { runId: 'run-1' })).resolves.toEqual({ ok: true, text: 'patched' });
    expect(oracle.id).toBe('fake');
  });

  it('passes OracleErrors through as values', async () => {
    const oracle = new ProviderOracle(new FakeAdapter([]), { logger, timeoutMs: 1000 });

    const result = await oracle.propose(request, { runId: 'run-1' });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Fake adapter script exhausted after 0 calls');
  });

  it('wraps other failures in an OracleError', async () => {
    const cause = new RateLimitError('slow down');
    const oracle = new ProviderOracle(new FakeAdapter([cause]), { logger, timeoutMs: 1000 });

    const result = await oracle.propose(request, { runId: 'run-1' });

    expect(!result.ok && result.error).toBeInstanceOf(OracleError);
    expect(!result.ok && result.error.message).toBe('fake request failed: slow down');
    expect(!result.ok && result.error.cause).toBe(cause);
  });

  it('hands the timeout and run id to the adapter', async () => {
    const adapter = new FakeAdapter(['ok']);
    const generate = vi.spyOn(adapter, 'generate');
    const oracle = new ProviderOracle(adapter, { logger, timeoutMs: 2500 });

    await oracle.propose(request, { runId: 'run-7' });

    expect(generate).toHaveBeenCalledWith(request, expect.objectContaining({ runId: 'run-7', timeoutMs: 2500, logger }));
  });

  it('turns an expired timeout into a single failed call', async () => {
    const adapter = new StalledAdapter();
    const oracle = new ProviderOracle(adapter, { logger, timeoutMs: 30 });

    const result = await oracle.propose(request, { runId: 'run-1' });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('stalled request failed: Request timed out after 30ms');
    expect(adapter.calls).toBe(1);
  });
});
