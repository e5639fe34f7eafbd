import { beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, MemoryLogger, OracleError } from '@mender/shared';
import { FakeAdapter } from './adapter';
import type { AdapterContext } from '../types';

const request = { messages: [{ role: 'user' as const, content: 'fix it' }] };

describe('FakeAdapter', () => {
  let ctx: AdapterContext;

  beforeEach(() => {
    ctx = { runId: 'test-run', logger: new MemoryLogger() };
  });

  it('replays scripted responses in order and records requests', async () => {
    const adapter = new FakeAdapter(['first', 'second']);

    expect((await adapter.generate(request, ctx)).text).toBe('first');
    expect((await adapter.generate(request, ctx)).text).toBe('second');
    expect(adapter.requests).toHaveLength(2);
    expect(adapter.remaining()).toBe(0);
  });

  it('throws scripted errors', async () => {
    const adapter = new FakeAdapter([new OracleError('backend down'), 'ok']);

    await expect(adapter.generate(request, ctx)).rejects.toThrow('backend down');
    expect((await adapter.generate(request, ctx)).text).toBe('ok');
  });

  it('computes a response from the request', async () => {
    const adapter = new FakeAdapter([(req) => `echo:${req.messages[0].content}`]);

    expect((await adapter.generate(request, ctx)).text).toBe('echo:fix it');
  });

  it('fails once the script is exhausted', async () => {
    const adapter = new FakeAdapter(['only']);
    await adapter.generate(request, ctx);

    await expect(adapter.generate(request, ctx)).rejects.toThrow(
      'Fake adapter script exhausted after 1 calls',
    );
  });

  it('can repeat the last response', async () => {
    const adapter = new FakeAdapter(['same'], { repeatLast: true });
    await adapter.generate(request, ctx);

    expect((await adapter.generate(request, ctx)).text).toBe('same');
  });

  it('builds from a provider entry', async () => {
    const adapter = FakeAdapter.fromConfig({ type: 'fake', model: 'none', responses: ['a'] });

    expect((await adapter.generate(request, ctx)).text).toBe('a');
  });

  it('rejects malformed provider entries', () => {
    expect(() => FakeAdapter.fromConfig({ type: 'fake', model: 'none', responses: 'a' })).toThrow(
      ConfigError,
    );
  });
});
