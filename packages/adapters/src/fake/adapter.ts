import { z } from 'zod';
import {
  ConfigError,
  OracleError,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
} from '@mender/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/**
 * One scripted reply: a response text, an error to throw, or a function of the request.
 */
export type FakeStep = string | Error | ((request: ModelRequest) => string | Promise<string>);

const FakeProviderOptionsSchema = z.object({
  responses: z.array(z.string()).default([]),
  /** Replay the last response once the script runs out */
  repeatLast: z.boolean().default(false),
});

/**
 * Scripted oracle. Each `generate` call consumes the next step; requests are kept
 * in `requests` for inspection.
 *
 * As a configured provider (`type: fake`) it reads `responses` and `repeatLast`
 * from the provider entry.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private readonly steps: FakeStep[];
  private readonly repeatLast: boolean;
  private last?: FakeStep;

  constructor(steps: FakeStep[] = [], options: { repeatLast?: boolean } = {}) {
    this.steps = [...steps];
    this.repeatLast = options.repeatLast ?? false;
  }

  static fromConfig(config: ProviderConfig): FakeAdapter {
    const parsed = FakeProviderOptionsSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigError(`Invalid fake provider options: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return new FakeAdapter(parsed.data.responses, { repeatLast: parsed.data.repeatLast });
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsStreaming: false,
      latencyClass: 'fast',
    };
  }

  /** Steps not yet consumed. */
  remaining(): number {
    return this.steps.length;
  }

  async generate(request: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);
    if (ctx.abortSignal?.aborted) {
      throw new OracleError('Request aborted');
    }

    const step = this.steps.shift() ?? (this.repeatLast ? this.last : undefined);
    if (step === undefined) {
      throw new OracleError(`Fake adapter script exhausted after ${this.requests.length - 1} calls`);
    }
    this.last = step;

    if (step instanceof Error) {
      throw step;
    }
    const text = typeof step === 'function' ? await step(request) : step;
    return { text };
  }
}
