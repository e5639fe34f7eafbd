import type { ProviderAdapter, RetryOptions } from '@mender/adapters';
import { OracleError, toError, type Logger, type ModelRequest } from '@mender/shared';

export type OracleResult = { ok: true; text: string } | { ok: false; error: OracleError };

export interface OracleCallOptions {
  runId: string;
  abortSignal?: AbortSignal;
}

/**
 * The code-generation backend as the remediation loop sees it. Never throws.
 */
export interface Oracle {
  readonly id: string;
  propose(request: ModelRequest, options: OracleCallOptions): Promise<OracleResult>;
}

export interface ProviderOracleOptions {
  logger: Logger;
  /** Deadline for one oracle call, retries included */
  timeoutMs: number;
  retryOptions?: RetryOptions;
}

export class ProviderOracle implements Oracle {
  readonly id: string;

  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly options: ProviderOracleOptions,
  ) {
    this.id = adapter.id();
  }

  async propose(request: ModelRequest, options: OracleCallOptions): Promise<OracleResult> {
    try {
      const response = await this.adapter.generate(request, {
        runId: options.runId,
        logger: this.options.logger,
        abortSignal: options.abortSignal,
        timeoutMs: this.options.timeoutMs,
        retryOptions: this.options.retryOptions,
      });
      return { ok: true, text: response.text ?? '' };
    } catch (error) {
      if (error instanceof OracleError) return { ok: false, error };
      const cause = toError(error);
      return {
        ok: false,
        error: new OracleError(`${this.id} request failed: ${cause.message}`, { cause }),
      };
    }
  }
}
