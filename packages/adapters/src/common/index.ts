import { ConfigError, RateLimitError, TimeoutError, eventBase } from '@mender/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry options for oracle requests.
 *
 * ## Retriable errors
 * - `RateLimitError` (HTTP 429)
 * - HTTP 5xx
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * `ConfigError`, other 4xx responses, caller aborts and timeouts fail immediately.
 * `ctx.timeoutMs` is a deadline for the whole call, retries and backoff included.
 *
 * ## Delay
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * finalDelay = max(0, delay +/- 10% jitter)
 * ```
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

function numericField(value: unknown, key: 'status' | 'statusCode'): number | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'number' ? field : undefined;
  }
  return undefined;
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const code: unknown = Reflect.get(value, 'code');
  if (typeof code === 'string') return code;
  const cause: unknown = Reflect.get(value, 'cause');
  return cause === value ? undefined : errorCode(cause);
}

/**
 * Determines if an error is transient and safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return true;
  }
  if (error instanceof TimeoutError) {
    return false;
  }

  const status = numericField(error, 'status') ?? numericField(error, 'statusCode');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = errorCode(error);
  return code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNREFUSED';
}

/**
 * Executes an oracle request with retry, timeout and abort handling,
 * logging `ProviderRequestStarted` and `ProviderRequestFinished`.
 *
 * ```typescript
 * const result = await executeProviderRequest(
 *   ctx,
 *   'anthropic',
 *   'claude-3-5-sonnet-latest',
 *   (signal) => client.messages.create({ ... }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    ...eventBase(ctx.runId),
    type: 'ProviderRequestStarted',
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const remainingMs = ctx.timeoutMs ? ctx.timeoutMs - (Date.now() - startTime) : undefined;
    if (remainingMs !== undefined && remainingMs <= 0) {
      lastError = new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`);
      break;
    }

    const abortController = new AbortController();
    const abortHandler = () => {
      abortController.abort();
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (remainingMs !== undefined) {
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
      }, remainingMs);
    }

    const cleanup = () => {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
    };

    try {
      const result = await requestFn(abortController.signal);
      cleanup();

      await ctx.logger.log({
        ...eventBase(ctx.runId),
        type: 'ProviderRequestFinished',
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      cleanup();

      // SDKs surface an abort as their own error type; report the timeout that caused it.
      const reason: unknown = abortController.signal.reason;
      lastError = reason instanceof TimeoutError ? reason : error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (lastError instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(lastError) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const finalDelay = Math.max(0, delay + jitter);

      await new Promise((resolve) => setTimeout(resolve, finalDelay));
    }
  }

  await ctx.logger.log({
    ...eventBase(ctx.runId),
    type: 'ProviderRequestFinished',
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
