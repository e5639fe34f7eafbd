import { ConfigError, RateLimitError, TimeoutError, type ProviderConfig } from '@mender/shared';

/**
 * Interface for API error types that have a status code.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * Each provider supplies checks for its own SDK's error classes.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for SDK-backed adapters: key resolution and error mapping.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Reads the API key from `api_key`, falling back to the variable named by `api_key_env`.
   */
  protected static resolveApiKey(config: ProviderConfig, label: string): string {
    const apiKey = config.api_key || (config.api_key_env ? process.env[config.api_key_env] : undefined);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for ${label} provider. Checked config.api_key and env var ${config.api_key_env ?? '(unset)'}`,
      );
    }
    return apiKey;
  }

  /**
   * Maps SDK errors to shared errors:
   * 429 to RateLimitError, 401/403 to ConfigError, connection timeouts to TimeoutError.
   * Anything else is passed through, wrapped when it is not an Error.
   */
  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
