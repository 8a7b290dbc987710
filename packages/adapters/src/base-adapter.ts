import { ConfigError, RateLimitError, TimeoutError } from './errors';

/** The parts of an SDK's HTTP error the mapping reads. */
export interface APIErrorLike {
  status?: number;
  message: string;
  headers?: Record<string, string | null | undefined>;
}

/**
 * SDK-specific recognisers; each adapter supplies its own.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/** `Retry-After` in seconds; HTTP-date values are not used by the providers here. */
export function parseRetryAfter(headers: APIErrorLike['headers']): number | undefined {
  const value = headers?.['retry-after'];
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Shared error translation for SDK-backed adapters.
 *
 * | SDK error | Result |
 * | --- | --- |
 * | HTTP 429 | {@link RateLimitError} carrying `Retry-After` |
 * | HTTP 401, 403 | {@link ConfigError} (bad or missing key) |
 * | connection timeout | {@link TimeoutError} |
 *
 * Anything else is returned unchanged, so the request executor can still
 * see a 5xx status and retry.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected mapError(error: unknown): Error {
    const { isAPIError, isTimeoutError } = this.errorConfig;

    if (isAPIError(error)) {
      switch (error.status) {
        case 429:
          return new RateLimitError(error.message, {
            cause: error,
            retryAfter: parseRetryAfter(error.headers),
          });
        case 401:
        case 403:
          return new ConfigError(error.message, { cause: error });
      }
    }

    if (isTimeoutError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new TimeoutError(message, { cause: error });
    }

    return error instanceof Error ? error : new Error(String(error));
  }
}
