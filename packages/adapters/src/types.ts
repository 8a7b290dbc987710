import type { Logger } from '@promptctx/shared';

/**
 * Backoff settings for transient provider failures; see
 * `executeProviderRequest` for the defaults.
 */
export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
}

/**
 * Per-request context handed to `ProviderAdapter.generate`.
 */
export interface AdapterContext {
  /** The prompt run the request belongs to; stamped on provider events */
  runId: string;
  logger: Logger;
  /** Aborted when a newer submit cancels this prompt; pending retries stop too */
  abortSignal?: AbortSignal;
  /** Limit for a single attempt */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}
