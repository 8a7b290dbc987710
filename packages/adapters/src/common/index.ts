import { eventEnvelope } from '@promptctx/shared';
import type { AdapterContext, RetryOptions } from '../types';
import { ConfigError, RateLimitError, TimeoutError } from '../errors';

/**
 * Retry defaults. Transient failures (rate limits, timeouts, 5xx, dropped
 * connections) back off exponentially with +/-10% jitter, capped at
 * `maxDelayMs`. A rate limit's `Retry-After` raises the wait up to the cap.
 * Key problems and aborts are never retried.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const RETRIABLE_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return codeOf(error.cause);
  return undefined;
}

export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = codeOf(error);
  return code !== undefined && RETRIABLE_CODES.has(code);
}

/** Wait before retry number `attempt` (1-based). */
export function backoffDelay(
  attempt: number,
  options: Required<RetryOptions>,
  error: unknown,
  random: () => number = Math.random,
): number {
  let delay = options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1);
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    delay = Math.max(delay, error.retryAfter * 1000);
  }
  delay = Math.min(options.maxDelayMs, delay);
  const jitter = delay * 0.1 * (random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

/** Resolves after `ms`, or rejects with the abort reason. */
function waitBeforeRetry(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs one provider call with retries, a per-attempt timeout and the
 * caller's abort signal, logging `ProviderRequestStarted` and
 * `ProviderRequestFinished`.
 *
 * ```typescript
 * const result = await executeProviderRequest(ctx, 'openai', 'gpt-4o-mini', (signal) =>
 *   client.chat.completions.create(params, { signal }),
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
  const options: Required<RetryOptions> = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };
  const startTime = Date.now();
  const finished = (success: boolean, retries: number, error?: unknown) =>
    ctx.logger.log({
      ...eventEnvelope(ctx.runId),
      type: 'ProviderRequestFinished',
      payload: {
        provider,
        model,
        durationMs: Date.now() - startTime,
        success,
        retries,
        ...(success ? {} : { error: error instanceof Error ? error.message : String(error) }),
      },
    });

  await ctx.logger.log({
    ...eventEnvelope(ctx.runId),
    type: 'ProviderRequestStarted',
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const attempt = new AbortController();
    const forwardAbort = () => attempt.abort(ctx.abortSignal?.reason);
    if (ctx.abortSignal?.aborted) {
      attempt.abort(ctx.abortSignal.reason);
    } else {
      ctx.abortSignal?.addEventListener('abort', forwardAbort);
    }

    const timer = ctx.timeoutMs
      ? setTimeout(() => {
          attempt.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
        }, ctx.timeoutMs)
      : undefined;

    try {
      const result = await requestFn(attempt.signal);
      await finished(true, attempts);
      return result;
    } catch (error: unknown) {
      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      // SDKs surface our own timeout abort as a generic abort error
      const reason: unknown = attempt.signal.reason;
      lastError = attempt.signal.aborted && reason instanceof TimeoutError ? reason : error;

      if (
        lastError instanceof ConfigError ||
        !isRetriableError(lastError) ||
        attempts >= options.maxRetries
      ) {
        break;
      }
    } finally {
      clearTimeout(timer);
      ctx.abortSignal?.removeEventListener('abort', forwardAbort);
    }

    attempts++;
    await waitBeforeRetry(backoffDelay(attempts, options, lastError), ctx.abortSignal);
  }

  await finished(false, attempts, lastError);
  throw lastError;
}
