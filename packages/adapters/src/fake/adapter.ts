import type { ModelRequest, ModelResponse, ProviderConfig } from '@promptctx/shared';
import type { ProviderAdapter } from '../adapter';
import { executeProviderRequest } from '../common';
import type { AdapterContext } from '../types';

export interface FakeAdapterOptions {
  /** Replies handed out in order, cycling once exhausted. Echoes the last user turn when empty. */
  replies?: string[];
  /** Simulated latency per request */
  delayMs?: number;
  /** Every request rejects with this error */
  failWith?: Error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
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
 * Offline adapter for tests and local runs.
 */
export class FakeAdapter implements ProviderAdapter {
  /** Every request received, in order */
  readonly requests: ModelRequest[] = [];
  private calls = 0;

  constructor(
    private readonly config: Pick<ProviderConfig, 'model'>,
    private readonly options: FakeAdapterOptions = {},
  ) {}

  id(): string {
    return 'fake';
  }

  async generate(request: ModelRequest, context: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(
      context,
      this.id(),
      this.config.model,
      async (signal) => {
        this.requests.push(request);
        const call = this.calls++;

        if (this.options.delayMs) {
          await sleep(this.options.delayMs, signal);
        }
        if (this.options.failWith) {
          throw this.options.failWith;
        }

        const replies = this.options.replies ?? [];
        if (replies.length > 0) {
          return { text: replies[call % replies.length] };
        }

        const lastUser = [...request.messages].reverse().find((m) => m.role === 'user');
        return { text: `Echo: ${lastUser?.content ?? ''}` };
      },
      { maxRetries: 0 },
    );
  }
}
