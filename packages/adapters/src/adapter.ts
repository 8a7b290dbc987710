import type { ModelRequest, ModelResponse } from '@promptctx/shared';
import type { AdapterContext } from './types';

/**
 * The generation capability: takes the whole conversation, returns one
 * assistant reply. Implementations must stop work when
 * `ctx.abortSignal` fires.
 */
export interface ProviderAdapter {
  /** Provider name used in events, e.g. `openai` */
  id(): string;
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
