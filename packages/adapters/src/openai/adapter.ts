import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderConfig,
  Usage,
} from '@promptctx/shared';
import type { ProviderAdapter } from '../adapter';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';
import { ConfigError } from '../errors';
import type { AdapterContext } from '../types';

// Reasoning models only accept the default sampling parameters
const FIXED_SAMPLING_MODEL_PREFIX = 'o1-';

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export function resolveApiKey(config: ProviderConfig): string | undefined {
  const inline = config.api_key?.trim();
  if (inline) return inline;
  if (!config.api_key_env) return undefined;
  return process.env[config.api_key_env]?.trim() || undefined;
}

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly topP: number;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;

  constructor(config: ProviderConfig) {
    super();
    const apiKey = resolveApiKey(config);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${config.api_key_env}`,
      );
    }
    this.model = config.model;
    this.temperature = config.temperature;
    this.topP = config.topP;
    this.maxRetries = config.maxRetries;
    this.timeoutMs = config.timeoutSeconds * 1000;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      // Retries go through executeProviderRequest so they are logged
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    const fixedSampling = this.model.startsWith(FIXED_SAMPLING_MODEL_PREFIX);
    const temperature = fixedSampling ? 1.0 : (req.temperature ?? this.temperature);
    const topP = fixedSampling ? 1.0 : (req.topP ?? this.topP);

    const requestCtx: AdapterContext = {
      ...ctx,
      timeoutMs: ctx.timeoutMs ?? this.timeoutMs,
      retryOptions: { maxRetries: this.maxRetries, ...ctx.retryOptions },
    };

    return executeProviderRequest(requestCtx, this.id(), this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: req.messages.map(toMessageParam),
            max_tokens: req.maxTokens,
            temperature,
            top_p: topP,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage: Usage | undefined = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content ?? undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }
}
