/**
 * Role of a message in a conversation with an LLM provider.
 */
export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * A message in a conversation with an LLM provider.
 *
 * Messages are treated as values that are never mutated once created; the
 * conversation window removes them by object identity.
 */
export interface ChatMessage {
  /** The role of the message sender */
  readonly role: ChatRole;
  /** The text content of the message */
  readonly content: string;
}

export type SystemMessage = ChatMessage & { readonly role: 'system' };
export type UserMessage = ChatMessage & { readonly role: 'user' };
export type AssistantMessage = ChatMessage & { readonly role: 'assistant' };

export function systemMessage(content: string): SystemMessage {
  return { role: 'system', content };
}

export function userMessage(content: string): UserMessage {
  return { role: 'user', content };
}

export function assistantMessage(content: string): AssistantMessage {
  return { role: 'assistant', content };
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Hello!' }],
 *   temperature: 0.7,
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: readonly ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Nucleus sampling probability mass */
  topP?: number;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  /** Number of tokens in the input/prompt */
  inputTokens?: number;
  /** Number of tokens generated in the output */
  outputTokens?: number;
  /** Total tokens (input + output) */
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}
