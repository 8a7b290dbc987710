import { randomUUID } from 'node:crypto';
import type { ProviderAdapter } from '@promptctx/adapters';
import {
  assistantMessage,
  CancelledError,
  eventEnvelope,
  logger as defaultLogger,
  ProviderError,
  toError,
  type AssistantMessage,
  type ChatMessage,
  type Logger,
  type ModelResponse,
  type UserMessage,
} from '@promptctx/shared';
import { ConversationWindow, DEFAULT_MAX_MESSAGES } from '../conversation/window';
import { buildSystemMessage, buildUserMessage, type EditorInfo } from './messages';
import { SerialExecutor } from './serial_executor';

/**
 * One prompt submission. The service fills in `userMessage` and
 * `assistantMessage` so the caller can later remove the exchange.
 */
export interface ChatMessageContext {
  userPrompt: string;
  editorInfo?: EditorInfo;
  /** Assembled project context, e.g. a scan result's content */
  context?: string;
  provider: ProviderAdapter;
  userMessage?: UserMessage;
  assistantMessage?: AssistantMessage;
}

export interface PromptExecutionServiceOptions {
  maxMessages?: number;
  logger?: Logger;
}

type SlotState = 'idle' | 'running';

interface InFlight {
  runId: string;
  controller: AbortController;
  promise: Promise<AssistantMessage | undefined>;
}

/**
 * Settles with `undefined` as soon as `signal` aborts; `work` keeps its
 * handlers so a late rejection is still observed.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  if (signal.aborted) {
    return work.then(
      () => undefined,
      () => undefined,
    );
  }
  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = () => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs chat prompts against a provider one at a time over a bounded
 * conversation.
 *
 * Submitting while a prompt is in flight cancels it instead of queueing a
 * second one: the call returns the in-flight promise, which then resolves
 * with `undefined`. The worker stays busy until the cancelled generation
 * call settles, so the next prompt never overlaps it.
 *
 * @example
 * ```typescript
 * const service = new PromptExecutionService({ maxMessages: 10 });
 * const ctx = { userPrompt: 'Explain this', editorInfo: { selectedText }, provider };
 * const reply = await service.executeQuery(ctx);
 * if (reply) console.log(reply.content);
 * ```
 */
export class PromptExecutionService {
  private readonly conversation: ConversationWindow;
  private readonly worker = new SerialExecutor();
  private readonly logger: Logger;
  private state: SlotState = 'idle';
  private current: InFlight | undefined;

  constructor(options: PromptExecutionServiceOptions = {}) {
    this.conversation = new ConversationWindow(options.maxMessages ?? DEFAULT_MAX_MESSAGES);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Starts a prompt, or cancels the one in flight.
   *
   * Resolves with the assistant reply, or `undefined` when cancelled.
   * Rejects with {@link ProviderError} when the provider fails; the user turn
   * then stays in the conversation until {@link removeMessagePair} is called.
   */
  executeQuery(ctx: ChatMessageContext): Promise<AssistantMessage | undefined> {
    const inFlight = this.current;
    if (this.state === 'running' && inFlight) {
      inFlight.controller.abort(new CancelledError());
      this.state = 'idle';
      this.current = undefined;
      void this.logger.log({ ...eventEnvelope(inFlight.runId), type: 'PromptCancelled', payload: {} });
      return inFlight.promise;
    }

    this.state = 'running';
    const runId = randomUUID();
    const controller = new AbortController();
    const task = this.worker.submit(() => this.run(ctx, runId, controller.signal));
    const promise = untilAborted(task, controller.signal).finally(() => this.release(controller));
    this.current = { runId, controller, promise };
    return promise;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /** Removes the exchange recorded on `ctx`, whichever parts of it exist. */
  removeMessagePair(ctx: ChatMessageContext): void {
    this.conversation.removePair(ctx.userMessage, ctx.assistantMessage);
  }

  clearChatMessages(): void {
    this.conversation.clear();
  }

  messages(): ChatMessage[] {
    return this.conversation.messages();
  }

  private release(controller: AbortController): void {
    if (this.current?.controller === controller) {
      this.current = undefined;
      this.state = 'idle';
    }
  }

  private async run(
    ctx: ChatMessageContext,
    runId: string,
    signal: AbortSignal,
  ): Promise<AssistantMessage | undefined> {
    // Cancelled while an earlier prompt was still draining
    if (signal.aborted) {
      return undefined;
    }

    const selectedText = ctx.editorInfo?.selectedText;
    this.conversation.ensureSystemMessage(() => buildSystemMessage(ctx.editorInfo?.language));
    const user = buildUserMessage(ctx.userPrompt, selectedText, ctx.context);
    this.conversation.append(user);
    ctx.userMessage = user;

    const messages = this.conversation.messages();
    await this.logger.log({
      ...eventEnvelope(runId),
      type: 'PromptSubmitted',
      payload: {
        messageCount: messages.length,
        hasSelection: Boolean(selectedText),
        hasContext: Boolean(ctx.context),
      },
    });

    // Cancelled while the submission was being logged
    if (signal.aborted) {
      return undefined;
    }

    const startTime = Date.now();
    let response: ModelResponse;
    try {
      response = await ctx.provider.generate(
        { messages },
        { runId, logger: this.logger, abortSignal: signal },
      );
    } catch (error) {
      if (signal.aborted) {
        return undefined;
      }
      const cause = toError(error);
      await this.logger.log({
        ...eventEnvelope(runId),
        type: 'PromptFailed',
        payload: { error: cause.message },
      });
      throw new ProviderError(`Failed to execute prompt!\n${cause.message}`, { cause });
    }

    if (signal.aborted) {
      return undefined;
    }

    const reply = assistantMessage(response.text ?? '');
    // A clear or removal while in flight drops the reply from the history
    if (this.conversation.includes(user)) {
      this.conversation.append(reply);
    }
    ctx.assistantMessage = reply;

    await this.logger.log({
      ...eventEnvelope(runId),
      type: 'PromptCompleted',
      payload: { durationMs: Date.now() - startTime, replyChars: reply.content.length },
    });
    return reply;
  }
}
