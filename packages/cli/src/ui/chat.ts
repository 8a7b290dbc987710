import * as readline from 'readline';
import type { ProviderAdapter } from '@promptctx/adapters';
import type { ChatMessageContext, EditorInfo, PromptExecutionService } from '@promptctx/core';
import { toError } from '@promptctx/shared';

export const CHAT_COMMANDS = {
  clear: '/clear',
  undo: '/undo',
  exit: '/exit',
} as const;

export interface ChatSessionOptions {
  service: PromptExecutionService;
  provider: ProviderAdapter;
  editorInfo?: EditorInfo;
  /** Project context, attached to the first prompt that is sent */
  context?: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Line-based chat over one conversation. A line sent while a prompt is
 * running stops that prompt instead of starting a new one.
 */
export async function runChatSession(options: ChatSessionOptions): Promise<void> {
  const { service, provider, editorInfo, output } = options;
  const rl = readline.createInterface({ input: options.input, terminal: false });
  const write = (line: string) => output.write(`${line}\n`);
  const pending: Promise<void>[] = [];
  let context = options.context;
  let lastExchange: ChatMessageContext | undefined;

  for await (const raw of rl) {
    const line = raw.trim();
    if (!line) {
      continue;
    }
    if (line === CHAT_COMMANDS.exit) {
      break;
    }
    if (line === CHAT_COMMANDS.clear) {
      service.clearChatMessages();
      lastExchange = undefined;
      write('Conversation cleared.');
      continue;
    }
    if (line === CHAT_COMMANDS.undo) {
      if (lastExchange) {
        service.removeMessagePair(lastExchange);
        lastExchange = undefined;
        write('Removed the last exchange.');
      } else {
        write('Nothing to remove.');
      }
      continue;
    }

    if (service.isRunning()) {
      void service.executeQuery({ userPrompt: line, provider });
      write('Prompt cancelled.');
      continue;
    }

    const ctx: ChatMessageContext = { userPrompt: line, editorInfo, context, provider };
    context = undefined;
    pending.push(
      service.executeQuery(ctx).then(
        (reply) => {
          if (reply) {
            lastExchange = ctx;
            write(reply.content);
          }
        },
        (error: unknown) => {
          service.removeMessagePair(ctx);
          write(`Error: ${toError(error).message}`);
        },
      ),
    );
  }

  rl.close();
  await Promise.all(pending);
}
