import { Command } from 'commander';
import { OutputRenderer } from '../output/renderer';
import { CHAT_COMMANDS, runChatSession } from '../ui/chat';
import { addPromptOptions, preparePrompt, type PromptCommandOptions } from './ask';

export function registerChatCommand(program: Command) {
  addPromptOptions(
    program
      .command('chat')
      .description('Interactive conversation; a new line while a prompt runs stops it'),
  ).action(async (options: PromptCommandOptions) => {
    const renderer = new OutputRenderer(false);
    const setup = await preparePrompt(program, options);

    renderer.log(
      `Chatting with ${setup.config.provider.type}/${setup.config.provider.model}. ` +
        `Commands: ${Object.values(CHAT_COMMANDS).join(', ')}`,
    );
    await runChatSession({
      service: setup.service,
      provider: setup.provider,
      editorInfo: setup.editorInfo,
      context: setup.context,
      input: process.stdin,
      output: process.stdout,
    });
  });
}
