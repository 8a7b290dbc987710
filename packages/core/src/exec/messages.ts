import {
  systemMessage,
  userMessage,
  type SystemMessage,
  type UserMessage,
} from '@promptctx/shared';

export const QUESTION_PREFIX = 'The user question: ';
export const QUESTION_CONTEXT = 'Question context:\n';
export const DEFAULT_LANGUAGE_LABEL = 'programming';

export const COMMANDS_INFO =
  'The assistant supports the following commands: /test: write unit tests on selected code\n' +
  '/explain: explain the selected code\n' +
  '/review: review selected code\n' +
  '/custom: set custom prompt in settings';

export const NO_HALLUCINATIONS =
  'Do not include any more info which might be incorrect, like discord, twitter, documentation or website info. ' +
  'Only provide info that is correct and relevant to the code or plugin.';

/**
 * Editor state captured when the prompt was submitted.
 */
export interface EditorInfo {
  /** Language of the active file, e.g. `TypeScript` */
  language?: string;
  selectedText?: string;
}

export function buildSystemMessage(language?: string): SystemMessage {
  const label = language?.trim() || DEFAULT_LANGUAGE_LABEL;
  return systemMessage(
    `You are a software developer with expert knowledge in ${label} programming language. ` +
      'Always return the response in Markdown.\n' +
      `${COMMANDS_INFO}\n` +
      NO_HALLUCINATIONS,
  );
}

/**
 * Builds the user turn. With a selection or project context the prompt is
 * followed by a context section; otherwise it gets the plain question prefix.
 */
export function buildUserMessage(prompt: string, selectedText?: string, context?: string): UserMessage {
  const hasSelection = Boolean(selectedText);
  const hasContext = Boolean(context);

  if (!hasSelection && !hasContext) {
    return userMessage(`${QUESTION_PREFIX} ${prompt}`);
  }

  let content = prompt + QUESTION_CONTEXT;
  if (hasSelection) {
    content += `${selectedText}\n`;
  }
  if (hasContext) {
    content += context;
  }
  return userMessage(content);
}
