import type { TokenCounter } from '../tokens/counter';
import { formatNumber, formatTokenCount } from './format';

export const TRUNCATION_MARKER = '\n--- Project context truncated due to token limit ---\n';

export interface TruncateOptions {
  tokenCounter: TokenCounter;
  /** Measure only: no marker and no notification */
  isTokenCalculation?: boolean;
  /** Receives the user-facing outcome message when not measuring */
  notify?: (message: string) => void;
}

/**
 * Decodes the longest prefix of `tokens`, at most `maxTokens` long, that is
 * also a prefix of `text`. A cut through a multi-byte character decodes to a
 * replacement character, so such tokens are dropped.
 */
function decodePrefix(text: string, tokens: number[], maxTokens: number, counter: TokenCounter): string {
  for (let kept = maxTokens; kept > 0; kept--) {
    const decoded = counter.decode(tokens.slice(0, kept));
    if (text.startsWith(decoded)) {
      return decoded;
    }
  }
  return '';
}

/**
 * Cuts `text` to at most `maxTokens` tokens at a token boundary that does
 * not split a character.
 */
export function truncateToTokens(text: string, maxTokens: number, options: TruncateOptions): string {
  const { tokenCounter, isTokenCalculation = false, notify } = options;
  const tokens = tokenCounter.encode(text);

  if (tokens.length <= maxTokens) {
    if (!isTokenCalculation) {
      notify?.(`Added. Project context ${formatTokenCount(tokens.length, 'tokens')}`);
    }
    return text;
  }

  const truncated = decodePrefix(text, tokens, maxTokens, tokenCounter);
  if (isTokenCalculation) {
    return truncated;
  }

  notify?.(
    `Project context truncated due to token limit, was ${formatNumber(tokens.length)} tokens ` +
      `but limit is ${formatNumber(maxTokens)} tokens. ` +
      'You can exclude directories or files in the settings page.',
  );
  return truncated + TRUNCATION_MARKER;
}
