import { getEncoding, type Tiktoken } from 'js-tiktoken';

/**
 * Exact tokenizer used for budget accounting and truncation.
 */
export interface TokenCounter {
  count(text: string): number;
  encode(text: string): number[];
  /** Decodes a (possibly partial) token sequence back to text. */
  decode(tokens: number[]): string;
}

let cl100k: Tiktoken | undefined;

// Building the rank table is slow; every counter shares one instance.
function cl100kBase(): Tiktoken {
  cl100k ??= getEncoding('cl100k_base');
  return cl100k;
}

/**
 * CL100K byte-pair encoding backed by js-tiktoken.
 *
 * Special-token strings such as `<|endoftext|>` are encoded as ordinary text,
 * since they routinely show up inside source files.
 */
export class TiktokenCounter implements TokenCounter {
  private readonly encoding: Tiktoken;

  constructor(encoding?: Tiktoken) {
    this.encoding = encoding ?? cl100kBase();
  }

  count(text: string): number {
    return this.encode(text).length;
  }

  encode(text: string): number[] {
    return this.encoding.encode(text, [], []);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }
}
