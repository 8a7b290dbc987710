import type { ChatMessage } from '@promptctx/shared';

export const DEFAULT_MAX_MESSAGES = 10;

/**
 * Bounded chat history. Appending past `maxMessages` evicts from the head,
 * so the window always holds the most recent messages in order.
 */
export class ConversationWindow {
  private items: ChatMessage[] = [];

  constructor(readonly maxMessages: number = DEFAULT_MAX_MESSAGES) {
    if (!Number.isInteger(maxMessages) || maxMessages <= 0) {
      throw new RangeError(`maxMessages must be a positive integer, got ${maxMessages}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  append(message: ChatMessage): void {
    this.items.push(message);
    if (this.items.length > this.maxMessages) {
      this.items.splice(0, this.items.length - this.maxMessages);
    }
  }

  clear(): void {
    this.items = [];
  }

  /** Appends `make()` when the window is empty; a no-op otherwise. */
  ensureSystemMessage(make: () => ChatMessage): void {
    if (this.items.length === 0) {
      this.append(make());
    }
  }

  /**
   * Removes the given message instances. Other messages with the same text
   * stay, as do the messages that were passed but are no longer present.
   */
  removePair(user: ChatMessage | undefined, assistant: ChatMessage | undefined): void {
    this.items = this.items.filter((message) => message !== user && message !== assistant);
  }

  includes(message: ChatMessage): boolean {
    return this.items.includes(message);
  }

  /** Snapshot in chronological order. */
  messages(): ChatMessage[] {
    return [...this.items];
  }
}
