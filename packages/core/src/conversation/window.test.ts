import { describe, it, expect } from 'vitest';
import { assistantMessage, systemMessage, userMessage } from '@promptctx/shared';
import { ConversationWindow } from './window';

describe('ConversationWindow', () => {
  it('keeps the most recent messages in order', () => {
    const window = new ConversationWindow(10);
    const appended = Array.from({ length: 12 }, (_, i) => userMessage(`M${i + 1}`));

    appended.forEach((message) => window.append(message));

    expect(window.length).toBe(10);
    expect(window.messages().map((m) => m.content)).toEqual([
      'M3', 'M4', 'M5', 'M6', 'M7', 'M8', 'M9', 'M10', 'M11', 'M12',
    ]);
    expect(window.messages()[0]).toBe(appended[2]);
  });

  it('never exceeds its bound', () => {
    const window = new ConversationWindow(3);
    for (let i = 0; i < 50; i++) {
      window.append(userMessage(String(i)));
      expect(window.length).toBeLessThanOrEqual(3);
    }
  });

  it('defaults to ten messages', () => {
    expect(new ConversationWindow().maxMessages).toBe(10);
  });

  it('rejects a non-positive bound', () => {
    expect(() => new ConversationWindow(0)).toThrow(RangeError);
    expect(() => new ConversationWindow(2.5)).toThrow(RangeError);
  });

  it('adds the system message only to an empty window', () => {
    const window = new ConversationWindow();
    let made = 0;
    const make = () => {
      made++;
      return systemMessage('rules');
    };

    window.ensureSystemMessage(make);
    window.append(userMessage('hi'));
    window.ensureSystemMessage(make);

    expect(made).toBe(1);
    expect(window.messages().map((m) => m.role)).toEqual(['system', 'user']);
  });

  it('removes a pair by identity only', () => {
    const window = new ConversationWindow();
    const firstQuestion = userMessage('same');
    const firstAnswer = assistantMessage('answer');
    const secondQuestion = userMessage('same');
    const secondAnswer = assistantMessage('answer');
    [firstQuestion, firstAnswer, secondQuestion, secondAnswer].forEach((m) => window.append(m));

    window.removePair(firstQuestion, firstAnswer);

    const remaining = window.messages();
    expect(remaining).toHaveLength(2);
    expect(remaining[0]).toBe(secondQuestion);
    expect(remaining[1]).toBe(secondAnswer);
    expect(window.includes(secondQuestion)).toBe(true);
    expect(window.includes(firstQuestion)).toBe(false);
  });

  it('removes a lone user turn when there is no assistant reply', () => {
    const window = new ConversationWindow();
    const question = userMessage('q');
    window.append(systemMessage('rules'));
    window.append(question);

    window.removePair(question, undefined);

    expect(window.messages().map((m) => m.role)).toEqual(['system']);
  });

  it('clears everything', () => {
    const window = new ConversationWindow();
    window.append(userMessage('q'));
    window.clear();
    expect(window.messages()).toEqual([]);
  });

  it('returns a copy of its messages', () => {
    const window = new ConversationWindow();
    window.append(userMessage('q'));
    window.messages().pop();
    expect(window.length).toBe(1);
  });
});
