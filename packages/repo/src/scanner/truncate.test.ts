import { describe, it, expect, vi } from 'vitest';
import { TiktokenCounter } from '../tokens/counter';
import { charTokenCounter } from './testing';
import { TRUNCATION_MARKER, truncateToTokens } from './truncate';

describe('truncateToTokens', () => {
  it('returns text within budget unchanged and reports the size', () => {
    const notify = vi.fn();
    const result = truncateToTokens('abc', 10, { tokenCounter: charTokenCounter, notify });

    expect(result).toBe('abc');
    expect(notify).toHaveBeenCalledWith('Added. Project context 3 tokens');
  });

  it('keeps text exactly at the budget', () => {
    const result = truncateToTokens('abcd', 4, { tokenCounter: charTokenCounter });
    expect(result).toBe('abcd');
  });

  it('cuts to the budget and appends the marker', () => {
    const notify = vi.fn();
    const result = truncateToTokens('abcdefghij', 4, { tokenCounter: charTokenCounter, notify });

    expect(result).toBe(`abcd${TRUNCATION_MARKER}`);
    expect(notify).toHaveBeenCalledWith(
      'Project context truncated due to token limit, was 10 tokens but limit is 4 tokens. ' +
        'You can exclude directories or files in the settings page.',
    );
  });

  it('cuts without marker or notification when only measuring', () => {
    const notify = vi.fn();
    const result = truncateToTokens('abcdefghij', 4, {
      tokenCounter: charTokenCounter,
      isTokenCalculation: true,
      notify,
    });

    expect(result).toBe('abcd');
    expect(notify).not.toHaveBeenCalled();
  });

  it('stays silent within budget when only measuring', () => {
    const notify = vi.fn();
    truncateToTokens('abc', 10, { tokenCounter: charTokenCounter, isTokenCalculation: true, notify });
    expect(notify).not.toHaveBeenCalled();
  });

  it('formats large counts in the truncation message', () => {
    const notify = vi.fn();
    truncateToTokens('x'.repeat(12345), 1000, { tokenCounter: charTokenCounter, notify });
    expect(notify).toHaveBeenCalledWith(
      'Project context truncated due to token limit, was 12,345 tokens but limit is 1,000 tokens. ' +
        'You can exclude directories or files in the settings page.',
    );
  });

  it('truncates real text at a token boundary', () => {
    const counter = new TiktokenCounter();
    const text = 'hello' + ' hello'.repeat(24);
    expect(counter.count(text)).toBe(25);

    const notify = vi.fn();
    const result = truncateToTokens(text, 10, { tokenCounter: counter, notify });

    expect(result).toBe('hello' + ' hello'.repeat(9) + TRUNCATION_MARKER);
    expect(notify).toHaveBeenCalledTimes(1);
    const message: string = notify.mock.calls[0][0];
    expect(message).toContain('was 25 tokens');
    expect(message).toContain('limit is 10 tokens');
  });

  it('never splits a multi-byte character', () => {
    const counter = new TiktokenCounter();
    const text = '// 🎉🎉🎉 日本語のコメント 🎉';
    const total = counter.count(text);

    for (let budget = 1; budget < total; budget++) {
      const result = truncateToTokens(text, budget, { tokenCounter: counter, isTokenCalculation: true });
      expect(text.startsWith(result)).toBe(true);
      expect(result).not.toContain('\uFFFD');
      expect(counter.count(result)).toBeLessThanOrEqual(budget);
    }
  });

  it('keeps whole characters before the marker', () => {
    const counter = new TiktokenCounter();
    const text = '🎉'.repeat(10);

    const result = truncateToTokens(text, 4, { tokenCounter: counter });

    expect(result.endsWith(TRUNCATION_MARKER)).toBe(true);
    const kept = result.slice(0, -TRUNCATION_MARKER.length);
    expect(text.startsWith(kept)).toBe(true);
    expect(kept).not.toContain('\uFFFD');
    expect(counter.count(kept)).toBeLessThanOrEqual(4);
  });

  it('counts an astral character as one token in the test counter', () => {
    const result = truncateToTokens('ab😀cd', 3, { tokenCounter: charTokenCounter, isTokenCalculation: true });
    expect(result).toBe('ab😀');
  });
});
