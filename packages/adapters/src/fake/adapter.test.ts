import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@promptctx/shared';
import { FakeAdapter } from './adapter';
import type { AdapterContext } from '../types';

function createNoopLogger(): Logger {
  const base: Logger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => base,
  };
  return base;
}

describe('FakeAdapter', () => {
  const ctx: AdapterContext = {
    runId: 'test-run',
    logger: createNoopLogger(),
  };

  it('echoes the last user message by default', async () => {
    const adapter = new FakeAdapter({ model: 'fake' });

    const res = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'rules' },
          { role: 'user', content: 'first' },
          { role: 'assistant', content: 'reply' },
          { role: 'user', content: 'second' },
        ],
      },
      ctx,
    );

    expect(res.text).toBe('Echo: second');
    expect(adapter.requests).toHaveLength(1);
  });

  it('cycles through scripted replies', async () => {
    const adapter = new FakeAdapter({ model: 'fake' }, { replies: ['one', 'two'] });
    const request = { messages: [{ role: 'user' as const, content: 'q' }] };

    const texts = [];
    for (let i = 0; i < 3; i++) {
      texts.push((await adapter.generate(request, ctx)).text);
    }

    expect(texts).toEqual(['one', 'two', 'one']);
  });

  it('rejects with the configured failure', async () => {
    const adapter = new FakeAdapter({ model: 'fake' }, { failWith: new Error('quota exceeded') });

    await expect(adapter.generate({ messages: [] }, ctx)).rejects.toThrow('quota exceeded');
  });

  it('stops waiting when the request is aborted', async () => {
    const adapter = new FakeAdapter({ model: 'fake' }, { delayMs: 10_000 });
    const controller = new AbortController();

    const pending = adapter.generate({ messages: [] }, { ...ctx, abortSignal: controller.signal });
    controller.abort(new Error('superseded'));

    await expect(pending).rejects.toThrow('superseded');
  });
});
