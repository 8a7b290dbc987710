import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { PromptFailed, ScanCompleted } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  const completed: ScanCompleted = {
    schemaVersion: 1,
    timestamp: '2026-01-01T00:00:00Z',
    runId: 'scan-1',
    type: 'ScanCompleted',
    payload: {
      rootDir: '/work/demo',
      tokenCount: 12,
      fileCount: 1,
      skippedFileCount: 0,
      skippedDirectoryCount: 0,
      durationMs: 5,
    },
  };

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'promptctx-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(completed);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(completed));
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'promptctx-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    const second = { ...completed, timestamp: '2026-01-01T00:00:01Z' };

    await logger.log(completed);
    await logger.log(second);

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(completed);
    expect(JSON.parse(lines[1])).toEqual(second);
  });

  it('redacts secrets before writing', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'promptctx-logger-test-'));
    const logPath = path.join(tmpDir, 'events.jsonl');
    const logger = new JsonlLogger(logPath);

    const failed: PromptFailed = {
      schemaVersion: 1,
      timestamp: '2026-01-01T00:00:00Z',
      runId: 'prompt-1',
      type: 'PromptFailed',
      payload: { error: 'Bad key sk-aaaaaaaaaaaaaaaaaaaaaaaa' },
    };
    await logger.log(failed);

    const written = JSON.parse((await fs.readFile(logPath, 'utf8')).trim());
    expect(written.payload.error).toBe('Bad key [REDACTED]');
  });

  it('reports write failures on stderr instead of throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new JsonlLogger(path.join(os.tmpdir(), 'missing-dir-promptctx', 'x', 'events.jsonl'));

    await expect(logger.log(completed)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Failed to write to log file at'),
      expect.any(Error),
    );
  });

  it('prefixes console messages with child bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger('/unused.jsonl').child({ run: 'r1' });
    logger.info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[run=r1] hello');
  });
});
