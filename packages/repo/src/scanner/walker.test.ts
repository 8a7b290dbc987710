import { describe, it, expect } from 'vitest';
import { ExclusionPolicy, toExclusionConfig } from './exclusion';
import { createProject } from './project';
import { charTokenCounter, memoryDir, memoryFile } from './testing';
import { ContentWalker, fileHeader } from './walker';

const settings = {
  excludedDirectories: ['node_modules'],
  includedFileExtensions: ['java'],
  useGitignore: true,
  excludeDocComments: false,
};

function walker(maxTokens = 1000, overrides: Partial<typeof settings> = {}, project = createProject('/root')) {
  return new ContentWalker({
    project,
    policy: new ExclusionPolicy(toExclusionConfig({ ...settings, ...overrides })),
    tokenCounter: charTokenCounter,
    maxTokens,
  });
}

describe('ContentWalker', () => {
  it('collects included files with path headers', async () => {
    const root = memoryDir('/root', [
      memoryDir('/root/node_modules', [memoryFile('/root/node_modules/X.java', 'x')]),
      memoryDir('/root/src', [
        memoryFile('/root/src/A.java', 'class A {}'),
        memoryFile('/root/src/B.txt', 'notes'),
      ]),
    ]);

    const outcome = await walker().walk(root);

    expect(outcome.content).toBe('\n--- /root/src/A.java ---\nclass A {}\n');
    expect(outcome.tokens).toBe(10);
    expect(outcome.fileCount).toBe(1);
    expect(outcome.skippedFileCount).toBe(1);
    expect(outcome.skippedDirectoryCount).toBe(1);
    expect(outcome.stoppedEarly).toBe(false);
  });

  it('stops once the running token count reaches the budget', async () => {
    const root = memoryDir('/root', [
      memoryFile('/root/A.java', 'aaaa'),
      memoryFile('/root/B.java', 'bbbbbb'),
      memoryFile('/root/C.java', 'cc'),
    ]);

    const outcome = await walker(5).walk(root);

    expect(outcome.fileCount).toBe(2);
    expect(outcome.tokens).toBe(10);
    expect(outcome.stoppedEarly).toBe(true);
    expect(outcome.content).toBe(
      `${fileHeader('/root/A.java')}aaaa\n${fileHeader('/root/B.java')}bbbbbb\n`,
    );
  });

  it('records read errors inline and continues', async () => {
    const root = memoryDir('/root', [
      memoryFile('/root/A.java', new Error('permission denied')),
      memoryFile('/root/B.java', 'ok'),
    ]);

    const outcome = await walker().walk(root);

    expect(outcome.content).toBe(
      '\n--- /root/A.java ---\nError reading file: permission denied\n' +
        '\n--- /root/B.java ---\nok\n',
    );
    expect(outcome.fileCount).toBe(2);
    expect(outcome.tokens).toBe(2);
  });

  it('skips files outside the project content', async () => {
    const project = createProject('/root', { contentRoots: ['/root/src'] });
    const root = memoryDir('/root', [
      memoryDir('/root/out', [memoryFile('/root/out/Gen.java', 'gen')]),
      memoryDir('/root/src', [memoryFile('/root/src/A.java', 'a')]),
    ]);

    const outcome = await walker(1000, {}, project).walk(root);

    expect(outcome.fileCount).toBe(1);
    expect(outcome.skippedFileCount).toBe(1);
    expect(outcome.content).toBe('\n--- /root/src/A.java ---\na\n');
  });

  it('strips doc comments when configured', async () => {
    const root = memoryDir('/root', [memoryFile('/root/A.java', '/** doc */class A {}')]);

    const outcome = await walker(1000, { excludeDocComments: true }).walk(root);

    expect(outcome.content).toBe('\n--- /root/A.java ---\nclass A {}\n');
    expect(outcome.tokens).toBe(10);
  });

  it('returns empty content for an excluded root', async () => {
    const outcome = await walker().walk(memoryDir('/root/node_modules', [memoryFile('/root/node_modules/A.java', 'a')]));

    expect(outcome.content).toBe('');
    expect(outcome.skippedDirectoryCount).toBe(1);
    expect(outcome.fileCount).toBe(0);
  });
});
