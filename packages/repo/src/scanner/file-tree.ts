import nodeFs from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import type { FileNode } from './types';
import { decodeText } from './utils';

export type Fs = typeof nodeFs;

/**
 * {@link FileNode} backed by the local disk. Children are listed lazily and
 * sorted by name; symbolic links and special files are not followed.
 */
export class DiskFileNode implements FileNode {
  readonly name: string;
  readonly extension: string;

  constructor(
    readonly path: string,
    readonly isDirectory: boolean,
    private readonly fs: Fs = nodeFs,
  ) {
    this.name = basename(this.path);
    this.extension = isDirectory ? '' : extname(this.name).slice(1);
  }

  async children(): Promise<FileNode[]> {
    if (!this.isDirectory) return [];

    const entries = await this.fs.readdir(this.path, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() || entry.isFile())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((entry) => new DiskFileNode(join(this.path, entry.name), entry.isDirectory(), this.fs));
  }

  async readText(): Promise<string> {
    const bytes = await this.fs.readFile(this.path);
    return decodeText(this.path, bytes);
  }
}

export async function loadFileNode(filePath: string, fs: Fs = nodeFs): Promise<FileNode> {
  const absolute = resolve(filePath);
  const stats = await fs.stat(absolute);
  return new DiskFileNode(absolute, stats.isDirectory(), fs);
}
