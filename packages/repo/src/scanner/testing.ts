import path from 'node:path';
import type { TokenCounter } from '../tokens/counter';
import type { FileNode } from './types';

/**
 * One token per code point; keeps budget arithmetic in tests readable.
 */
export const charTokenCounter: TokenCounter = {
  count: (text) => Array.from(text).length,
  encode: (text) => Array.from(text, (ch) => ch.codePointAt(0) ?? 0),
  decode: (tokens) => String.fromCodePoint(...tokens),
};

export function memoryDir(dirPath: string, children: FileNode[] = []): FileNode {
  return {
    name: path.basename(dirPath),
    path: dirPath,
    isDirectory: true,
    extension: '',
    children: () => Promise.resolve(children),
    readText: () => Promise.reject(new Error(`Is a directory: ${dirPath}`)),
  };
}

/** A file node; pass an Error to make reads fail with it. */
export function memoryFile(filePath: string, content: string | Error = ''): FileNode {
  const name = path.basename(filePath);
  return {
    name,
    path: filePath,
    isDirectory: false,
    extension: path.extname(name).slice(1),
    children: () => Promise.resolve([]),
    readText: () => (content instanceof Error ? Promise.reject(content) : Promise.resolve(content)),
  };
}
