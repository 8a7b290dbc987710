import isBinaryPath from 'is-binary-path';

const SNIFF_BYTES = 1024;

/**
 * True when the extension is a known binary type or the first kilobyte
 * contains a NUL byte.
 */
export function isBinaryContent(filePath: string, bytes: Uint8Array): boolean {
  if (isBinaryPath(filePath)) {
    return true;
  }

  const limit = Math.min(bytes.length, SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (bytes[i] === 0) {
      return true;
    }
  }
  return false;
}

/**
 * Decodes file bytes as strict UTF-8.
 * @throws Error when the content is binary or not valid UTF-8
 */
export function decodeText(filePath: string, bytes: Uint8Array): string {
  if (isBinaryContent(filePath, bytes)) {
    throw new Error(`Binary content is not supported: ${filePath}`);
  }
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}
