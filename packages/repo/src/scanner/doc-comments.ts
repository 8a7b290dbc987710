// Text-level patterns, not a lexer: delimiters inside string literals are
// stripped as well.
const BLOCK_COMMENT = /\/\*{1,2}[\s\S]*?\*\//g;
const TRIPLE_SLASH_LINE = /^[ \t]*\/\/\/.*$/gm;

/**
 * Removes block and doc-block comments, and blanks out lines that start with
 * a `///` comment. Line breaks around removed comments are kept.
 */
export function stripDocComments(content: string): string {
  return content.replace(BLOCK_COMMENT, '').replace(TRIPLE_SLASH_LINE, '');
}
