/**
 * Markdown text helpers shared by the slide parser.
 *
 * @module docx/utils/markdown
 */

/** Convert CRLF and lone CR line endings to LF. */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/** Number of line breaks in the leading whitespace that `trim()` would drop. */
export function countLeadingBlankLines(text: string): number {
  const leading = text.slice(0, text.length - text.trimStart().length);
  return (leading.match(/\n/g) ?? []).length;
}
