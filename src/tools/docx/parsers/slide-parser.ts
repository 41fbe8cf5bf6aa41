/**
 * Slide Parser
 *
 * Line-by-line classification of the constrained slide markdown dialect:
 * a `# Heading` first line, a skipped second line, then bold-labelled
 * bullets, two-space sub-bullets and fenced code blocks. Anything else is
 * ignored.
 */

import {
  BOLD_DELIMITER,
  BULLET_PREFIX,
  CODE_FENCE,
  HEADING_PREFIX,
  SUB_BULLET_MARKER,
  SUB_BULLET_PREFIX,
} from '../constants.js';
import type {
  LineKind,
  ParsedSlide,
  ParsedSlideBody,
  SlideBlock,
  SlideWarning,
} from '../types.js';
import { countLeadingBlankLines, normalizeLineEndings } from '../utils/index.js';

/** Lines consumed ahead of the body: the heading and the separator line. */
const HEADER_LINE_COUNT = 2;

/**
 * Classify one raw line.
 *
 * `inCodeBlock` and `hasBullet` carry the only state the dialect has; a
 * sub-bullet without a preceding bullet classifies as `other`.
 */
export function classifyLine(line: string, inCodeBlock: boolean, hasBullet: boolean): LineKind {
  const trimmed = line.trim();

  if (trimmed.startsWith(CODE_FENCE)) return 'code-fence';
  if (inCodeBlock) return 'code-line';
  if (trimmed.startsWith(BULLET_PREFIX)) return 'bullet';
  if (line.startsWith(SUB_BULLET_MARKER) && hasBullet) return 'sub-bullet';
  return 'other';
}

/** Label between the `- **` prefix and the next `**`, or the rest of the line. */
export function extractBulletLabel(trimmedLine: string): string {
  const rest = trimmedLine.slice(BULLET_PREFIX.length);
  return rest.split(BOLD_DELIMITER)[0];
}

export function extractSubBulletText(line: string): string {
  if (line.startsWith(SUB_BULLET_PREFIX)) {
    return line.slice(SUB_BULLET_PREFIX.length);
  }
  return line.slice(SUB_BULLET_MARKER.length);
}

/** Strip a single leading `# ` from the heading line. */
export function extractHeading(line: string): string {
  return line.startsWith(HEADING_PREFIX) ? line.slice(HEADING_PREFIX.length) : line;
}

/**
 * Parse the body of one slide.
 *
 * @param lines Lines after the heading and separator.
 * @param firstLineNumber Line number of `lines[0]` in the slide file, used for warnings.
 */
export function parseSlideBody(lines: string[], firstLineNumber = 1): ParsedSlideBody {
  const blocks: SlideBlock[] = [];
  const warnings: SlideWarning[] = [];

  // Scoped to this call so every slide starts without a bullet context.
  let hasBullet = false;
  let inCodeBlock = false;
  let codeLines: string[] = [];
  let codeStartLine = 0;

  for (const [offset, line] of lines.entries()) {
    const lineNumber = firstLineNumber + offset;
    const kind = classifyLine(line, inCodeBlock, hasBullet);

    switch (kind) {
      case 'code-fence':
        inCodeBlock = !inCodeBlock;
        if (inCodeBlock) {
          codeStartLine = lineNumber;
        } else if (codeLines.length > 0) {
          blocks.push({ type: 'code', lines: codeLines });
          codeLines = [];
        }
        break;

      case 'code-line':
        codeLines.push(line);
        break;

      case 'bullet':
        blocks.push({ type: 'bullet', label: extractBulletLabel(line.trim()) });
        hasBullet = true;
        break;

      case 'sub-bullet':
        blocks.push({ type: 'sub-bullet', text: extractSubBulletText(line) });
        break;

      default:
        if (line.startsWith(SUB_BULLET_MARKER)) {
          warnings.push({
            code: 'orphan-sub-bullet',
            line: lineNumber,
            message: `Sub-bullet on line ${lineNumber} has no preceding bullet and was dropped`,
          });
        }
        break;
    }
  }

  if (inCodeBlock) {
    warnings.push({
      code: 'unclosed-code-block',
      line: codeStartLine,
      message: `Code block opened on line ${codeStartLine} is never closed; ${codeLines.length} line(s) dropped`,
    });
  }

  return { blocks, warnings };
}

/**
 * Parse a whole slide file.
 *
 * Surrounding whitespace of the file is trimmed first, so the first
 * non-blank line is the heading. The following line is skipped whatever
 * it contains.
 */
export function parseSlide(markdown: string): ParsedSlide {
  const normalized = normalizeLineEndings(markdown);
  const leadingBlankLines = countLeadingBlankLines(normalized);
  const lines = normalized.trim().split('\n');

  const heading = extractHeading(lines[0]);
  const body = parseSlideBody(
    lines.slice(HEADER_LINE_COUNT),
    leadingBlankLines + HEADER_LINE_COUNT + 1,
  );

  return { heading, ...body };
}
