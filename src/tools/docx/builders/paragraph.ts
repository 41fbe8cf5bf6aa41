/**
 * Paragraph builders: map deck content onto `docx` Paragraph objects.
 */

import {
  AlignmentType,
  HeadingLevel,
  PageBreak,
  Paragraph,
  TextRun,
  convertInchesToTwip,
} from 'docx';

import {
  CODE_FONT,
  CODE_FONT_SIZE_PT,
  SUB_BULLET_INDENT_INCHES,
} from '../constants.js';
import type { CodeBlock, SlideBlock } from '../types.js';

export function buildTitle(text: string): Paragraph {
  return new Paragraph({
    text,
    heading: HeadingLevel.TITLE,
    alignment: AlignmentType.CENTER,
  });
}

export function buildSubtitle(text: string): Paragraph {
  return new Paragraph({
    text,
    alignment: AlignmentType.CENTER,
  });
}

export function buildPageBreak(): Paragraph {
  return new Paragraph({ children: [new PageBreak()] });
}

export function buildSectionHeading(text: string): Paragraph {
  return new Paragraph({
    text,
    heading: HeadingLevel.HEADING_1,
    alignment: AlignmentType.CENTER,
  });
}

/**
 * A code block is one paragraph. Each source line after the first starts
 * its run with a line break, so the paragraph reads as the lines joined by
 * newlines.
 */
export function buildCodeParagraph(block: CodeBlock): Paragraph {
  return new Paragraph({
    children: block.lines.map((line, i) =>
      new TextRun({
        text: line,
        font: CODE_FONT,
        size: CODE_FONT_SIZE_PT * 2,
        break: i > 0 ? 1 : undefined,
      }),
    ),
  });
}

export function buildBlock(block: SlideBlock): Paragraph {
  switch (block.type) {
    case 'bullet':
      return new Paragraph({
        children: [new TextRun({ text: block.label, bold: true })],
        bullet: { level: 0 },
      });
    case 'sub-bullet':
      return new Paragraph({
        children: [new TextRun({ text: block.text })],
        bullet: { level: 0 },
        indent: { left: convertInchesToTwip(SUB_BULLET_INDENT_INCHES) },
      });
    case 'code':
      return buildCodeParagraph(block);
  }
}
