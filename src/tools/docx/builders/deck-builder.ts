import {
  Document,
  Packer,
  Paragraph,
  convertInchesToTwip,
} from 'docx';

import { PAGE_HEIGHT_TWIPS, PAGE_MARGIN_INCHES, PAGE_WIDTH_TWIPS } from '../constants.js';
import { DocxErrorCode, withErrorContext } from '../errors.js';
import type { DeckContent, SlideSection } from '../types.js';
import { normalizeDocxArchive } from '../zip.js';
import {
  buildBlock,
  buildPageBreak,
  buildSectionHeading,
  buildSubtitle,
  buildTitle,
} from './paragraph.js';

export interface DeckBuildOptions {
  /** Timestamp pinned into the archive; defaults to FIXED_TIMESTAMP. */
  timestamp?: string;
}

/** Page break, centered heading, then the slide's blocks in source order. */
export function buildSectionParagraphs(section: SlideSection): Paragraph[] {
  return [
    buildPageBreak(),
    buildSectionHeading(section.heading),
    ...section.blocks.map(buildBlock),
  ];
}

export function buildDeckParagraphs(deck: DeckContent): Paragraph[] {
  const children: Paragraph[] = [buildTitle(deck.title), buildSubtitle(deck.subtitle)];
  for (const section of deck.sections) {
    children.push(...buildSectionParagraphs(section));
  }
  return children;
}

export async function createDocxFromDeck(
  deck: DeckContent,
  options: DeckBuildOptions = {},
): Promise<Buffer> {
  return withErrorContext(
    async () => {
      const margin = convertInchesToTwip(PAGE_MARGIN_INCHES);

      const doc = new Document({
        title: deck.title,
        sections: [{
          properties: {
            page: {
              size: { width: PAGE_WIDTH_TWIPS, height: PAGE_HEIGHT_TWIPS },
              margin: { top: margin, right: margin, bottom: margin, left: margin },
            },
          },
          children: buildDeckParagraphs(deck),
        }],
      });

      const packed = await Packer.toBuffer(doc);
      return normalizeDocxArchive(packed, options.timestamp);
    },
    DocxErrorCode.DOCX_CREATE_FAILED,
    { sections: deck.sections.length },
  );
}
