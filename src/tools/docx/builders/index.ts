/**
 * DOCX element builders. Single Responsibility: map deck content onto
 * `docx` paragraphs and pack them into a document.
 */

export {
    buildTitle,
    buildSubtitle,
    buildPageBreak,
    buildSectionHeading,
    buildCodeParagraph,
    buildBlock,
} from './paragraph.js';
export { createDocxFromDeck, buildDeckParagraphs, buildSectionParagraphs } from './deck-builder.js';
export type { DeckBuildOptions } from './deck-builder.js';
