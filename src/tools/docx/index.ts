/**
 * Slide deck to DOCX: public API
 *
 * Re-exports only the symbols that external consumers need.
 *
 * @module docx
 */

// ── Building ────────────────────────────────────────────────────────────────
export { buildPresentation } from './create.js';
export { createDocxFromDeck } from './builders/index.js';
export { parseSlide, parseSlideBody, classifyLine } from './parsers/index.js';
export { loadSlideSources } from './sources.js';

// ── Reading ─────────────────────────────────────────────────────────────────
export { readDocxOutline } from './read.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  BuildPresentationOptions,
  BuildPresentationResult,
  DeckContent,
  DocxOutline,
  LineKind,
  ParagraphOutline,
  ParsedSlide,
  SlideBlock,
  SlideSection,
  SlideWarning,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode } from './errors.js';
