/**
 * DOCX constants: shared values used across the module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Deck defaults
// ═══════════════════════════════════════════════════════════════════════

export const DEFAULT_TITLE = 'Laravel Packages Scenarios';
export const DEFAULT_SUBTITLE = 'A comprehensive overview of Laravel package development';
export const DEFAULT_OUTPUT_FILENAME = 'Laravel_Packages_Presentation.docx';

/** Number of slide slots probed, 1-based. Slots are never discovered by listing a directory. */
export const DEFAULT_SLIDE_COUNT = 10;
export const MAX_SLIDE_COUNT = 100;

export function slideFileName(index: number): string {
    return `slide${index}.md`;
}

// ═══════════════════════════════════════════════════════════════════════
// Layout (inches / points, converted to twips and half-points by the builders)
// ═══════════════════════════════════════════════════════════════════════

/** US Letter, in twips. */
export const PAGE_WIDTH_TWIPS = 12240;
export const PAGE_HEIGHT_TWIPS = 15840;
export const PAGE_MARGIN_INCHES = 0.5;
export const SUB_BULLET_INDENT_INCHES = 0.5;

export const CODE_FONT = 'Courier New';
export const CODE_FONT_SIZE_PT = 9;

// ═══════════════════════════════════════════════════════════════════════
// Markdown tokens
// ═══════════════════════════════════════════════════════════════════════

export const HEADING_PREFIX = '# ';
export const CODE_FENCE = '```';
export const BULLET_PREFIX = '- **';
export const BOLD_DELIMITER = '**';
export const SUB_BULLET_MARKER = '  -';
export const SUB_BULLET_PREFIX = '  - ';

// ═══════════════════════════════════════════════════════════════════════
// Archive normalisation
// ═══════════════════════════════════════════════════════════════════════

/** Written into docProps/core.xml and every zip entry so identical input packs identically. */
export const FIXED_TIMESTAMP = '2000-01-01T00:00:00Z';

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    DOCUMENT_XML: 'word/document.xml',
    CORE_PROPERTIES: 'docProps/core.xml',
} as const;

export const SUCCESS_MESSAGE = 'Document created successfully!';
