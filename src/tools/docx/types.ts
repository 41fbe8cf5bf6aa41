/**
 * Type definitions for the slide deck → DOCX pipeline.
 * Single source of truth for every type used across the DOCX module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Parsed slide content
// ═══════════════════════════════════════════════════════════════════════

export type LineKind = 'bullet' | 'sub-bullet' | 'code-fence' | 'code-line' | 'other';

export interface BulletBlock {
    type: 'bullet';
    /** Bold label between `- **` and the next `**`. */
    label: string;
}

export interface SubBulletBlock {
    type: 'sub-bullet';
    text: string;
}

export interface CodeBlock {
    type: 'code';
    /** Raw lines between the fences, fence lines excluded. */
    lines: string[];
}

export type SlideBlock = BulletBlock | SubBulletBlock | CodeBlock;

export type SlideWarningCode = 'orphan-sub-bullet' | 'unclosed-code-block';

export interface SlideWarning {
    code: SlideWarningCode;
    /** 1-based line number within the slide file. */
    line: number;
    message: string;
}

export interface ParsedSlideBody {
    blocks: SlideBlock[];
    warnings: SlideWarning[];
}

export interface ParsedSlide extends ParsedSlideBody {
    heading: string;
}

// ═══════════════════════════════════════════════════════════════════════
// Sources & deck structure
// ═══════════════════════════════════════════════════════════════════════

export interface SlideSource {
    /** 1-based slot index. */
    index: number;
    path: string;
    content: string;
}

export interface SlideSection extends ParsedSlide {
    index: number;
    path: string;
}

export interface DeckContent {
    title: string;
    subtitle: string;
    sections: SlideSection[];
}

// ═══════════════════════════════════════════════════════════════════════
// Build options / results
// ═══════════════════════════════════════════════════════════════════════

export interface BuildPresentationOptions {
    /** Directory holding slide{i}.md files; relative output names resolve against it. */
    baseDir: string;
    /** Output file; defaults to the configured output name inside baseDir. */
    outputPath?: string;
    /** Explicit slot paths, in slot order. Replaces the slide{i}.md template when set. */
    slidePaths?: string[];
    slideCount?: number;
    title?: string;
    subtitle?: string;
}

export interface BuildStats {
    sections: number;
    bullets: number;
    subBullets: number;
    codeBlocks: number;
}

export interface SectionWarning extends SlideWarning {
    slideIndex: number;
    path: string;
}

export interface BuildPresentationResult {
    outputPath: string;
    /** Slot indices that produced a section, ascending. */
    slideIndices: number[];
    stats: BuildStats;
    warnings: SectionWarning[];
}

// ═══════════════════════════════════════════════════════════════════════
// Read outline (used by the inspect command)
// ═══════════════════════════════════════════════════════════════════════

export interface ParagraphOutline {
    bodyChildIndex: number;
    paragraphIndex: number;
    style: string | null;
    text: string;
    alignment: string | null;
    isListItem: boolean;
    indentLeft: number | null;
    pageBreak: boolean;
    /** True when the paragraph has text and every text-bearing run is bold. */
    bold: boolean;
    fonts: string[];
    /** Run sizes in half-points, as stored in w:sz. */
    sizes: number[];
}

export interface PageMargins {
    top: number;
    right: number;
    bottom: number;
    left: number;
}

export interface PageSize {
    width: number;
    height: number;
}

export interface DocxOutline {
    paragraphs: ParagraphOutline[];
    pageSize: PageSize | null;
    pageMargins: PageMargins | null;
    stylesSeen: string[];
}
