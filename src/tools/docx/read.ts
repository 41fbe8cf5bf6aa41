/**
 * DOCX outline reader.
 *
 * Returns a token-efficient outline of a .docx: one entry per body
 * paragraph with its style, alignment, list/indent state, text and run
 * formatting, plus the page size and margins. Used by the `inspect` command.
 */

import {
    getBody,
    getBodyChildren,
    getPageMargins,
    getPageSize,
    getParagraphAlignment,
    getParagraphIndentLeft,
    getParagraphRuns,
    getParagraphStyle,
    getParagraphText,
    getRunFont,
    getRunSize,
    hasPageBreak,
    isListParagraph,
    isRunBold,
    parseXml,
    runHasText,
} from './dom.js';
import { DocxErrorCode, withErrorContext } from './errors.js';
import type { DocxOutline, ParagraphOutline } from './types.js';
import { getDocumentXml, loadDocxZip } from './zip.js';

function outlineParagraph(p: Element, bodyChildIndex: number, paragraphIndex: number): ParagraphOutline {
    const textRuns = getParagraphRuns(p).filter(runHasText);
    const fonts = new Set<string>();
    const sizes = new Set<number>();

    for (const run of textRuns) {
        const font = getRunFont(run);
        if (font) fonts.add(font);
        const size = getRunSize(run);
        if (size !== null) sizes.add(size);
    }

    return {
        bodyChildIndex,
        paragraphIndex,
        style: getParagraphStyle(p),
        text: getParagraphText(p),
        alignment: getParagraphAlignment(p),
        isListItem: isListParagraph(p),
        indentLeft: getParagraphIndentLeft(p),
        pageBreak: hasPageBreak(p),
        bold: textRuns.length > 0 && textRuns.every(isRunBold),
        fonts: [...fonts],
        sizes: [...sizes],
    };
}

/** Outline an already-loaded document.xml string. */
export function outlineDocumentXml(xmlStr: string): DocxOutline {
    const body = getBody(parseXml(xmlStr));
    const children = getBodyChildren(body);

    const paragraphs: ParagraphOutline[] = [];
    const stylesSet = new Set<string>();

    children.forEach((child, i) => {
        if (child.nodeName !== 'w:p') return;
        const outline = outlineParagraph(child, i, paragraphs.length);
        if (outline.style) stylesSet.add(outline.style);
        paragraphs.push(outline);
    });

    return {
        paragraphs,
        pageSize: getPageSize(body),
        pageMargins: getPageMargins(body),
        stylesSeen: [...stylesSet].sort(),
    };
}

/** Outline a .docx given its path or its bytes. */
export async function readDocxOutline(source: string | Buffer): Promise<DocxOutline> {
    return withErrorContext(
        async () => {
            const zip = await loadDocxZip(source);
            return outlineDocumentXml(getDocumentXml(zip));
        },
        DocxErrorCode.DOCX_READ_FAILED,
        { source: typeof source === 'string' ? source : '<buffer>' },
    );
}
