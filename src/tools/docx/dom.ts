/**
 * DOM utilities for reading DOCX XML.
 *
 * Single Responsibility: XML parsing and navigation. No file I/O; every
 * function works on in-memory DOM nodes.
 *
 * Uses @xmldom/xmldom for parsing so that the document-order of nodes is
 * always preserved.
 */

import { DOMParser } from '@xmldom/xmldom';

import type { PageMargins, PageSize } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse
// ═══════════════════════════════════════════════════════════════════════

export function parseXml(xmlStr: string): Document {
    return new DOMParser().parseFromString(xmlStr, 'application/xml');
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

/** Direct element children, in document order. */
export function getElementChildren(parent: Element): Element[] {
    const out: Element[] = [];
    for (const node of nodeListToArray(parent.childNodes)) {
        if (isElement(node)) out.push(node);
    }
    return out;
}

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

function findDirectChild(parent: Element, nodeName: string): Element | null {
    return getElementChildren(parent).find((child) => child.nodeName === nodeName) ?? null;
}

function parseIntAttr(el: Element, name: string): number | null {
    const raw = el.getAttribute(name);
    if (raw === null || raw === '') return null;
    const value = Number.parseInt(raw, 10);
    return Number.isNaN(value) ? null : value;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element {
    const body = doc.getElementsByTagName('w:body').item(0);
    if (!body) throw new Error('Invalid DOCX DOM: missing <w:body>');
    return body;
}

/**
 * Return ALL direct element children of w:body **in document order**.
 * Includes w:p, w:tbl, w:sectPr, etc.
 */
export function getBodyChildren(body: Element): Element[] {
    return getElementChildren(body);
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraph helpers
// ═══════════════════════════════════════════════════════════════════════

export function getParagraphRuns(p: Element): Element[] {
    return nodeListToArray(p.getElementsByTagName('w:r'));
}

function isPageBreak(br: Element): boolean {
    return br.getAttribute('w:type') === 'page';
}

/**
 * Text of a paragraph in run order: w:t text, w:tab as a tab, and
 * line-level w:br as a newline. Page breaks contribute nothing.
 */
export function getParagraphText(p: Element): string {
    let out = '';
    for (const run of getParagraphRuns(p)) {
        for (const child of getElementChildren(run)) {
            if (child.nodeName === 'w:t') {
                out += child.textContent ?? '';
            } else if (child.nodeName === 'w:tab') {
                out += '\t';
            } else if (child.nodeName === 'w:br' && !isPageBreak(child)) {
                out += '\n';
            }
        }
    }
    return out;
}

export function hasPageBreak(p: Element): boolean {
    return nodeListToArray(p.getElementsByTagName('w:br')).some(isPageBreak);
}

/** Read the style id from w:pPr/w:pStyle/@w:val, or null if absent. */
export function getParagraphStyle(p: Element): string | null {
    const pPr = findDirectChild(p, 'w:pPr');
    const pStyle = pPr ? findDirectChild(pPr, 'w:pStyle') : null;
    return pStyle ? pStyle.getAttribute('w:val') : null;
}

export function getParagraphAlignment(p: Element): string | null {
    const pPr = findDirectChild(p, 'w:pPr');
    const jc = pPr ? findDirectChild(pPr, 'w:jc') : null;
    return jc ? jc.getAttribute('w:val') : null;
}

export function isListParagraph(p: Element): boolean {
    const pPr = findDirectChild(p, 'w:pPr');
    return pPr !== null && findDirectChild(pPr, 'w:numPr') !== null;
}

export function getParagraphIndentLeft(p: Element): number | null {
    const pPr = findDirectChild(p, 'w:pPr');
    const ind = pPr ? findDirectChild(pPr, 'w:ind') : null;
    return ind ? parseIntAttr(ind, 'w:left') : null;
}

// ═══════════════════════════════════════════════════════════════════════
// Run helpers
// ═══════════════════════════════════════════════════════════════════════

export function runHasText(run: Element): boolean {
    return nodeListToArray(run.getElementsByTagName('w:t')).some((t) => (t.textContent ?? '') !== '');
}

export function isRunBold(run: Element): boolean {
    const rPr = findDirectChild(run, 'w:rPr');
    if (!rPr) return false;
    const b = findDirectChild(rPr, 'w:b');
    if (!b) return false;
    const val = b.getAttribute('w:val');
    return val === null || val === '' || (val !== 'false' && val !== '0');
}

export function getRunFont(run: Element): string | null {
    const rPr = findDirectChild(run, 'w:rPr');
    const fonts = rPr ? findDirectChild(rPr, 'w:rFonts') : null;
    return fonts ? fonts.getAttribute('w:ascii') : null;
}

export function getRunSize(run: Element): number | null {
    const rPr = findDirectChild(run, 'w:rPr');
    const sz = rPr ? findDirectChild(rPr, 'w:sz') : null;
    return sz ? parseIntAttr(sz, 'w:val') : null;
}

// ═══════════════════════════════════════════════════════════════════════
// Section properties
// ═══════════════════════════════════════════════════════════════════════

/** Margins of the body-level w:sectPr/w:pgMar, in twips. */
export function getPageSize(body: Element): PageSize | null {
    const sectPr = findDirectChild(body, 'w:sectPr');
    const pgSz = sectPr ? findDirectChild(sectPr, 'w:pgSz') : null;
    if (!pgSz) return null;

    return {
        width: parseIntAttr(pgSz, 'w:w') ?? 0,
        height: parseIntAttr(pgSz, 'w:h') ?? 0,
    };
}

export function getPageMargins(body: Element): PageMargins | null {
    const sectPr = findDirectChild(body, 'w:sectPr');
    const pgMar = sectPr ? findDirectChild(sectPr, 'w:pgMar') : null;
    if (!pgMar) return null;

    return {
        top: parseIntAttr(pgMar, 'w:top') ?? 0,
        right: parseIntAttr(pgMar, 'w:right') ?? 0,
        bottom: parseIntAttr(pgMar, 'w:bottom') ?? 0,
        left: parseIntAttr(pgMar, 'w:left') ?? 0,
    };
}
