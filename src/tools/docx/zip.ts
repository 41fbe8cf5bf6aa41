/**
 * DOCX ZIP I/O. Single Responsibility: buffer ↔ zip ↔ xml.
 *
 * Packing stamps the current time into docProps/core.xml and into every
 * zip entry header. normalizeDocxArchive replaces both with a fixed value
 * so the same deck always packs to the same bytes.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';

import { DOCX_PATHS, FIXED_TIMESTAMP } from './constants.js';
import { DocxError, DocxErrorCode } from './errors.js';

const CORE_TIMESTAMP_PATTERN = /(<dcterms:(created|modified)\b[^>]*>)[^<]*(<\/dcterms:\2>)/g;

/**
 * Read a .docx file from disk, or wrap an in-memory buffer, as a PizZip instance.
 */
export async function loadDocxZip(source: string | Buffer): Promise<PizZip> {
    const buf = typeof source === 'string' ? await fs.readFile(source) : source;
    try {
        return new PizZip(buf);
    } catch (error) {
        throw new DocxError(
            `Invalid DOCX: ${error instanceof Error ? error.message : String(error)}`,
            DocxErrorCode.INVALID_DOCX,
            { source: typeof source === 'string' ? source : '<buffer>' },
        );
    }
}

/**
 * Extract the raw XML string from word/document.xml inside the zip.
 * Throws if the entry is missing.
 */
export function getDocumentXml(zip: PizZip): string {
    const entry = zip.file(DOCX_PATHS.DOCUMENT_XML);
    if (!entry) {
        throw new DocxError('Invalid DOCX: missing word/document.xml', DocxErrorCode.INVALID_DOCX);
    }
    return entry.asText();
}

/** Replace the created/modified timestamps in a core.xml string. */
export function pinCoreTimestamps(coreXml: string, timestamp: string = FIXED_TIMESTAMP): string {
    return coreXml.replace(
        CORE_TIMESTAMP_PATTERN,
        (_match, open: string, _name: string, close: string) => `${open}${timestamp}${close}`,
    );
}

/**
 * Re-pack a .docx archive with fixed timestamps.
 *
 * Entries keep their original order; directory entries are dropped since
 * OOXML readers only need the file parts.
 */
export function normalizeDocxArchive(buffer: Buffer, timestamp: string = FIXED_TIMESTAMP): Buffer {
    const source = new PizZip(buffer);
    const target = new PizZip();
    const entryDate = new Date(timestamp);

    for (const name of Object.keys(source.files)) {
        const entry = source.files[name];
        if (entry.dir) continue;

        if (name === DOCX_PATHS.CORE_PROPERTIES) {
            target.file(name, pinCoreTimestamps(entry.asText(), timestamp), { date: entryDate });
        } else {
            target.file(name, entry.asUint8Array(), { binary: true, date: entryDate });
        }
    }

    return target.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
}
