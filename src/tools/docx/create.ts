/**
 * buildPresentation - Turn the numbered slide files of a directory into one
 * DOCX file.
 *
 * Slots are probed in ascending order; each existing slide becomes a
 * section (page break, centered heading, bullets and code blocks). The
 * archive is staged next to the output and renamed into place, so a failed
 * write never leaves a partial document behind.
 */

import fs from 'fs/promises';
import path from 'path';

import { createDocxFromDeck } from './builders/index.js';
import {
    DEFAULT_OUTPUT_FILENAME,
    DEFAULT_SLIDE_COUNT,
    DEFAULT_SUBTITLE,
    DEFAULT_TITLE,
} from './constants.js';
import { DocxErrorCode, withErrorContext } from './errors.js';
import { parseSlide } from './parsers/index.js';
import { loadSlideSources } from './sources.js';
import type {
    BuildPresentationOptions,
    BuildPresentationResult,
    BuildStats,
    DeckContent,
    SectionWarning,
    SlideSection,
    SlideSource,
} from './types.js';
import { resolveFromBase, resolveSlidePaths, stagingPathFor } from './utils/index.js';
import { validateDocxPath, validateSlideCount } from './validators.js';
import { logger } from '../../utils/logger.js';

/** Parse loaded sources into deck sections, keeping slot order. */
export function parseSections(sources: SlideSource[]): SlideSection[] {
    return sources.map((source) => {
        const parsed = parseSlide(source.content);
        logger.debug(`Slide ${source.index}: "${parsed.heading}", ${parsed.blocks.length} block(s)`);
        return { index: source.index, path: source.path, ...parsed };
    });
}

export function collectStats(sections: SlideSection[]): BuildStats {
    const stats: BuildStats = { sections: sections.length, bullets: 0, subBullets: 0, codeBlocks: 0 };
    for (const section of sections) {
        for (const block of section.blocks) {
            if (block.type === 'bullet') stats.bullets++;
            else if (block.type === 'sub-bullet') stats.subBullets++;
            else stats.codeBlocks++;
        }
    }
    return stats;
}

function collectWarnings(sections: SlideSection[]): SectionWarning[] {
    return sections.flatMap((section) =>
        section.warnings.map((warning) => ({ ...warning, slideIndex: section.index, path: section.path })),
    );
}

/** Write via a staging file and rename, removing the staging file on failure. */
export async function writeFileAtomic(outputPath: string, data: Buffer): Promise<void> {
    const stagingPath = stagingPathFor(outputPath);
    await withErrorContext(
        async () => {
            try {
                await fs.writeFile(stagingPath, data);
                await fs.rename(stagingPath, outputPath);
            } catch (error) {
                await fs.rm(stagingPath, { force: true });
                throw error;
            }
        },
        DocxErrorCode.DOCX_WRITE_FAILED,
        { outputPath },
    );
}

export async function buildPresentation(options: BuildPresentationOptions): Promise<BuildPresentationResult> {
    const baseDir = path.resolve(options.baseDir);
    const outputPath = resolveFromBase(options.outputPath ?? DEFAULT_OUTPUT_FILENAME, baseDir);
    validateDocxPath(outputPath);

    let slidePaths: string[];
    if (options.slidePaths) {
        slidePaths = options.slidePaths.map((p) => resolveFromBase(p, baseDir));
    } else {
        const count = options.slideCount ?? DEFAULT_SLIDE_COUNT;
        validateSlideCount(count);
        slidePaths = resolveSlidePaths(baseDir, count);
    }

    const sources = await loadSlideSources(slidePaths);
    const sections = parseSections(sources);
    const warnings = collectWarnings(sections);
    for (const warning of warnings) {
        logger.warning(`${warning.path}: ${warning.message}`);
    }

    const deck: DeckContent = {
        title: options.title ?? DEFAULT_TITLE,
        subtitle: options.subtitle ?? DEFAULT_SUBTITLE,
        sections,
    };

    const buffer = await createDocxFromDeck(deck);
    await writeFileAtomic(outputPath, buffer);
    logger.info(`Wrote ${sections.length} section(s) to ${outputPath}`);

    return {
        outputPath,
        slideIndices: sections.map((s) => s.index),
        stats: collectStats(sections),
        warnings,
    };
}
