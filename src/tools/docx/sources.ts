/**
 * Slide sources: read the slot files that exist, in slot order.
 */

import fs from 'fs/promises';

import { DocxError, DocxErrorCode, getErrnoCode } from './errors.js';
import type { SlideSource } from './types.js';
import { logger } from '../../utils/logger.js';

/**
 * Read every existing slide file. A missing file skips its slot; any other
 * read failure aborts the build.
 *
 * @param paths Slot paths; `paths[0]` is slot 1.
 */
export async function loadSlideSources(paths: string[]): Promise<SlideSource[]> {
  const sources: SlideSource[] = [];

  for (const [offset, slidePath] of paths.entries()) {
    const index = offset + 1;
    let content: string;
    try {
      content = await fs.readFile(slidePath, 'utf8');
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        logger.debug(`Slide ${index} not found at ${slidePath}, skipping`);
        continue;
      }
      throw new DocxError(
        `Failed to read slide ${index}: ${error instanceof Error ? error.message : String(error)}`,
        DocxErrorCode.SLIDE_READ_FAILED,
        { index, path: slidePath },
      );
    }
    sources.push({ index, path: slidePath, content });
  }

  return sources;
}
