/**
 * DOCX Validation Utilities
 *
 * Input validation for output paths and slide slot counts.
 *
 * @module docx/validators
 */

import { MAX_SLIDE_COUNT } from './constants.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { isDocxPath } from './utils/index.js';

/** Validate that a DOCX file path is a non-empty string ending in `.docx`. */
export function validateDocxPath(path: string): void {
  const normalised = path.trim();
  if (!normalised) {
    throw new DocxError('DOCX path cannot be empty', DocxErrorCode.INVALID_PATH, { path });
  }
  if (!isDocxPath(normalised)) {
    throw new DocxError('Invalid DOCX path: must end with .docx', DocxErrorCode.INVALID_PATH, { path: normalised });
  }
}

/** Validate a slot count: an integer between 1 and MAX_SLIDE_COUNT. */
export function validateSlideCount(count: number): void {
  if (!Number.isInteger(count) || count < 1 || count > MAX_SLIDE_COUNT) {
    throw new DocxError(
      `Slide count must be an integer between 1 and ${MAX_SLIDE_COUNT}`,
      DocxErrorCode.INVALID_ARGUMENT,
      { count },
    );
  }
}
