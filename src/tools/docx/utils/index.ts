/**
 * DOCX utilities re-exports
 *
 * Centralized re-exports for all utility modules.
 *
 * @module docx/utils
 */

// Paths
export { isDocxPath, resolveFromBase, resolveSlidePaths, stagingPathFor } from './paths.js';

// Markdown
export { normalizeLineEndings, countLeadingBlankLines } from './markdown.js';
