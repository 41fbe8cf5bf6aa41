/**
 * Path Utilities
 *
 * Pure functions for resolving slide and output paths.
 *
 * @module docx/utils/paths
 */

import path from 'path';
import { slideFileName } from '../constants.js';

/** Check if a file path has a `.docx` extension. */
export function isDocxPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.docx');
}

/** Resolve a path relative to a base directory (pass-through for absolute paths). */
export function resolveFromBase(filePath: string, baseDir: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(baseDir, filePath);
}

/** Template paths for slots 1..count, in slot order. */
export function resolveSlidePaths(baseDir: string, count: number): string[] {
  const paths: string[] = [];
  for (let i = 1; i <= count; i++) {
    paths.push(path.join(baseDir, slideFileName(i)));
  }
  return paths;
}

/** Sibling path the output is staged to before it is renamed into place. */
export function stagingPathFor(outputPath: string): string {
  return `${outputPath}.${process.pid}.tmp`;
}
