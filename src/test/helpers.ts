import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { DocxError } from '../tools/docx/errors.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'slides-to-docx-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeSlides(dir: string, slides: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(slides)) {
    await fs.writeFile(path.join(dir, name), content, 'utf8');
  }
}

/** Await a promise expected to reject with a DocxError and return that error. */
export async function rejectionOf(promise: Promise<unknown>): Promise<DocxError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DocxError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
}

/** Same as rejectionOf for synchronous calls. */
export function thrownBy(fn: () => unknown): DocxError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DocxError) return error;
    throw error;
  }
  throw new Error('Expected function to throw');
}
