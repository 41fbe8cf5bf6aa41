/**
 * DOCX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  INVALID_PATH = 'INVALID_PATH',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_DOCX = 'INVALID_DOCX',
  SLIDE_READ_FAILED = 'SLIDE_READ_FAILED',
  DOCX_CREATE_FAILED = 'DOCX_CREATE_FAILED',
  DOCX_WRITE_FAILED = 'DOCX_WRITE_FAILED',
  DOCX_READ_FAILED = 'DOCX_READ_FAILED',
}

/** Wrap an async operation. Re-throws existing DocxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode | string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new DocxError(message, errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}

/** Node fs errors carry a string `code` such as `ENOENT`. */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
