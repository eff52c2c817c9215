/**
 * Failure taxonomy shared by every command.
 *
 * All codes are terminal for the current command; nothing is retried. The entry point
 * prints `message` as a single line and `hint`, when present, as a follow-up.
 */
export type BlogErrorCode =
  | 'NOT_INITIALIZED'
  | 'NOT_FOUND'
  | 'INVALID_FORMAT'
  | 'NO_FILES_TO_PUBLISH'
  | 'AUTH_REQUIRED'
  | 'REMOTE_ERROR'
  | 'INVALID_REMOTE_RESPONSE'
  | 'IO_ERROR'
  | 'PUBLISHED_NOT_RECORDED';

export interface BlogErrorOptions {
  hint?: string;
  cause?: unknown;
}

export class BlogError extends Error {
  readonly code: BlogErrorCode;
  readonly hint?: string;

  constructor(code: BlogErrorCode, message: string, options: BlogErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'BlogError';
    this.code = code;
    this.hint = options.hint;
  }
}

export const isBlogError = (error: unknown, code?: BlogErrorCode): error is BlogError =>
  error instanceof BlogError && (code === undefined || error.code === code);

/** Node's fs errors carry a string `code` such as `ENOENT`. */
export const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
