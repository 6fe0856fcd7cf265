/**
 * Minimal runtime-dependent types derived from the Node.js globals. Only the
 * fields we actually inspect are included, which keeps the definitions compact.
 */

/** Error raised by the Node.js file-system primitives. */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an {@link ErrnoException} carrying `code`. */
export function hasErrnoCode(error: unknown, code: string): error is ErrnoException {
  return error instanceof Error && "code" in error && error.code === code;
}
