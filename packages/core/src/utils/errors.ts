/**
 * Error handling and formatting utilities
 */

/**
 * Check whether an error is a Node.js system error with the given code
 *
 * @example
 * isErrnoException(error, 'ENOENT') // => true for a missing file
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Render any thrown value as a single message string
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
