/**
 * Error types raised by the cache layer
 */

export class CacheDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheDecodeError';
  }
}

export class CacheStorageError extends Error {
  readonly key: string;

  constructor(message: string, key: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheStorageError';
    this.key = key;
  }
}

/**
 * Narrow an unknown error to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
