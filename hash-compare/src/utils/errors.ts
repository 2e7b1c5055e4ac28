/**
 * Error kinds reported for a file that could not be hashed
 */
export type HashFailureKind = 'not-found' | 'permission-denied' | 'is-directory' | 'io';

/**
 * A root directory that cannot be compared. Aborts the run before traversal.
 */
export class InvalidRootError extends Error {
  constructor(
    readonly root: string,
    readonly reason: string
  ) {
    super(`Invalid root '${root}': ${reason}`);
    this.name = 'InvalidRootError';
  }
}

/**
 * A file that could not be opened or fully read while hashing
 */
export class HashIoError extends Error {
  constructor(
    readonly path: string,
    readonly kind: HashFailureKind,
    options?: { cause?: unknown }
  ) {
    super(`Failed to hash ${path}: ${describeCause(options?.cause)}`, options);
    this.name = 'HashIoError';
  }
}

/**
 * Raised when sending into a channel that has already been closed.
 * Only a pool lifecycle bug can produce it.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

/**
 * Reads the errno code off an unknown error value, if it has one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps an errno code to the failure kind shown to the user
 */
export function classifyIoError(error: unknown): HashFailureKind {
  switch (errorCode(error)) {
    case 'ENOENT':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied';
    case 'EISDIR':
      return 'is-directory';
    default:
      return 'io';
  }
}

function describeCause(cause: unknown): string {
  return cause === undefined ? 'unknown error' : errorMessage(cause);
}
