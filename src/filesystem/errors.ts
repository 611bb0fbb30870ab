export type FileAccessErrorCode =
  | 'ROOT_NOT_FOUND'
  | 'OUTSIDE_ROOT'
  | 'NOT_A_DIRECTORY'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'STAT_FAILURE'
  | 'CANCELED';

/**
 * Base class for every failure raised while resolving or listing paths.
 * Messages only ever mention the virtual path, never the host location.
 */
export class FileAccessError extends Error {
  constructor(
    readonly code: FileAccessErrorCode,
    message: string,
    readonly virtualPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RootNotFoundError extends FileAccessError {
  constructor(virtual: string) {
    super('ROOT_NOT_FOUND', `file root not found: ${virtual}`, virtual);
  }
}

export class OutsideRootError extends FileAccessError {
  constructor(virtualPath: string) {
    super('OUTSIDE_ROOT', `path escapes configured root: ${virtualPath}`, virtualPath);
  }
}

export class NotADirectoryError extends FileAccessError {
  constructor(virtualPath: string) {
    super('NOT_A_DIRECTORY', `not a directory: ${virtualPath}`, virtualPath);
  }
}

export class NotFoundError extends FileAccessError {
  constructor(virtualPath: string, cause?: unknown) {
    super('NOT_FOUND', `not found: ${virtualPath}`, virtualPath, { cause });
  }
}

export class PermissionDeniedError extends FileAccessError {
  constructor(virtualPath: string, cause?: unknown) {
    super('PERMISSION_DENIED', `permission denied: ${virtualPath}`, virtualPath, { cause });
  }
}

export class StatFailureError extends FileAccessError {
  constructor(virtualPath: string, cause?: unknown) {
    super('STAT_FAILURE', `stat failed: ${virtualPath}`, virtualPath, { cause });
  }
}

export class CanceledError extends FileAccessError {
  constructor(virtualPath: string) {
    super('CANCELED', `request canceled while listing ${virtualPath}`, virtualPath);
  }
}

/** Fatal problem with the configured roots; the service never starts. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Translate a Node fs failure into the matching access error for `virtualPath`. */
export function fromFsError(error: unknown, virtualPath: string): FileAccessError {
  if (error instanceof FileAccessError) {
    return error;
  }
  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
    case 'ELOOP':
      return new NotFoundError(virtualPath, error);
    case 'EACCES':
    case 'EPERM':
      return new PermissionDeniedError(virtualPath, error);
    default:
      return new StatFailureError(virtualPath, error);
  }
}
