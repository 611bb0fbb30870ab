import type { NextFunction, Request, Response } from 'express';
import { InvalidQueryParameterError } from '../api/query.js';
import { FileAccessError } from '../filesystem/errors.js';
import { assertNever } from '../filesystem/types.js';

/** An error that already knows its HTTP status and a client-safe detail. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
    this.name = 'HttpError';
  }
}

const UNEXPECTED_DETAIL = 'An unexpected error occurred.';

/**
 * Map a failure onto the response a client sees.
 * Host paths and internal messages never leak; unknown errors become a plain 500.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) {
    return error;
  }
  if (error instanceof InvalidQueryParameterError) {
    return new HttpError(400, error.message, { cause: error });
  }
  if (error instanceof FileAccessError) {
    switch (error.code) {
      case 'ROOT_NOT_FOUND':
        return new HttpError(404, 'file root not found', { cause: error });
      case 'OUTSIDE_ROOT':
        return new HttpError(400, 'path escapes configured root', { cause: error });
      case 'NOT_A_DIRECTORY':
        return new HttpError(400, 'not a directory', { cause: error });
      case 'NOT_FOUND':
        return new HttpError(404, 'file not found', { cause: error });
      case 'PERMISSION_DENIED':
        return new HttpError(403, 'permission denied', { cause: error });
      case 'CANCELED':
        return new HttpError(408, 'request canceled', { cause: error });
      case 'STAT_FAILURE':
        return new HttpError(500, UNEXPECTED_DETAIL, { cause: error });
      default:
        return assertNever(error.code);
    }
  }
  return new HttpError(500, UNEXPECTED_DETAIL, { cause: error });
}

/** Fallback route for read-only paths: anything but GET and HEAD is refused. */
export function methodNotAllowed(_req: Request, res: Response, next: NextFunction): void {
  res.setHeader('Allow', 'GET, HEAD');
  next(new HttpError(405, 'Method Not Allowed'));
}
