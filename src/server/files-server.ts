import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { collectionDocument, CONTENT_TYPE } from '../api/jsonapi.js';
import { applyListParams, parseListParams } from '../api/query.js';
import { fromFsError } from '../filesystem/errors.js';
import type { FileService } from '../filesystem/service.js';
import { sniffFile } from '../filesystem/sniff.js';
import type { Descriptor } from '../filesystem/types.js';
import { requestContext } from './context.js';
import { HttpError, methodNotAllowed, toHttpError } from './errors.js';

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/** The raw query string of a request, decoded the way a browser encodes forms. */
export function queryOf(req: Request): URLSearchParams {
  const index = req.originalUrl.indexOf('?');
  return new URLSearchParams(index === -1 ? '' : req.originalUrl.slice(index + 1));
}

/**
 * Turn the still-encoded path below the files endpoint into a virtual path.
 * Trailing slashes are refused rather than redirected.
 */
export function virtualPathFrom(rawPath: string): string {
  if (rawPath === '' || rawPath === '/') {
    throw new HttpError(404, 'file path required');
  }
  if (rawPath.endsWith('/')) {
    throw new HttpError(404, 'trailing slash is not allowed');
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath.replace(/^\/+/, ''));
  } catch (error) {
    throw new HttpError(400, `invalid path: ${rawPath}`, { cause: error });
  }
  return `/${decoded}`;
}

/**
 * JSON:API endpoint over a {@link FileService}: lists the roots, lists
 * folders with paging and sorting, and streams file content.
 */
export class FilesServer {
  constructor(private readonly service: FileService) {}

  /** Router meant to be mounted at the files base path. */
  createRouter(): express.Router {
    const router = express.Router();

    router.get('/', (req: Request, res: Response, next: NextFunction) => {
      this.handleListRoots(req, res).catch(next);
    });
    // A regular expression route leaves the path encoded; '*' would decode it as a parameter.
    router.get(/.*/, (req: Request, res: Response, next: NextFunction) => {
      this.handleResource(req, res, next).catch(next);
    });
    router.all(/.*/, methodNotAllowed);

    return router;
  }

  private async handleListRoots(req: Request, res: Response): Promise<void> {
    // Mounting strips the slash, so `/files/` reaches this route as `/` too.
    const queryStart = req.originalUrl.indexOf('?');
    const rawPath = queryStart === -1 ? req.originalUrl : req.originalUrl.slice(0, queryStart);
    if (rawPath.endsWith('/')) {
      throw new HttpError(404, 'trailing slash is not allowed');
    }

    const params = parseListParams(queryOf(req));
    const { signal } = requestContext(res);

    // A lone "/" root is shown by its contents, not as a single entry.
    const entries = this.service.hasSingleSlashRoot()
      ? await this.service.listDirectory('/', '', signal)
      : await this.service.listRoots();

    const page = applyListParams(entries, params, req.baseUrl);
    this.sendJson(res, collectionDocument(page, params.offset, params.limit));
  }

  private async handleResource(req: Request, res: Response, next: NextFunction): Promise<void> {
    const requestPath = virtualPathFrom(req.path);
    const match = this.service.matchRoot(requestPath);
    if (!match) {
      throw new HttpError(404, 'file root not found');
    }

    const descriptor = await this.service.resolve(match.root.virtual, match.rel);
    if (descriptor.targetKind === 'folder') {
      const params = parseListParams(queryOf(req));
      const { signal } = requestContext(res);
      const entries = await this.service.listDirectory(match.root.virtual, match.rel, signal);
      const page = applyListParams(entries, params, `${req.baseUrl}${req.path}`);
      this.sendJson(res, collectionDocument(page, params.offset, params.limit));
      return;
    }

    await this.serveFile(req, res, next, descriptor);
  }

  private async serveFile(req: Request, res: Response, next: NextFunction, descriptor: Descriptor): Promise<void> {
    const { virtualPath, absolutePath } = descriptor;

    // The listing calls a link "inode/symlink"; delivery describes what it points at.
    const contentType = descriptor.kind === 'symlink' ? await sniffFile(absolutePath) : descriptor.metadata.mimeType;

    let size: number;
    try {
      size = (await stat(absolutePath)).size;
    } catch (error) {
      throw fromFsError(error, virtualPath);
    }

    if (queryOf(req).get('download') === '1') {
      res.attachment(descriptor.metadata.name);
    }
    // Set after attachment(), which would otherwise derive the type from the extension.
    res.setHeader('Content-Type', contentType || FALLBACK_CONTENT_TYPE);
    res.setHeader('Content-Length', String(size));
    res.status(200);

    const stream = createReadStream(absolutePath);
    stream.on('error', error => {
      if (!res.headersSent) {
        res.removeHeader('Content-Disposition');
        next(toHttpError(fromFsError(error, virtualPath)));
        return;
      }
      requestContext(res).logger.error('file stream failed', { path: virtualPath, error });
      res.destroy(error);
    });
    stream.pipe(res);
  }

  private sendJson(res: Response, body: unknown): void {
    res.set('Content-Type', CONTENT_TYPE);
    res.status(200).json(body);
  }
}
