import type { Response } from 'express';
import { Logger } from '../logging/logger.js';

/** Per-request state kept on `res.locals`. */
export class RequestContext {
  constructor(
    readonly requestId: string,
    readonly logger: Logger,
    readonly signal: AbortSignal
  ) {}
}

const detached = new RequestContext('', Logger.disabled(), new AbortController().signal);

export function requestContext(res: Response): RequestContext {
  const context: unknown = res.locals.context;
  // Routers mounted without the request middleware still get a usable context.
  return context instanceof RequestContext ? context : detached;
}

export function setRequestContext(res: Response, context: RequestContext): void {
  res.locals.context = context;
}
