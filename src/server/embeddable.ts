// Middleware factory and standalone server for the files API

import express from 'express';
import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { errorDocument, CONTENT_TYPE, FILES_BASE_PATH } from '../api/jsonapi.js';
import { defaultConfig, mergeConfig, type AppConfig, type ConfigOverride } from '../config/types.js';
import type { FileService } from '../filesystem/service.js';
import { Logger } from '../logging/logger.js';
import { RequestContext, requestContext, setRequestContext } from './context.js';
import { HttpError, toHttpError } from './errors.js';
import { FilesServer } from './files-server.js';
import { createPingRouter } from './ping.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Files middleware options
 */
export interface FilesMiddlewareOptions {
  service: FileService;
  config?: ConfigOverride;
  logger?: Logger;
}

/**
 * Create the files API as one router that can be used with app.use()
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createFilesMiddleware, FileService } from 'rootshare';
 *
 * const service = await FileService.create([{ virtual: '/public', source: '/srv/public' }]);
 * const app = express();
 * app.use(createFilesMiddleware({ service }));
 * ```
 */
export function createFilesMiddleware(options: FilesMiddlewareOptions): express.Router {
  const config = mergeConfig(defaultConfig, options.config ?? {});
  const logger = options.logger ?? Logger.disabled();
  const files = new FilesServer(options.service);
  const router = express.Router();

  // Request context: id, logger and an abort signal that fires on timeout or disconnect
  router.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get(REQUEST_ID_HEADER) || uuidv4();
    const controller = new AbortController();
    const requestLogger = logger.child({ request_id: requestId });

    const timer = setTimeout(() => {
      requestLogger.warn('request timeout', {
        method: req.method,
        path: req.path,
        timeout_ms: config.timeouts.request,
      });
      controller.abort();
    }, config.timeouts.request);
    timer.unref();

    res.on('close', () => {
      clearTimeout(timer);
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    res.setHeader(REQUEST_ID_HEADER, requestId);
    setRequestContext(res, new RequestContext(requestId, requestLogger, controller.signal));
    next();
  });

  // Request logging middleware
  if (config.logging.requests) {
    router.use((req: Request, res: Response, next: NextFunction) => {
      const started = Date.now();
      res.on('finish', () => {
        requestContext(res).logger.debug('request', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          duration_ms: Date.now() - started,
          remote_ip: req.ip,
          user_agent: req.get('User-Agent'),
        });
      });
      next();
    });
  }

  router.use(createPingRouter());
  router.use(FILES_BASE_PATH, files.createRouter());

  router.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new HttpError(404, 'Not Found'));
  });

  const handleError: ErrorRequestHandler = (error: unknown, req: Request, res: Response, next: NextFunction) => {
    const httpError = toHttpError(error);
    const { logger: requestLogger } = requestContext(res);

    if (httpError.status >= 500) {
      requestLogger.error('request failed', { method: req.method, path: req.originalUrl, error: httpError.cause ?? error });
    } else {
      requestLogger.debug('request rejected', { method: req.method, path: req.originalUrl, status: httpError.status });
    }

    if (res.headersSent) {
      next(error);
      return;
    }
    res.set('Content-Type', CONTENT_TYPE);
    res.status(httpError.status).json(errorDocument(httpError.status, httpError.detail));
  };
  router.use(handleError);

  logger.info('files middleware ready', { roots: options.service.roots().length });
  return router;
}

export function createApp(options: FilesMiddlewareOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(createFilesMiddleware(options));
  return app;
}

/**
 * Standalone HTTP server around {@link createApp}
 */
export class RootshareServer {
  private readonly config: AppConfig;
  private readonly app: express.Express;
  private server: Server | null = null;

  constructor(
    service: FileService,
    config: ConfigOverride,
    private readonly logger: Logger = Logger.disabled()
  ) {
    this.config = mergeConfig(defaultConfig, config);
    this.app = createApp({ service, config: this.config, logger });
  }

  async start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const { port, host } = this.config.server;

      const server = this.app.listen(port, host, () => {
        this.logger.info('listening', { address: `http://${host}:${this.port() ?? port}` });
        resolve(server);
      });
      this.server = server;

      server.on('error', (error: Error) => {
        this.logger.error('server error', { error });
        reject(error);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.logger.info('server stopped');
  }

  /** The bound port, once listening. */
  port(): number | undefined {
    const address: string | AddressInfo | null | undefined = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : undefined;
  }

  getConfig(): AppConfig {
    return { ...this.config };
  }
}
