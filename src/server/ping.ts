import express from 'express';
import type { Request, Response } from 'express';
import { CONTENT_TYPE } from '../api/jsonapi.js';
import { methodNotAllowed } from './errors.js';

export const PING_PATH = '/api/v1/ping';

export interface PingDocument {
  meta: {
    page: {
      currentPage: number;
      from: number;
      lastPage: number;
      perPage: number;
      to: number;
      total: number;
    };
  };
  links: {
    self: string;
    first: string;
    last: string;
  };
  data: {
    type: 'ping';
    id: 'ping';
    attributes: { message: string };
  };
}

export function pingDocument(): PingDocument {
  return {
    meta: {
      page: { currentPage: 1, from: 1, lastPage: 1, perPage: 1, to: 1, total: 1 },
    },
    links: { self: PING_PATH, first: PING_PATH, last: PING_PATH },
    data: { type: 'ping', id: 'ping', attributes: { message: 'pong' } },
  };
}

/** Liveness endpoint; answers without touching the filesystem. */
export function createPingRouter(): express.Router {
  const router = express.Router();
  router.get(PING_PATH, (_req: Request, res: Response) => {
    res.set('Content-Type', CONTENT_TYPE);
    res.status(200).json(pingDocument());
  });
  router.all(PING_PATH, methodNotAllowed);
  return router;
}
