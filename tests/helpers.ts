import type { Express } from 'express';
import { mkdtemp, realpath, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import type { Descriptor, Metadata } from '../src/filesystem/types.js';

/** A fresh directory under the OS temp dir, already canonical. */
export async function makeTempDir(prefix = 'rootshare-'): Promise<string> {
  return realpath(await mkdtemp(path.join(tmpdir(), prefix)));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface Listening {
  url: string;
  close(): Promise<void>;
}

/** Serve `app` on an ephemeral loopback port. */
export function listen(app: Express): Promise<Listening> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server has no TCP address'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close(error => (error ? fail(error) : done()));
            server.closeAllConnections();
          }),
      });
    });
    server.on('error', reject);
  });
}

/** Parse a response body as the document type the endpoint promises. */
export async function readJson<T>(response: Response): Promise<T> {
  return JSON.parse(await response.text());
}

/** An in-memory descriptor for exercising ordering and serialization. */
export function fakeDescriptor(name: string, overrides: Partial<Metadata> = {}): Descriptor {
  const metadata: Metadata = {
    name,
    virtualPath: `/docs/${name}`,
    resourceKind: 'file',
    sizeBytes: 1,
    permissionMode: '0644',
    user: 'tester',
    group: 'testers',
    userId: 1000,
    groupId: 1000,
    mimeType: 'text/plain; charset=utf-8',
    ...overrides,
  };
  const targetKind = metadata.resourceKind === 'folder' ? 'folder' : 'file';

  return {
    root: { virtual: '/docs', source: '/srv/docs' },
    virtualPath: metadata.virtualPath,
    relPath: name,
    name,
    kind: metadata.resourceKind,
    targetKind,
    absolutePath: `/srv/docs/${name}`,
    linkPath: `/srv/docs/${name}`,
    metadata,
  };
}
