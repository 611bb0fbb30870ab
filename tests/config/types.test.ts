import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, mergeConfig, validateConfig, type AppConfig } from '../../src/config/types.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('mergeConfig', () => {
  it('applies later overrides section by section', () => {
    const merged = mergeConfig(
      defaultConfig,
      { server: { port: 8080 }, logging: { level: 'debug' } },
      { server: { host: '0.0.0.0' } }
    );

    expect(merged.server).toEqual({ host: '0.0.0.0', port: 8080 });
    expect(merged.logging).toEqual({ ...defaultConfig.logging, level: 'debug' });
    expect(merged.timeouts).toEqual(defaultConfig.timeouts);
  });

  it('replaces file roots only with a non-empty list', () => {
    const first = mergeConfig(defaultConfig, { fileRoots: [{ virtual: '/a', source: '/srv/a' }] });
    const second = mergeConfig(first, { fileRoots: [] });
    const third = mergeConfig(second, { fileRoots: [{ virtual: '/b', source: '/srv/b' }] });

    expect(second.fileRoots).toEqual([{ virtual: '/a', source: '/srv/a' }]);
    expect(third.fileRoots).toEqual([{ virtual: '/b', source: '/srv/b' }]);
  });

  it('does not share state with the defaults', () => {
    const merged = mergeConfig(defaultConfig);
    merged.server.port = 1;
    expect(defaultConfig.server.port).toBe(3000);
  });
});

describe('validateConfig', () => {
  let dir: string;
  let docs: string;
  let file: string;

  const withRoots = (fileRoots: AppConfig['fileRoots']): AppConfig => mergeConfig(defaultConfig, { fileRoots });

  beforeEach(async () => {
    dir = await makeTempDir();
    docs = path.join(dir, 'docs');
    file = path.join(dir, 'plain.txt');
    await mkdir(docs);
    await writeFile(file, 'x');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('accepts a valid configuration', () => {
    expect(validateConfig(withRoots([{ virtual: '/docs', source: docs }]))).toEqual([]);
    expect(validateConfig(withRoots([{ virtual: '/', source: docs }]))).toEqual([]);
  });

  it('collects server problems together', () => {
    const config = mergeConfig(withRoots([{ virtual: '/docs', source: docs }]), {
      server: { host: 'localhost', port: 0 },
      timeouts: { request: 10 },
    });

    expect(validateConfig(config)).toEqual([
      'invalid listen address: localhost',
      'invalid port: 0',
      'request timeout must be at least 1000ms',
    ]);
  });

  it('requires at least one file root', () => {
    expect(validateConfig(defaultConfig)).toEqual(['no file roots configured']);
  });

  it.each([
    [{ virtual: ' /docs', source: '/srv' }, 'file root 0: leading or trailing whitespace is not allowed'],
    [{ virtual: 'docs', source: '/srv' }, "file root 0: virtual must start with '/'"],
    [{ virtual: '/a/b', source: '/srv' }, "file root 0: virtual must be '/' or a single folder (e.g. '/public')"],
    [{ virtual: '/a:b', source: '/srv' }, 'file root 0: virtual path cannot contain a colon'],
    [{ virtual: '/docs', source: 'relative/dir' }, "file root 0: source must be an absolute path starting with '/': relative/dir"],
  ])('rejects %o', (root, message) => {
    expect(validateConfig(withRoots([root]))).toEqual([message]);
  });

  it('requires the source to be an existing directory', () => {
    const missing = path.join(dir, 'missing');

    expect(validateConfig(withRoots([{ virtual: '/docs', source: file }]))).toEqual([
      `file root 0: source is not a directory: ${file}`,
    ]);
    const [message] = validateConfig(withRoots([{ virtual: '/docs', source: missing }]));
    expect(message?.startsWith(`file root 0: stat source ${missing}: `)).toBe(true);
  });

  it('reports only the first failing root', () => {
    const errors = validateConfig(
      withRoots([
        { virtual: '/docs', source: docs },
        { virtual: '/docs', source: docs },
        { virtual: 'bad', source: docs },
      ])
    );

    expect(errors).toEqual(['file root 1: duplicate virtual path: /docs']);
  });
});
