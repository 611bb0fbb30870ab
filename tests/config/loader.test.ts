import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  configPathFrom,
  loadConfig,
  overrideFromEnv,
  overrideFromJson,
  parseArgs,
  parseFileRootDefinitions,
  readConfigFile,
} from '../../src/config/loader.js';
import { DEFAULT_CONFIG_PATH } from '../../src/config/types.js';
import { makeTempDir, removeDir } from '../helpers.js';

describe('parseFileRootDefinitions', () => {
  it('splits repeated and comma-separated pairs', () => {
    expect(parseFileRootDefinitions(['/a:/srv/a,/b:/srv/b', '/c:/srv/c'])).toEqual([
      { virtual: '/a', source: '/srv/a' },
      { virtual: '/b', source: '/srv/b' },
      { virtual: '/c', source: '/srv/c' },
    ]);
  });

  it('splits on the first colon only', () => {
    expect(parseFileRootDefinitions(['/a:/srv:odd'])).toEqual([{ virtual: '/a', source: '/srv:odd' }]);
  });

  it.each([
    [[''], 'file root 0: empty definition'],
    [['/a:/srv/a,'], 'file root 0 entry 1: empty definition'],
    [['/a'], 'file root 0 entry 0: expected format virtual:source'],
    [[':/srv/a'], 'file root 0 entry 0: virtual and source must be non-empty'],
    [['/a:/srv/a', '/b:'], 'file root 1 entry 0: virtual and source must be non-empty'],
  ])('rejects %j', (definitions, message) => {
    expect(() => parseFileRootDefinitions(definitions)).toThrow(message);
  });
});

describe('overrideFromEnv', () => {
  it('reads prefixed variables', () => {
    expect(
      overrideFromEnv({
        ROOTSHARE_PORT: '8080',
        ROOTSHARE_LOG_LEVEL: 'DEBUG',
        ROOTSHARE_FILE_ROOT: '/a:/srv/a',
        PORT: '9999',
      })
    ).toEqual({
      server: { port: 8080 },
      logging: { level: 'debug' },
      fileRoots: [{ virtual: '/a', source: '/srv/a' }],
    });
  });

  it('ignores empty values', () => {
    expect(overrideFromEnv({ ROOTSHARE_PORT: '', ROOTSHARE_LISTEN: '' })).toEqual({});
  });

  it('rejects malformed numbers', () => {
    expect(() => overrideFromEnv({ ROOTSHARE_PORT: 'abc' })).toThrow('ROOTSHARE_PORT: expected a whole number, got abc');
  });
});

describe('overrideFromJson', () => {
  it('reads every section', () => {
    expect(
      overrideFromJson({
        server: { host: '0.0.0.0', port: 8080 },
        timeouts: { request: 5000 },
        logging: { level: 'warn', format: 'json', file: '-', requests: false },
        fileRoots: ['/a:/srv/a', { virtual: '/b', source: '/srv/b' }],
      })
    ).toEqual({
      server: { host: '0.0.0.0', port: 8080 },
      timeouts: { request: 5000 },
      logging: { level: 'warn', format: 'json', file: '-', requests: false },
      fileRoots: [
        { virtual: '/a', source: '/srv/a' },
        { virtual: '/b', source: '/srv/b' },
      ],
    });
  });

  it.each([
    [[], 'config: top level must be an object'],
    [{ server: 'x' }, 'config: server must be an object'],
    [{ server: { port: '80' } }, 'config: server.port must be a number'],
    [{ logging: { requests: 'yes' } }, 'config: logging.requests must be a boolean'],
    [{ logging: { level: 'loud' } }, 'invalid log level: loud'],
    [{ fileRoots: [{ virtual: '/a' }] }, 'config: fileRoots[0] needs string virtual and source'],
  ])('rejects %j', (raw, message) => {
    expect(() => overrideFromJson(raw)).toThrow(message);
  });
});

describe('parseArgs', () => {
  it('collects flags into an override', () => {
    const options = parseArgs([
      'run',
      '--port',
      '8080',
      '--log-format',
      'json',
      '--file-root',
      '/a:/srv/a',
      '--file-root',
      '/b:/srv/b',
      '--config',
      '/etc/custom.json',
      '--config-check',
    ]);

    expect(options).toEqual({
      command: 'run',
      configPath: '/etc/custom.json',
      configCheck: true,
      override: {
        server: { port: 8080 },
        logging: { format: 'json' },
        fileRoots: [
          { virtual: '/a', source: '/srv/a' },
          { virtual: '/b', source: '/srv/b' },
        ],
      },
    });
  });

  it('shows help without a command or when asked', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['run', '--help']).command).toBe('help');
    expect(parseArgs(['-h']).command).toBe('help');
  });

  it('rejects unknown and incomplete arguments', () => {
    expect(() => parseArgs(['run', '--bogus'])).toThrow('unknown argument: --bogus');
    expect(() => parseArgs(['run', '--port'])).toThrow('--port requires a value');
    expect(() => parseArgs(['run', '--port', '--listen'])).toThrow('--port requires a value');
    expect(() => parseArgs(['run', '--log-level', 'loud'])).toThrow('invalid log level: loud');
  });
});

describe('configPathFrom', () => {
  it('prefers the flag, then the environment, then the default', () => {
    const options = parseArgs(['run']);

    expect(configPathFrom({ ...options, configPath: '/flag.json' }, { ROOTSHARE_CONFIG: '/env.json' })).toBe('/flag.json');
    expect(configPathFrom(options, { ROOTSHARE_CONFIG: '/env.json' })).toBe('/env.json');
    expect(configPathFrom(options, {})).toBe(DEFAULT_CONFIG_PATH);
  });
});

describe('config files', () => {
  let dir: string;
  let docs: string;
  let media: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    docs = path.join(dir, 'docs');
    media = path.join(dir, 'media');
    configPath = path.join(dir, 'rootshare.json');
    await mkdir(docs);
    await mkdir(media);
    await writeFile(
      configPath,
      JSON.stringify({
        server: { port: 4000 },
        logging: { level: 'warn' },
        fileRoots: [{ virtual: '/docs', source: docs }],
      })
    );
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('treats a missing file as empty', async () => {
    expect(await readConfigFile(path.join(dir, 'absent.json'))).toEqual({});
  });

  it('rejects malformed JSON', async () => {
    const broken = path.join(dir, 'broken.json');
    await writeFile(broken, '{ "server": ');

    await expect(readConfigFile(broken)).rejects.toThrow(`read config: ${broken}: `);
  });

  it('layers defaults, file, environment and flags', async () => {
    const config = await loadConfig(configPath, { ROOTSHARE_PORT: '5000', ROOTSHARE_LOG_FORMAT: 'json' }, {
      server: { port: 6000 },
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 6000 });
    expect(config.logging).toEqual({ level: 'warn', format: 'json', file: '', requests: true });
    expect(config.fileRoots).toEqual([{ virtual: '/docs', source: docs }]);
  });

  it('lets the environment replace file roots from the file', async () => {
    const config = await loadConfig(configPath, { ROOTSHARE_FILE_ROOT: `/media:${media}` });

    expect(config.server.port).toBe(4000);
    expect(config.fileRoots).toEqual([{ virtual: '/media', source: media }]);
  });

  it('fails validation with every problem listed', async () => {
    await expect(loadConfig(path.join(dir, 'absent.json'), {})).rejects.toThrow(
      'validate config: no file roots configured'
    );
  });
});
