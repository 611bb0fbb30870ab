import { readFile } from 'fs/promises';
import { ConfigurationError } from '../filesystem/errors.js';
import type { RootDefinition } from '../filesystem/types.js';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from '../logging/logger.js';
import {
  DEFAULT_CONFIG_PATH,
  defaultConfig,
  mergeConfig,
  validateConfig,
  type AppConfig,
  type ConfigOverride,
  type LoggingConfig,
  type ServerConfig,
} from './types.js';

export const ENV_PREFIX = 'ROOTSHARE_';

export interface CliOptions {
  command: 'run' | 'help';
  configPath?: string;
  configCheck: boolean;
  override: ConfigOverride;
}

/**
 * Parse `/virtual:/source` definitions. Each definition may hold several
 * comma-separated pairs; only the first colon splits a pair.
 */
export function parseFileRootDefinitions(definitions: readonly string[]): RootDefinition[] {
  const roots: RootDefinition[] = [];

  definitions.forEach((definition, i) => {
    if (definition === '') {
      throw new ConfigurationError(`file root ${i}: empty definition`);
    }
    definition.split(',').forEach((entry, j) => {
      if (entry === '') {
        throw new ConfigurationError(`file root ${i} entry ${j}: empty definition`);
      }
      const colon = entry.indexOf(':');
      if (colon === -1) {
        throw new ConfigurationError(`file root ${i} entry ${j}: expected format virtual:source`);
      }
      const virtual = entry.slice(0, colon);
      const source = entry.slice(colon + 1);
      if (virtual === '' || source === '') {
        throw new ConfigurationError(`file root ${i} entry ${j}: virtual and source must be non-empty`);
      }
      roots.push({ virtual, source });
    });
  });

  return roots;
}

function parseLogLevel(value: string): LogLevel {
  const lowered = value.toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === lowered);
  if (!level) {
    throw new ConfigurationError(`invalid log level: ${value}`);
  }
  return level;
}

function parseLogFormat(value: string): LogFormat {
  const lowered = value.toLowerCase();
  const format = LOG_FORMATS.find(candidate => candidate === lowered);
  if (!format) {
    throw new ConfigurationError(`invalid log format: ${value}`);
  }
  return format;
}

function parseWholeNumber(value: string, origin: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${origin}: expected a whole number, got ${value}`);
  }
  return Number(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigurationError(`config: ${name} must be an object`);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`config: ${where}.${key} must be a string`);
  }
  return value;
}

function optionalNumber(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigurationError(`config: ${where}.${key} must be a number`);
  }
  return value;
}

function fileRootsFrom(value: unknown): RootDefinition[] | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return parseFileRootDefinitions([value]);
  if (!Array.isArray(value)) {
    throw new ConfigurationError('config: fileRoots must be a list');
  }
  return value.map((entry: unknown, i) => {
    if (typeof entry === 'string') {
      const [root] = parseFileRootDefinitions([entry]);
      if (!root) throw new ConfigurationError(`config: fileRoots[${i}] is empty`);
      return root;
    }
    if (!isRecord(entry) || typeof entry.virtual !== 'string' || typeof entry.source !== 'string') {
      throw new ConfigurationError(`config: fileRoots[${i}] needs string virtual and source`);
    }
    return { virtual: entry.virtual, source: entry.source };
  });
}

/** Turn the parsed JSON of a config file into an override. */
export function overrideFromJson(raw: unknown): ConfigOverride {
  if (!isRecord(raw)) {
    throw new ConfigurationError('config: top level must be an object');
  }
  const server = section(raw, 'server');
  const timeouts = section(raw, 'timeouts');
  const logging = section(raw, 'logging');

  const override: ConfigOverride = { server: {}, timeouts: {}, logging: {} };
  const host = optionalString(server, 'host', 'server');
  const port = optionalNumber(server, 'port', 'server');
  const request = optionalNumber(timeouts, 'request', 'timeouts');
  const level = optionalString(logging, 'level', 'logging');
  const format = optionalString(logging, 'format', 'logging');
  const file = optionalString(logging, 'file', 'logging');
  const requests = logging.requests;

  if (host !== undefined) override.server = { ...override.server, host };
  if (port !== undefined) override.server = { ...override.server, port };
  if (request !== undefined) override.timeouts = { request };
  if (level !== undefined) override.logging = { ...override.logging, level: parseLogLevel(level) };
  if (format !== undefined) override.logging = { ...override.logging, format: parseLogFormat(format) };
  if (file !== undefined) override.logging = { ...override.logging, file };
  if (requests !== undefined) {
    if (typeof requests !== 'boolean') {
      throw new ConfigurationError('config: logging.requests must be a boolean');
    }
    override.logging = { ...override.logging, requests };
  }
  override.fileRoots = fileRootsFrom(raw.fileRoots);

  return override;
}

/**
 * Read a JSON config file. A missing file is not an error; the defaults,
 * environment and flags then supply everything.
 */
export async function readConfigFile(configPath: string): Promise<ConfigOverride> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`read config: ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`read config: ${configPath}: ${reason}`, { cause: error });
  }
  return overrideFromJson(raw);
}

/** Overrides from `ROOTSHARE_*` variables. */
export function overrideFromEnv(env: NodeJS.ProcessEnv): ConfigOverride {
  const override: ConfigOverride = {};
  const value = (name: string): string | undefined => {
    const raw = env[`${ENV_PREFIX}${name}`];
    return raw === undefined || raw === '' ? undefined : raw;
  };

  const listen = value('LISTEN');
  const port = value('PORT');
  if (listen !== undefined || port !== undefined) {
    override.server = {};
    if (listen !== undefined) override.server.host = listen;
    if (port !== undefined) override.server.port = parseWholeNumber(port, `${ENV_PREFIX}PORT`);
  }

  const timeout = value('REQUEST_TIMEOUT');
  if (timeout !== undefined) {
    override.timeouts = { request: parseWholeNumber(timeout, `${ENV_PREFIX}REQUEST_TIMEOUT`) };
  }

  const level = value('LOG_LEVEL');
  const format = value('LOG_FORMAT');
  const file = value('LOG_FILE');
  if (level !== undefined || format !== undefined || file !== undefined) {
    override.logging = {};
    if (level !== undefined) override.logging.level = parseLogLevel(level);
    if (format !== undefined) override.logging.format = parseLogFormat(format);
    if (file !== undefined) override.logging.file = file;
  }

  const roots = value('FILE_ROOT');
  if (roots !== undefined) {
    override.fileRoots = parseFileRootDefinitions([roots]);
  }

  return override;
}

export const USAGE = `
rootshare - read-only JSON:API access to configured directories

USAGE:
  rootshare run [options]

OPTIONS:
  --config <path>         Config file (default: ${DEFAULT_CONFIG_PATH})
  --port <port>           Port to listen on (default: ${defaultConfig.server.port})
  --listen <address>      Listen address (default: ${defaultConfig.server.host})
  --log-level <level>     debug, info, warn or error (default: info)
  --log-file <path>       Log file path, or '-' for stdout (default: logging off)
  --log-format <format>   text or json (default: text)
  --file-root <def>       /virtual:/source mapping, repeatable or comma-separated
  --config-check          Validate the configuration and exit
  --help                  Show this help

ENVIRONMENT VARIABLES:
  ${ENV_PREFIX}CONFIG, ${ENV_PREFIX}PORT, ${ENV_PREFIX}LISTEN, ${ENV_PREFIX}LOG_LEVEL,
  ${ENV_PREFIX}LOG_FILE, ${ENV_PREFIX}LOG_FORMAT, ${ENV_PREFIX}FILE_ROOT,
  ${ENV_PREFIX}REQUEST_TIMEOUT

EXAMPLES:
  rootshare run --file-root /public:/srv/public
  rootshare run --config ./rootshare.json --config-check
`;

// Parse command line arguments
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'help', configCheck: false, override: {} };
  const server: Partial<ServerConfig> = {};
  const logging: Partial<LoggingConfig> = {};
  const rootDefinitions: string[] = [];

  const next = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case 'run':
        options.command = 'run';
        break;
      case '--config':
        options.configPath = next(i++, arg);
        break;
      case '--port':
        server.port = parseWholeNumber(next(i++, arg), arg);
        break;
      case '--listen':
        server.host = next(i++, arg);
        break;
      case '--log-level':
        logging.level = parseLogLevel(next(i++, arg));
        break;
      case '--log-file':
        logging.file = next(i++, arg);
        break;
      case '--log-format':
        logging.format = parseLogFormat(next(i++, arg));
        break;
      case '--file-root':
        rootDefinitions.push(next(i++, arg));
        break;
      case '--config-check':
        options.configCheck = true;
        break;
      case '--help':
      case '-h':
        options.command = 'help';
        return options;
      default:
        throw new ConfigurationError(`unknown argument: ${String(arg)}`);
    }
  }

  if (Object.keys(server).length > 0) options.override.server = server;
  if (Object.keys(logging).length > 0) options.override.logging = logging;
  if (rootDefinitions.length > 0) options.override.fileRoots = parseFileRootDefinitions(rootDefinitions);

  return options;
}

/**
 * Resolve configuration with precedence defaults < config file < environment < flags,
 * then validate it. Every validation problem is reported in one error.
 */
export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv,
  flags: ConfigOverride = {}
): Promise<AppConfig> {
  const fromFile = await readConfigFile(configPath);
  const config = mergeConfig(defaultConfig, fromFile, overrideFromEnv(env), flags);

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(`validate config: ${errors.join('; ')}`);
  }
  return config;
}

export function configPathFrom(options: CliOptions, env: NodeJS.ProcessEnv): string {
  return options.configPath ?? env[`${ENV_PREFIX}CONFIG`] ?? DEFAULT_CONFIG_PATH;
}
