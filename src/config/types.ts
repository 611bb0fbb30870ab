// Configuration types, defaults and validation for the file service

import { statSync } from 'fs';
import { isIP } from 'net';
import path from 'path';
import type { RootDefinition } from '../filesystem/types.js';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from '../logging/logger.js';

export interface ServerConfig {
  host: string;
  port: number;
}

export interface TimeoutConfig {
  request: number;        // Whole-request budget (ms); directory listings abort past it
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  file: string;           // '' disables logging, '-' is stdout
  requests: boolean;      // Per-request debug line with a request id
}

export interface AppConfig {
  server: ServerConfig;
  timeouts: TimeoutConfig;
  logging: LoggingConfig;
  fileRoots: RootDefinition[];
}

/** Partial configuration as read from a file, the environment or flags. */
export interface ConfigOverride {
  server?: Partial<ServerConfig>;
  timeouts?: Partial<TimeoutConfig>;
  logging?: Partial<LoggingConfig>;
  fileRoots?: RootDefinition[];
}

// Default configuration
export const defaultConfig: AppConfig = {
  server: {
    host: '127.0.0.1',
    port: 3000,
  },
  timeouts: {
    request: 30000,     // 30 seconds
  },
  logging: {
    level: 'info',
    format: 'text',
    file: '',
    requests: true,
  },
  fileRoots: [],
};

export const DEFAULT_CONFIG_PATH = '/etc/rootshare/rootshare.json';

// Later overrides win; file roots are replaced, never appended.
export function mergeConfig(base: AppConfig, ...overrides: ConfigOverride[]): AppConfig {
  const result: AppConfig = {
    server: { ...base.server },
    timeouts: { ...base.timeouts },
    logging: { ...base.logging },
    fileRoots: [...base.fileRoots],
  };

  for (const override of overrides) {
    if (override.server) result.server = { ...result.server, ...override.server };
    if (override.timeouts) result.timeouts = { ...result.timeouts, ...override.timeouts };
    if (override.logging) result.logging = { ...result.logging, ...override.logging };
    if (override.fileRoots && override.fileRoots.length > 0) result.fileRoots = [...override.fileRoots];
  }

  return result;
}

function validateFileRoot(root: RootDefinition, index: number, seen: Set<string>): string | undefined {
  const prefix = `file root ${index}`;
  if (root.virtual.trim() !== root.virtual || root.source.trim() !== root.source) {
    return `${prefix}: leading or trailing whitespace is not allowed`;
  }
  if (root.virtual === '') {
    return `${prefix}: virtual cannot be empty`;
  }
  if (root.source === '') {
    return `${prefix}: source cannot be empty`;
  }
  if (!root.virtual.startsWith('/')) {
    return `${prefix}: virtual must start with '/'`;
  }
  // "/" or a single folder such as "/public"
  if (root.virtual !== '/' && root.virtual.split('/').length !== 2) {
    return `${prefix}: virtual must be '/' or a single folder (e.g. '/public')`;
  }
  if (root.virtual.includes(':')) {
    return `${prefix}: virtual path cannot contain a colon`;
  }
  if (root.source.includes(':')) {
    return `${prefix}: source path cannot contain a colon`;
  }
  if (!path.isAbsolute(root.source) || !root.source.startsWith('/')) {
    return `${prefix}: source must be an absolute path starting with '/': ${root.source}`;
  }

  try {
    if (!statSync(root.source).isDirectory()) {
      return `${prefix}: source is not a directory: ${root.source}`;
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `${prefix}: stat source ${root.source}: ${reason}`;
  }

  if (seen.has(root.virtual)) {
    return `${prefix}: duplicate virtual path: ${root.virtual}`;
  }
  seen.add(root.virtual);
  return undefined;
}

// Validation functions
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (isIP(config.server.host) === 0) {
    errors.push(`invalid listen address: ${config.server.host}`);
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push(`invalid port: ${config.server.port}`);
  }

  if (!Number.isInteger(config.timeouts.request) || config.timeouts.request < 1000) {
    errors.push('request timeout must be at least 1000ms');
  }

  if (!LOG_LEVELS.includes(config.logging.level)) {
    errors.push(`invalid log level: ${config.logging.level}`);
  }

  if (!LOG_FORMATS.includes(config.logging.format)) {
    errors.push(`invalid log format: ${config.logging.format}`);
  }

  if (config.fileRoots.length === 0) {
    errors.push('no file roots configured');
  } else {
    const seen = new Set<string>();
    for (const [index, root] of config.fileRoots.entries()) {
      const error = validateFileRoot(root, index, seen);
      if (error) {
        // Later roots are not checked once one fails.
        errors.push(error);
        break;
      }
    }
  }

  return errors;
}
