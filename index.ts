/**
 * @fileoverview rootshare - read-only JSON:API access to configured directories
 * @version 1.0.0
 * @license MIT
 *
 * Maps virtual root names onto host directories and serves listings,
 * metadata and file content without ever leaving those directories.
 */

// Core exports for library usage
export { createApp, createFilesMiddleware, RootshareServer } from './src/server/embeddable.js';
export type { FilesMiddlewareOptions } from './src/server/embeddable.js';
export { FileService } from './src/filesystem/service.js';
export type { FileServiceOptions } from './src/filesystem/service.js';
export { RootRegistry } from './src/filesystem/registry.js';
export {
  FileAccessError,
  RootNotFoundError,
  OutsideRootError,
  NotADirectoryError,
  NotFoundError,
  PermissionDeniedError,
  StatFailureError,
  CanceledError,
  ConfigurationError,
} from './src/filesystem/errors.js';
export type { Descriptor, Metadata, ResourceKind, Root, RootDefinition } from './src/filesystem/types.js';
export { applyListParams, parseListParams, sortDescriptors, InvalidQueryParameterError } from './src/api/query.js';
export type { ListParams, Page, PaginationLinks, SortField } from './src/api/query.js';
export type { AppConfig, ConfigOverride } from './src/config/types.js';
export { defaultConfig, mergeConfig, validateConfig } from './src/config/types.js';
export { loadConfig } from './src/config/loader.js';
export { Logger } from './src/logging/logger.js';
