import { STATUS_CODES } from 'http';
import type { Descriptor } from '../filesystem/types.js';
import type { Page, PaginationLinks } from './query.js';

export const CONTENT_TYPE = 'application/vnd.api+json';
export const FILES_BASE_PATH = '/api/v1/files';

export interface FileAttributes {
  name: string;
  resource_kind: string;
  size_bytes: number | null;
  permission_mode: string;
  user: string;
  group: string;
  user_id: number;
  group_id: number;
  mime_type: string;
  accessed_at: string | null;
  modified_at: string | null;
  changed_at: string | null;
  born_at: string | null;
}

export interface FileResource {
  id: string;
  type: 'files';
  attributes: FileAttributes;
  links: { self: string };
}

export interface CollectionDocument {
  meta: {
    total_count: number;
    offset: number;
    limit: number;
  };
  data: FileResource[];
  links: PaginationLinks;
}

export interface ErrorObject {
  status: string;
  title: string;
  detail: string;
}

export interface ErrorDocument {
  errors: ErrorObject[];
}

function formatTime(value: Date | undefined): string | null {
  return value ? value.toISOString() : null;
}

/** Percent-encode each segment of a virtual path for use in a link. */
export function encodeVirtualPath(virtualPath: string): string {
  return virtualPath
    .split('/')
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

export function resourceFrom(descriptor: Descriptor): FileResource {
  const { metadata } = descriptor;
  const self = metadata.virtualPath === '/' ? FILES_BASE_PATH : `${FILES_BASE_PATH}${encodeVirtualPath(metadata.virtualPath)}`;

  return {
    id: metadata.virtualPath,
    type: 'files',
    attributes: {
      name: metadata.name,
      resource_kind: metadata.resourceKind,
      size_bytes: metadata.sizeBytes ?? null,
      permission_mode: metadata.permissionMode,
      user: metadata.user,
      group: metadata.group,
      user_id: metadata.userId,
      group_id: metadata.groupId,
      mime_type: metadata.mimeType,
      accessed_at: formatTime(metadata.accessedAt),
      modified_at: formatTime(metadata.modifiedAt),
      changed_at: formatTime(metadata.changedAt),
      born_at: formatTime(metadata.bornAt),
    },
    links: { self },
  };
}

export function collectionDocument(page: Page, offset: number, limit: number): CollectionDocument {
  return {
    meta: {
      total_count: page.total,
      offset,
      limit,
    },
    data: page.entries.map(resourceFrom),
    links: page.links,
  };
}

export function errorDocument(status: number, detail: string): ErrorDocument {
  return {
    errors: [
      {
        status: String(status),
        title: STATUS_CODES[status] ?? 'Error',
        detail,
      },
    ],
  };
}
