import type { Stats } from 'fs';
import type { AccountDatabase } from './ownership.js';
import { sniffFile } from './sniff.js';
import { fileTimes } from './times.js';
import { assertNever, type Descriptor, type Metadata, type ResourceKind } from './types.js';

export const DIRECTORY_MIME_TYPE = 'inode/directory';
export const SYMLINK_MIME_TYPE = 'inode/symlink';

export function formatPermissionMode(mode: number): string {
  return (mode & 0o777).toString(8).padStart(4, '0');
}

/**
 * Sentinel types for folders and symlinks; plain files are sniffed from their content.
 * Devices, sockets and FIFOs are never opened and get an empty type.
 */
export async function mimeTypeFor(kind: ResourceKind, absolutePath: string, target: Stats): Promise<string> {
  switch (kind) {
    case 'folder':
      return DIRECTORY_MIME_TYPE;
    case 'symlink':
      return SYMLINK_MIME_TYPE;
    case 'file':
      return target.isFile() ? sniffFile(absolutePath) : '';
    default:
      return assertNever(kind);
  }
}

/**
 * Build the attribute set for a resolved entry from the stats of its target.
 *
 * The size comes from the target but is only reported when the entry itself is a
 * plain file: a symlink never carries a size, whatever it points at.
 */
export async function extractMetadata(
  descriptor: Omit<Descriptor, 'metadata'>,
  target: Stats,
  accounts: AccountDatabase
): Promise<Metadata> {
  const times = fileTimes(target);

  return {
    name: descriptor.name,
    virtualPath: descriptor.virtualPath,
    resourceKind: descriptor.kind,
    sizeBytes: descriptor.kind === 'file' ? target.size : undefined,
    permissionMode: formatPermissionMode(target.mode),
    user: accounts.userName(target.uid),
    group: accounts.groupName(target.gid),
    userId: target.uid,
    groupId: target.gid,
    mimeType: await mimeTypeFor(descriptor.kind, descriptor.absolutePath, target),
    accessedAt: times.accessedAt,
    modifiedAt: times.modifiedAt,
    changedAt: times.changedAt,
    bornAt: times.bornAt,
  };
}
