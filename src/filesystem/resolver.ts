import type { Stats } from 'fs';
import { lstat, realpath, stat } from 'fs/promises';
import path from 'path';
import { fromFsError, OutsideRootError } from './errors.js';
import { extractMetadata } from './metadata.js';
import type { AccountDatabase } from './ownership.js';
import type { Descriptor, ResourceKind, Root, TargetKind } from './types.js';

/** True when any `/`-separated segment is literally `..`. */
export function hasTraversal(rel: string): boolean {
  return rel.split('/').some(segment => segment === '..');
}

/**
 * Reduce a request-relative path to its root-relative form; `''` is the root itself.
 * Any `..` segment is refused outright, even one that would cancel out.
 */
export function cleanRelativePath(rel: string): string {
  if (hasTraversal(rel)) {
    throw new OutsideRootError(rel);
  }
  const cleaned = path.posix.normalize(`/${rel}`);
  if (cleaned === '/') {
    return '';
  }
  return cleaned.replace(/^\/+/, '').replace(/\/+$/, '');
}

export function joinVirtual(virtual: string, rel: string): string {
  return rel === '' ? virtual : path.posix.join(virtual, rel);
}

export function entryName(root: Root, rel: string): string {
  if (rel === '') {
    return root.virtual === '/' ? '/' : root.virtual.replace(/^\//, '');
  }
  return path.posix.basename(rel);
}

export function classify(stats: Stats): ResourceKind {
  if (stats.isDirectory()) return 'folder';
  if (stats.isSymbolicLink()) return 'symlink';
  return 'file';
}

function targetKindOf(stats: Stats): TargetKind {
  return stats.isDirectory() ? 'folder' : 'file';
}

/** Containment: `target` is `source` itself or lies beneath it. */
export function isWithinRoot(source: string, target: string): boolean {
  const relative = path.relative(path.normalize(source), target);
  if (relative === '') return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`);
}

/**
 * Resolve `rel` beneath `root` into a classified, containment-checked descriptor.
 *
 * The path itself is classified with lstat. A symlink is followed through every hop
 * with realpath, and the final target must still lie within the root's source.
 */
export async function describe(root: Root, rel: string, accounts: AccountDatabase): Promise<Descriptor> {
  const relPath = cleanRelativePath(rel);
  const virtualPath = joinVirtual(root.virtual, relPath);
  const linkPath = path.join(root.source, ...relPath.split('/'));

  let info: Stats;
  try {
    info = await lstat(linkPath);
  } catch (error) {
    throw fromFsError(error, virtualPath);
  }

  const kind = classify(info);
  let absolutePath = linkPath;
  let target = info;

  if (kind === 'symlink') {
    try {
      absolutePath = await realpath(linkPath);
    } catch (error) {
      throw fromFsError(error, virtualPath);
    }
    if (!isWithinRoot(root.source, absolutePath)) {
      throw new OutsideRootError(virtualPath);
    }
    try {
      target = await stat(absolutePath);
    } catch (error) {
      throw fromFsError(error, virtualPath);
    }
  }

  const base = {
    root,
    virtualPath,
    relPath,
    name: entryName(root, relPath),
    kind,
    targetKind: kind === 'symlink' ? targetKindOf(target) : targetKindOf(info),
    absolutePath,
    linkPath,
  };

  return { ...base, metadata: await extractMetadata(base, target, accounts) };
}
