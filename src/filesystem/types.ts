/** Classification of a path itself, before any symlink is followed. */
export type ResourceKind = 'file' | 'folder' | 'symlink';

/** Classification after following a symlink; a link always lands on one of these. */
export type TargetKind = Exclude<ResourceKind, 'symlink'>;

export interface RootDefinition {
  virtual: string;
  source: string;
}

/**
 * A virtual root backed by a canonical source directory.
 * `source` has been through realpath and never changes after the registry is built.
 */
export interface Root {
  readonly virtual: string;
  readonly source: string;
}

export interface Metadata {
  name: string;
  virtualPath: string;
  resourceKind: ResourceKind;
  /** Only set for plain files; folders and symlinks never carry a size. */
  sizeBytes?: number;
  /** Four digit octal, e.g. `0644`. */
  permissionMode: string;
  user: string;
  group: string;
  userId: number;
  groupId: number;
  mimeType: string;
  accessedAt?: Date;
  modifiedAt?: Date;
  changedAt?: Date;
  /** Absent where the platform or filesystem does not record creation time. */
  bornAt?: Date;
}

/**
 * A resolved, containment-checked view of one filesystem entry.
 * Built per request and never cached.
 */
export interface Descriptor {
  root: Root;
  virtualPath: string;
  relPath: string;
  name: string;
  kind: ResourceKind;
  targetKind: TargetKind;
  /** Resolved location; for symlinks this is the final target of the chain. */
  absolutePath: string;
  /** Location before resolution; equals `absolutePath` unless `kind` is `symlink`. */
  linkPath: string;
  metadata: Metadata;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
