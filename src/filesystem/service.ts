import { readdir } from 'fs/promises';
import path from 'path';
import { CanceledError, fromFsError, NotADirectoryError, RootNotFoundError } from './errors.js';
import { AccountDatabase, defaultAccountSources, type AccountSources } from './ownership.js';
import { RootRegistry, type RootMatch } from './registry.js';
import { cleanRelativePath, describe } from './resolver.js';
import type { Descriptor, Root, RootDefinition } from './types.js';

export interface FileServiceOptions {
  /** Where user and group names are looked up. */
  accounts?: AccountSources;
}

/**
 * Read-only access to the configured roots.
 *
 * Holds nothing but the immutable registry, so one instance serves concurrent
 * requests without locking; every call re-reads the filesystem.
 */
export class FileService {
  private readonly accountSources: AccountSources;

  constructor(private readonly registry: RootRegistry, options: FileServiceOptions = {}) {
    this.accountSources = options.accounts ?? defaultAccountSources;
  }

  static async create(roots: readonly RootDefinition[], options: FileServiceOptions = {}): Promise<FileService> {
    return new FileService(await RootRegistry.create(roots), options);
  }

  roots(): Root[] {
    return this.registry.all();
  }

  hasSingleSlashRoot(): boolean {
    return this.registry.isSingleSlashRoot();
  }

  matchRoot(requestPath: string): RootMatch | undefined {
    return this.registry.match(requestPath);
  }

  /** Resolve a single path beneath a virtual root. */
  async resolve(virtual: string, rel: string): Promise<Descriptor> {
    const root = this.requireRoot(virtual);
    return describe(root, rel, await this.accounts());
  }

  /** One folder descriptor per configured root, in configuration order. */
  async listRoots(): Promise<Descriptor[]> {
    const accounts = await this.accounts();
    const descriptors: Descriptor[] = [];
    for (const root of this.registry.all()) {
      descriptors.push(await describe(root, '', accounts));
    }
    return descriptors;
  }

  /**
   * Describe the direct children of a folder, in directory read order.
   * `signal` is checked before each child; an aborted listing fails as a whole.
   */
  async listDirectory(virtual: string, rel: string, signal?: AbortSignal): Promise<Descriptor[]> {
    const root = this.requireRoot(virtual);
    const relPath = cleanRelativePath(rel);
    const accounts = await this.accounts();

    const parent = await describe(root, relPath, accounts);
    if (parent.targetKind !== 'folder') {
      throw new NotADirectoryError(parent.virtualPath);
    }

    let names: string[];
    try {
      names = await readdir(parent.absolutePath);
    } catch (error) {
      throw fromFsError(error, parent.virtualPath);
    }

    const descriptors: Descriptor[] = [];
    for (const name of names) {
      if (signal?.aborted) {
        throw new CanceledError(parent.virtualPath);
      }
      descriptors.push(await describe(root, path.posix.join(relPath, name), accounts));
    }
    return descriptors;
  }

  private requireRoot(virtual: string): Root {
    const root = this.registry.lookup(virtual);
    if (!root) {
      throw new RootNotFoundError(virtual);
    }
    return root;
  }

  private accounts(): Promise<AccountDatabase> {
    return AccountDatabase.load(this.accountSources);
  }
}
