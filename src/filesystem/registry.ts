import { realpath } from 'fs/promises';
import path from 'path';
import { ConfigurationError } from './errors.js';
import type { Root, RootDefinition } from './types.js';

export interface RootMatch {
  root: Root;
  rel: string;
}

/**
 * Immutable mapping from virtual root name to canonical source directory.
 * Owned by the service that created it; there is no process-wide instance.
 */
export class RootRegistry {
  private readonly byVirtual: ReadonlyMap<string, Root>;

  private constructor(private readonly ordered: readonly Root[]) {
    this.byVirtual = new Map(ordered.map(root => [root.virtual, root]));
  }

  /**
   * Canonicalize every source through realpath and build the registry.
   * Rejects an empty list, a repeated virtual name, or a source that cannot be resolved.
   */
  static async create(definitions: readonly RootDefinition[]): Promise<RootRegistry> {
    if (definitions.length === 0) {
      throw new ConfigurationError('no file roots provided');
    }

    const seen = new Set<string>();
    const roots: Root[] = [];
    for (const definition of definitions) {
      if (seen.has(definition.virtual)) {
        throw new ConfigurationError(`duplicate file root: ${definition.virtual}`);
      }
      seen.add(definition.virtual);

      let resolved: string;
      try {
        resolved = await realpath(definition.source);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`resolve file root ${definition.virtual}: ${reason}`, { cause: error });
      }
      roots.push(Object.freeze({ virtual: definition.virtual, source: path.normalize(resolved) }));
    }

    return new RootRegistry(Object.freeze(roots));
  }

  /** Look up a root; a name given without its leading slash is accepted too. */
  lookup(virtual: string): Root | undefined {
    const key = virtual.startsWith('/') ? virtual : `/${virtual}`;
    return this.byVirtual.get(key);
  }

  all(): Root[] {
    return [...this.ordered];
  }

  get size(): number {
    return this.ordered.length;
  }

  isSingleSlashRoot(): boolean {
    return this.ordered.length === 1 && this.ordered[0]?.virtual === '/';
  }

  /**
   * Map a decoded request path such as `/docs/a/b.txt` onto the root serving it.
   * Longer virtual names win; a `/` root catches everything else.
   */
  match(requestPath: string): RootMatch | undefined {
    const candidates = [...this.ordered].sort((a, b) => b.virtual.length - a.virtual.length);

    for (const root of candidates) {
      if (root.virtual === '/') {
        return { root, rel: requestPath.replace(/^\//, '') };
      }
      if (requestPath === root.virtual) {
        return { root, rel: '' };
      }
      const prefix = `${root.virtual}/`;
      if (requestPath.startsWith(prefix)) {
        return { root, rel: requestPath.slice(prefix.length) };
      }
    }

    return undefined;
  }
}
