import { readFile } from 'fs/promises';

export interface AccountSources {
  passwdPath: string;
  groupPath: string;
}

export const defaultAccountSources: AccountSources = {
  passwdPath: '/etc/passwd',
  groupPath: '/etc/group',
};

/**
 * Snapshot of the system user and group databases, taken once per request.
 *
 * A lookup that finds no entry falls back to the numeric id, except that id 0
 * falls back to an empty string.
 */
export class AccountDatabase {
  private constructor(
    private readonly users: ReadonlyMap<number, string>,
    private readonly groups: ReadonlyMap<number, string>
  ) {}

  static async load(sources: AccountSources = defaultAccountSources): Promise<AccountDatabase> {
    const [passwd, group] = await Promise.all([
      readOptional(sources.passwdPath),
      readOptional(sources.groupPath),
    ]);
    // passwd: name:password:uid:gid:...  group: name:password:gid:members
    return new AccountDatabase(parseIdTable(passwd), parseIdTable(group));
  }

  static empty(): AccountDatabase {
    return new AccountDatabase(new Map(), new Map());
  }

  userName(uid: number): string {
    return this.users.get(uid) ?? numericOrEmpty(uid);
  }

  groupName(gid: number): string {
    return this.groups.get(gid) ?? numericOrEmpty(gid);
  }
}

async function readOptional(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch {
    // No account database on this host; every lookup takes the numeric fallback.
    return '';
  }
}

function parseIdTable(content: string): Map<number, string> {
  const table = new Map<number, string>();
  for (const line of content.split('\n')) {
    if (line === '' || line.startsWith('#')) continue;
    const [name, , id] = line.split(':');
    if (!name || id === undefined || !/^\d+$/.test(id)) continue;
    const numeric = Number(id);
    // First entry wins, as with getpwuid/getgrgid.
    if (!table.has(numeric)) {
      table.set(numeric, name);
    }
  }
  return table;
}

function numericOrEmpty(id: number): string {
  return id === 0 ? '' : String(id);
}
