import { writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AccountDatabase } from '../../src/filesystem/ownership.js';
import { makeTempDir, removeDir } from '../helpers.js';

const PASSWD = `root:x:0:0:root:/root:/bin/bash
# service accounts
tester:x:1000:1000::/home/tester:/bin/sh
shadowed:x:1000:1000::/home/shadowed:/bin/sh
broken:x:notanumber:1::/:/bin/false
`;

const GROUP = `wheel:x:0:
staff:x:50:tester
`;

describe('AccountDatabase', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFile(path.join(dir, 'passwd'), PASSWD);
    await writeFile(path.join(dir, 'group'), GROUP);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('resolves names from the account files', async () => {
    const accounts = await AccountDatabase.load({
      passwdPath: path.join(dir, 'passwd'),
      groupPath: path.join(dir, 'group'),
    });

    expect(accounts.userName(0)).toBe('root');
    expect(accounts.userName(1000)).toBe('tester');
    expect(accounts.groupName(0)).toBe('wheel');
    expect(accounts.groupName(50)).toBe('staff');
  });

  it('falls back to the numeric id for unknown accounts', async () => {
    const accounts = await AccountDatabase.load({
      passwdPath: path.join(dir, 'passwd'),
      groupPath: path.join(dir, 'group'),
    });

    expect(accounts.userName(4242)).toBe('4242');
    expect(accounts.groupName(1000)).toBe('1000');
  });

  it('maps an unresolved id 0 to an empty name', () => {
    const accounts = AccountDatabase.empty();

    expect(accounts.userName(0)).toBe('');
    expect(accounts.groupName(0)).toBe('');
    expect(accounts.userName(7)).toBe('7');
  });

  it('treats missing account files as empty', async () => {
    const accounts = await AccountDatabase.load({
      passwdPath: path.join(dir, 'no-passwd'),
      groupPath: path.join(dir, 'no-group'),
    });

    expect(accounts.userName(1000)).toBe('1000');
    expect(accounts.groupName(0)).toBe('');
  });
});
