import type { Stats } from 'fs';

export interface FileTimes {
  accessedAt: Date;
  modifiedAt: Date;
  changedAt: Date;
  bornAt?: Date;
}

/**
 * Creation time, when the platform records it.
 * libuv reports a zero birth time when statx or an equivalent is unavailable,
 * so zero means "unknown" here rather than the epoch.
 */
export function birthTime(stats: Stats): Date | undefined {
  if (!Number.isFinite(stats.birthtimeMs) || stats.birthtimeMs <= 0) {
    return undefined;
  }
  return new Date(stats.birthtimeMs);
}

export function fileTimes(stats: Stats): FileTimes {
  return {
    accessedAt: new Date(stats.atimeMs),
    modifiedAt: new Date(stats.mtimeMs),
    changedAt: new Date(stats.ctimeMs),
    bornAt: birthTime(stats),
  };
}
