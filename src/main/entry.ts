import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { toFsError } from '../common/fsError';
import { isHiddenName } from '../common/names';
import type { Entry, EntryKind } from '../types/entry';

const classify = (stats: Stats): EntryKind => {
  // lstat: a link to a directory stays a symlink and never expands
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  return 'file';
};

const isExecutable = (stats: Stats, kind: EntryKind) => {
  if (process.platform === 'win32' || kind === 'directory') {
    return false;
  }
  return (stats.mode & 0o111) !== 0;
};

const displayName = (entryPath: string) => path.basename(entryPath) || entryPath;

export const entryFromStats = (
  entryPath: string,
  depth: number,
  stats: Stats,
  linksToDirectory = false,
): Entry => {
  const name = displayName(entryPath);
  const kind = classify(stats);
  return {
    name,
    path: entryPath,
    kind,
    hidden: isHiddenName(name),
    expanded: false,
    depth,
    executable: isExecutable(stats, kind),
    linksToDirectory: kind === 'symlink' && linksToDirectory,
  };
};

/** Follows the link once; a dangling or unreadable target counts as a file. */
const targetIsDirectory = async (linkPath: string) => {
  try {
    return (await fs.stat(linkPath)).isDirectory();
  } catch {
    return false;
  }
};

export const createEntry = async (entryPath: string, depth: number): Promise<Entry> => {
  const absolutePath = path.resolve(entryPath);
  let stats: Stats;
  try {
    stats = await fs.lstat(absolutePath);
  } catch (error: unknown) {
    throw toFsError(error, absolutePath);
  }
  const linksToDirectory = stats.isSymbolicLink() && (await targetIsDirectory(absolutePath));
  return entryFromStats(absolutePath, depth, stats, linksToDirectory);
};

export const isDirectoryEntry = (entry: Entry | undefined): entry is Entry =>
  entry?.kind === 'directory';
