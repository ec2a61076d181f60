import fs from 'fs/promises';
import path from 'path';
import { hasErrorCode, toFsError } from '../common/fsError';
import { isHiddenName } from '../common/names';
import type { Entry, ExpandedTree } from '../types/entry';
import { createEntry } from './entry';

export const DEFAULT_EXPAND_ALL_LIMIT = 5000;

const compareNames = (a: string, b: string) => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

const sortsAsDirectory = (entry: Entry) => entry.kind === 'directory' || entry.linksToDirectory;

/**
 * Directories (and links to them) first, then case-insensitive name; raw name
 * breaks ties.
 */
export const compareEntries = (a: Entry, b: Entry): number => {
  const aDir = sortsAsDirectory(a);
  const bDir = sortsAsDirectory(b);
  if (aDir !== bDir) {
    return aDir ? -1 : 1;
  }
  return compareNames(a.name.toLowerCase(), b.name.toLowerCase()) || compareNames(a.name, b.name);
};

const readChildNames = async (directoryPath: string): Promise<string[]> => {
  try {
    return await fs.readdir(directoryPath);
  } catch (error: unknown) {
    throw toFsError(error, directoryPath);
  }
};

/**
 * Lists one directory level, sorted and filtered. Children removed between
 * `readdir` and `lstat` are skipped; every other failure rejects.
 */
export const loadDirectory = async (
  directoryPath: string,
  depth: number,
  showHidden: boolean,
): Promise<Entry[]> => {
  const names = (await readChildNames(directoryPath)).filter(
    (name) => showHidden || !isHiddenName(name),
  );

  const loaded = await Promise.all(
    names.map(async (name) => {
      try {
        return await createEntry(path.join(directoryPath, name), depth);
      } catch (error: unknown) {
        const cause = error instanceof Error ? error.cause : undefined;
        if (hasErrorCode(cause, 'ENOENT')) {
          return null;
        }
        throw error;
      }
    }),
  );

  return loaded.filter((entry): entry is Entry => entry !== null).sort(compareEntries);
};

/**
 * Flattens the visible tree below `rootPath` in pre-order. Only directories
 * whose path is in `expanded` are listed; the rest are never read.
 */
export const buildTree = async (
  rootPath: string,
  expanded: ReadonlySet<string>,
  showHidden: boolean,
): Promise<Entry[]> => {
  const entries: Entry[] = [];

  const walk = async (directoryPath: string, depth: number): Promise<void> => {
    const children = await loadDirectory(directoryPath, depth, showHidden);
    for (const child of children) {
      const isOpen = child.kind === 'directory' && expanded.has(child.path);
      entries.push(isOpen ? { ...child, expanded: true } : child);
      if (isOpen) {
        await walk(child.path, depth + 1);
      }
    }
  };

  await walk(path.resolve(rootPath), 0);
  return entries;
};

/**
 * Descends into every directory until `limit` entries have been collected.
 * Directories that were descended come back with `expanded: true`.
 */
export const buildExpandedTree = async (
  rootPath: string,
  showHidden: boolean,
  limit = DEFAULT_EXPAND_ALL_LIMIT,
): Promise<ExpandedTree> => {
  const entries: Entry[] = [];
  let truncated = false;

  const walk = async (directoryPath: string, depth: number): Promise<void> => {
    const children = await loadDirectory(directoryPath, depth, showHidden);
    for (const child of children) {
      if (entries.length >= limit) {
        truncated = true;
        return;
      }
      if (child.kind !== 'directory') {
        entries.push(child);
        continue;
      }
      entries.push({ ...child, expanded: true });
      await walk(child.path, depth + 1);
    }
  };

  await walk(path.resolve(rootPath), 0);
  return { entries, truncated };
};
