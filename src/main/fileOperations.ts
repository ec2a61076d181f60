import fs from 'fs/promises';
import path from 'path';
import { FsError, hasErrorCode, toFsError } from '../common/fsError';

export const pathExists = async (targetPath: string) => {
  try {
    await fs.lstat(targetPath);
    return true;
  } catch {
    return false;
  }
};

/** True when both paths name the same inode, e.g. `a.txt` and `A.txt` on a case-insensitive volume. */
export const isSameFile = async (firstPath: string, secondPath: string) => {
  try {
    const [first, second] = await Promise.all([fs.lstat(firstPath), fs.lstat(secondPath)]);
    return first.dev === second.dev && first.ino === second.ino;
  } catch {
    return false;
  }
};

const wrap = async <T>(targetPath: string, action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error: unknown) {
    throw toFsError(error, targetPath);
  }
};

/** Fails with `AlreadyExists` instead of truncating an existing file. */
export const createFile = (filePath: string) =>
  wrap(filePath, () => fs.writeFile(filePath, '', { flag: 'wx' }));

export const createDirectory = (directoryPath: string) =>
  wrap(directoryPath, () => fs.mkdir(directoryPath));

export const renamePath = (sourcePath: string, targetPath: string) =>
  wrap(sourcePath, () => fs.rename(sourcePath, targetPath));

/**
 * Removes a file, symlink or whole directory tree. There is no rollback: if
 * the recursive removal fails part-way the already removed children stay gone.
 */
export const removePath = (targetPath: string) =>
  wrap(targetPath, async () => {
    const stats = await fs.lstat(targetPath);
    if (stats.isDirectory()) {
      await fs.rm(targetPath, { recursive: true });
    } else {
      await fs.unlink(targetPath);
    }
  });

const copyRecursive = async (sourcePath: string, targetPath: string): Promise<void> => {
  const stats = await fs.lstat(sourcePath);
  if (stats.isSymbolicLink()) {
    const linkTarget = await fs.readlink(sourcePath);
    await fs.symlink(linkTarget, targetPath);
    return;
  }
  if (!stats.isDirectory()) {
    await fs.copyFile(sourcePath, targetPath);
    return;
  }
  await fs.mkdir(targetPath, { recursive: true });
  const children = await fs.readdir(sourcePath);
  for (const child of children) {
    await copyRecursive(path.join(sourcePath, child), path.join(targetPath, child));
  }
};

/**
 * Copies a file or directory tree. Sequential and without rollback: the first
 * failure aborts and the partial copy is left on disk.
 */
export const copyPath = (sourcePath: string, targetPath: string) =>
  wrap(sourcePath, () => copyRecursive(sourcePath, targetPath));

/** `rename`, or copy + remove when source and target live on different devices. */
export const movePath = (sourcePath: string, targetPath: string) =>
  wrap(sourcePath, async () => {
    try {
      await fs.rename(sourcePath, targetPath);
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'EXDEV')) {
        throw error;
      }
      await copyRecursive(sourcePath, targetPath);
      await fs.rm(sourcePath, { recursive: true, force: true });
    }
  });

export const isSameOrDescendant = (candidate: string, ancestor: string) => {
  const relative = path.relative(ancestor, candidate);
  if (relative === '') return true;
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
};

export const assertNotInside = (sourcePath: string, destinationDirectory: string) => {
  if (isSameOrDescendant(destinationDirectory, sourcePath)) {
    throw new FsError('InvalidName', 'Cannot paste a directory into itself', {
      path: destinationDirectory,
    });
  }
};
