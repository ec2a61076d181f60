import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { toFsError } from '../common/fsError';
import type { DirectoryChild, PreviewContent, PreviewData } from '../types/preview';

export const MAX_PREVIEW_LINES = 25;
export const MAX_PREVIEW_SIZE = 50 * 1024;
export const MAX_LINE_LENGTH = 200;
const BINARY_CHECK_SIZE = 512;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const compareChildren = (a: DirectoryChild, b: DirectoryChild) => {
  if (a.isDirectory !== b.isDirectory) {
    return a.isDirectory ? -1 : 1;
  }
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left === right) return 0;
  return left < right ? -1 : 1;
};

const previewDirectory = async (directoryPath: string): Promise<PreviewContent> => {
  try {
    const dirents = await fs.readdir(directoryPath, { withFileTypes: true });
    const children = dirents
      .map((dirent) => ({ name: dirent.name, isDirectory: dirent.isDirectory() }))
      .sort(compareChildren);
    return children.length === 0 ? { type: 'empty' } : { type: 'directory', children };
  } catch (error: unknown) {
    return { type: 'error', message: errorMessage(error) };
  }
};

const truncateLine = (line: string) =>
  line.length > MAX_LINE_LENGTH ? `${line.slice(0, MAX_LINE_LENGTH)}...` : line;

const previewFile = async (filePath: string, size: number): Promise<PreviewContent> => {
  if (size === 0) return { type: 'empty' };
  if (size > MAX_PREVIEW_SIZE) return { type: 'tooLarge' };
  try {
    const bytes = await fs.readFile(filePath);
    if (bytes.subarray(0, BINARY_CHECK_SIZE).includes(0)) {
      return { type: 'binary' };
    }
    const allLines = bytes.toString('utf8').split(/\r?\n/);
    if (allLines[allLines.length - 1] === '') {
      allLines.pop();
    }
    const lines = allLines.slice(0, MAX_PREVIEW_LINES).map(truncateLine);
    return lines.length === 0 ? { type: 'empty' } : { type: 'text', lines };
  } catch (error: unknown) {
    return { type: 'error', message: errorMessage(error) };
  }
};

const permissionsOf = (stats: Stats) => (process.platform === 'win32' ? 0 : stats.mode & 0o777);

/** Follows symlinks; rejects with `FsError` only when the path cannot be stat'd. */
export const generatePreview = async (targetPath: string): Promise<PreviewData> => {
  let stats: Stats;
  try {
    stats = await fs.stat(targetPath);
  } catch (error: unknown) {
    throw toFsError(error, targetPath);
  }
  const content = stats.isDirectory()
    ? await previewDirectory(targetPath)
    : await previewFile(targetPath, stats.size);
  return {
    path: path.resolve(targetPath),
    content,
    metadata: {
      size: stats.size,
      modifiedMs: Number.isFinite(stats.mtimeMs) ? stats.mtimeMs : null,
      permissions: permissionsOf(stats),
    },
  };
};

export const formatSize = (bytes: number) => {
  const KB = 1024;
  const MB = KB * 1024;
  const GB = MB * 1024;
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)} GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)} MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)} KB`;
  return `${bytes} B`;
};

export const formatPermissions = (mode: number) => (mode === 0 ? '---' : (mode & 0o777).toString(8));

const pad = (value: number) => value.toString().padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:mm`. */
export const formatModified = (modifiedMs: number | null) => {
  if (modifiedMs === null) return '---';
  const date = new Date(modifiedMs);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(
    date.getHours(),
  )}:${pad(date.getMinutes())}`;
};
