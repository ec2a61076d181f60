import fs from 'fs';
import path from 'path';
import { appLog } from '../utils/logger';

export interface TreeWatcher {
  close: () => void;
}

const IGNORED_NAMES = new Set(['.DS_Store']);
const IGNORED_SUFFIXES = ['.swp', '.swo', '~', '.tmp'];

/** Editor swap files, OS metadata and anything inside `.git`. */
export const shouldIgnorePath = (changedPath: string) => {
  const name = path.basename(changedPath);
  if (IGNORED_NAMES.has(name) || name.startsWith('.#')) return true;
  if (IGNORED_SUFFIXES.some((suffix) => name.endsWith(suffix))) return true;
  return changedPath.split(/[\\/]/).includes('.git');
};

/**
 * Reports changed absolute paths under `rootPath`. Events arrive on the main
 * loop; the caller decides what a change means.
 */
export const startWatcher = (
  rootPath: string,
  onChange: (changedPath: string) => void,
): TreeWatcher => {
  const watcher = fs.watch(rootPath, { recursive: true }, (_eventType, filename) => {
    if (!filename) return;
    const changedPath = path.join(rootPath, filename.toString());
    if (!shouldIgnorePath(changedPath)) {
      onChange(changedPath);
    }
  });
  watcher.on('error', (error: Error) => {
    appLog.warn(`File watcher stopped: ${error.message}`);
    watcher.close();
  });
  return {
    close: () => watcher.close(),
  };
};
