import path from 'path';
import mime from 'mime-types';
import type { Entry } from '../types/entry';
import iconTable from './icons.json';

interface IconTable {
  directory: string;
  directoryOpen: string;
  symlink: string;
  executable: string;
  file: string;
  names: Record<string, string>;
  extensions: Record<string, string>;
  mimeCategories: Record<string, string>;
}

const icons: IconTable = iconTable;

const mimeCategoryIcon = (name: string) => {
  const type = mime.lookup(name);
  if (!type) return undefined;
  const [category] = type.split('/');
  return icons.mimeCategories[category];
};

/**
 * Lookup order: kind, exact file name, extension, MIME category, then the
 * executable bit.
 */
export const iconFor = (entry: Entry): string => {
  if (entry.kind === 'directory') {
    return entry.expanded ? icons.directoryOpen : icons.directory;
  }
  if (entry.kind === 'symlink') return icons.symlink;
  const lowerName = entry.name.toLowerCase();
  const extension = path.extname(lowerName).slice(1);
  return (
    icons.names[lowerName] ??
    (extension ? icons.extensions[extension] : undefined) ??
    mimeCategoryIcon(lowerName) ??
    (entry.executable ? icons.executable : icons.file)
  );
};
