import { FsError } from './fsError';

const separatorPattern = /[\\/]/;

export const isHiddenName = (name: string) => name.startsWith('.');

export const hasSeparator = (name: string) => separatorPattern.test(name);

/**
 * Accepts a single path component typed by the user. Throws `InvalidName`
 * for empty input, separators and the `.`/`..` components.
 */
export const ensureValidName = (name: string) => {
  if (!name || name.trim().length === 0) {
    throw new FsError('InvalidName', 'Name cannot be empty');
  }
  if (hasSeparator(name)) {
    throw new FsError('InvalidName', `Name ${name} contains a path separator`);
  }
  if (name === '.' || name === '..') {
    throw new FsError('InvalidName', `Name ${name} is reserved`);
  }
};

export const splitStemAndExtension = (name: string) => {
  const lastDot = name.lastIndexOf('.');
  if (lastDot <= 0) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, lastDot), extension: name.slice(lastDot) };
};

/** `report.txt` -> `report-1.txt`, `report-2.txt`, ... until `isTaken` says no. */
export const nextFreeName = async (
  desiredName: string,
  isTaken: (candidate: string) => Promise<boolean>,
): Promise<string> => {
  const { stem, extension } = splitStemAndExtension(desiredName);
  let suffix = 1;
  let candidate = '';
  do {
    candidate = `${stem}-${suffix}${extension}`;
    suffix += 1;
  } while (await isTaken(candidate));
  return candidate;
};
