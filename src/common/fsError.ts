export type FsErrorKind =
  | 'NotFound'
  | 'PermissionDenied'
  | 'AlreadyExists'
  | 'InvalidName'
  | 'IoOther';

export class FsError extends Error {
  readonly kind: FsErrorKind;

  readonly path: string | null;

  constructor(kind: FsErrorKind, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FsError';
    this.kind = kind;
    this.path = options.path ?? null;
  }
}

const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

const kindForCode = (code: string | undefined): FsErrorKind => {
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'NotFound';
    case 'EACCES':
    case 'EPERM':
      return 'PermissionDenied';
    case 'EEXIST':
    case 'ENOTEMPTY':
      return 'AlreadyExists';
    default:
      return 'IoOther';
  }
};

const describeFailure = (kind: FsErrorKind, targetPath: string | undefined, fallback: string) => {
  const subject = targetPath ?? 'path';
  switch (kind) {
    case 'NotFound':
      return `Not found: ${subject}`;
    case 'PermissionDenied':
      return `Permission denied: ${subject}`;
    case 'AlreadyExists':
      return `Already exists: ${subject}`;
    default:
      return fallback;
  }
};

/**
 * Normalises anything thrown by `fs` into an `FsError`. Errors that already
 * are `FsError`s pass through untouched.
 */
export const toFsError = (error: unknown, targetPath?: string): FsError => {
  if (error instanceof FsError) {
    return error;
  }
  const kind = kindForCode(errorCode(error));
  const fallback = error instanceof Error ? error.message : String(error);
  return new FsError(kind, describeFailure(kind, targetPath, fallback), {
    path: targetPath,
    cause: error,
  });
};

export const isFsError = (error: unknown): error is FsError => error instanceof FsError;

export const hasErrorCode = (error: unknown, code: string) => errorCode(error) === code;
