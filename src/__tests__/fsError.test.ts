import { FsError, hasErrorCode, isFsError, toFsError } from '../common/fsError';

const nodeError = (code: string, message = `${code}: raw failure`) =>
  Object.assign(new Error(message), { code });

describe('toFsError', () => {
  it('maps missing paths to NotFound', () => {
    const raw = nodeError('ENOENT');
    const error = toFsError(raw, '/tmp/missing');

    expect(error).toBeInstanceOf(FsError);
    expect(error.kind).toBe('NotFound');
    expect(error.message).toBe('Not found: /tmp/missing');
    expect(error.path).toBe('/tmp/missing');
    expect(error.cause).toBe(raw);
  });

  it.each([
    ['ENOTDIR', 'NotFound'],
    ['EACCES', 'PermissionDenied'],
    ['EPERM', 'PermissionDenied'],
    ['EEXIST', 'AlreadyExists'],
    ['ENOTEMPTY', 'AlreadyExists'],
    ['EIO', 'IoOther'],
  ])('maps %s to %s', (code, kind) => {
    expect(toFsError(nodeError(code), '/x').kind).toBe(kind);
  });

  it('keeps the original message for unclassified failures', () => {
    const error = toFsError(nodeError('EIO', 'disk on fire'), '/x');
    expect(error.message).toBe('disk on fire');
  });

  it('describes the subject generically when no path is known', () => {
    const error = toFsError(nodeError('EACCES'));
    expect(error.message).toBe('Permission denied: path');
    expect(error.path).toBeNull();
  });

  it('passes FsErrors through unchanged', () => {
    const original = new FsError('InvalidName', 'Name cannot be empty');
    expect(toFsError(original, '/elsewhere')).toBe(original);
  });

  it('handles non-error values', () => {
    const error = toFsError('plain string');
    expect(error.kind).toBe('IoOther');
    expect(error.message).toBe('plain string');
  });
});

describe('fs error helpers', () => {
  it('recognises FsError instances', () => {
    expect(isFsError(new FsError('IoOther', 'x'))).toBe(true);
    expect(isFsError(new Error('x'))).toBe(false);
  });

  it('reads errno codes defensively', () => {
    expect(hasErrorCode(nodeError('EXDEV'), 'EXDEV')).toBe(true);
    expect(hasErrorCode(new Error('no code'), 'EXDEV')).toBe(false);
    expect(hasErrorCode(undefined, 'EXDEV')).toBe(false);
  });
});
