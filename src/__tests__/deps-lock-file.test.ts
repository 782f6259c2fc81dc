import { describe, it, expect } from 'vitest';
import {
  formatLockEntry,
  parseLockEntry,
  parseLockFile,
  serializeLockFile,
  verifyLockedFile,
} from '../deps/lock-file.js';
import { ChecksumMismatchError, MissingLockEntryError } from '../errors.js';
import type { LockFile } from '../deps/types.js';

const LOCK: LockFile = {
  dependencies: {
    zlib: { 'thirdparty/zlib-1.3.tar.gz': 'sha256:ABCDEF' },
  },
};

describe('parseLockFile', () => {
  it('should read one section per dependency', () => {
    const lock = parseLockFile(
      '[zlib]\nthirdparty/zlib-1.3.tar.gz = sha256:abc\n\n[docs]\ndocs/2.0/index.html = sha1:def\n'
    );

    expect(lock.dependencies).toEqual({
      zlib: { 'thirdparty/zlib-1.3.tar.gz': 'sha256:abc' },
      docs: { 'docs/2.0/index.html': 'sha1:def' },
    });
  });

  it('should keep dotted dependency names', () => {
    const lock = parseLockFile('[boost.headers]\nboost/h-1.84.tar.gz = sha256:abc\n');

    expect(lock.dependencies).toEqual({ 'boost.headers': { 'boost/h-1.84.tar.gz': 'sha256:abc' } });
    expect(parseLockFile(serializeLockFile(lock))).toEqual(lock);
  });

  it('should ignore keys outside a section', () => {
    expect(parseLockFile('stray = value\n[zlib]\na = sha1:1\n').dependencies).toEqual({
      zlib: { a: 'sha1:1' },
    });
  });
});

describe('serializeLockFile', () => {
  it('should sort files by path', () => {
    const text = serializeLockFile({
      dependencies: { zlib: { 'b.txt': 'sha1:2', 'a.txt': 'sha1:1' } },
    });

    expect(text).toBe('[zlib]\na.txt = sha1:1\nb.txt = sha1:2\n');
  });

  it('should separate sections with a blank line', () => {
    const text = serializeLockFile({
      dependencies: { one: { 'x.bin': 'md5:1' }, two: { 'y.bin': 'md5:2' } },
    });

    expect(text).toBe('[one]\nx.bin = md5:1\n\n[two]\ny.bin = md5:2\n');
    expect(parseLockFile(text).dependencies.two).toEqual({ 'y.bin': 'md5:2' });
  });
});

describe('parseLockEntry', () => {
  it('should split algorithm and digest', () => {
    expect(parseLockEntry('zlib', 'SHA512:abc')).toEqual({ algorithm: 'sha512', digest: 'abc' });
    expect(formatLockEntry('md5', 'ff')).toBe('md5:ff');
  });

  it('should reject a value without an algorithm', () => {
    expect(() => parseLockEntry('zlib', 'abc')).toThrow(
      'invalid checksum format in lock file for zlib: abc'
    );
  });

  it('should reject an unknown algorithm', () => {
    expect(() => parseLockEntry('zlib', 'crc32:abc')).toThrow(MissingLockEntryError);
  });

  it('should reject an empty digest', () => {
    expect(() => parseLockEntry('zlib', 'sha1:')).toThrow('empty digest in lock file for zlib: sha1:');
  });
});

describe('verifyLockedFile', () => {
  it('should accept a matching digest in any case', () => {
    expect(() =>
      verifyLockedFile(LOCK, 'zlib', 'thirdparty/zlib-1.3.tar.gz', 'sha256', 'abcdef')
    ).not.toThrow();
  });

  it('should fail on a different digest', () => {
    expect(() => verifyLockedFile(LOCK, 'zlib', 'thirdparty/zlib-1.3.tar.gz', 'sha256', '000000')).toThrow(
      new ChecksumMismatchError('thirdparty/zlib-1.3.tar.gz', 'ABCDEF', '000000')
    );
  });

  it('should fail for an unknown dependency', () => {
    expect(() => verifyLockedFile(LOCK, 'openssl', 'a', 'sha256', 'x')).toThrow(
      'dependency openssl not found in lock file'
    );
  });

  it('should fail for an unlocked file', () => {
    expect(() => verifyLockedFile(LOCK, 'zlib', 'other.tar.gz', 'sha256', 'x')).toThrow(
      'file other.tar.gz not found in lock file for dependency zlib'
    );
  });

  it('should fail when the algorithm differs', () => {
    expect(() => verifyLockedFile(LOCK, 'zlib', 'thirdparty/zlib-1.3.tar.gz', 'sha1', 'abcdef')).toThrow(
      'checksum algorithm mismatch: expected sha256, got sha1'
    );
  });
});
