import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { parseArgs } from '../src/cli/args';
import { resolveRoot } from '../src/cli/root';
import { ErrorCodes, FatalError, categorizeError } from '../src/shared/errors';
import { errnoError, setupTestDir, teardownTestDir } from './helpers';

describe('cli.parseArgs', () => {
  it('should default to the current directory', () => {
    expect(parseArgs([])).toEqual({ kind: 'run', path: '.' });
    expect(parseArgs(['/tmp'])).toEqual({ kind: 'run', path: '/tmp' });
  });

  it('should recognize help and version flags', () => {
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-V'])).toEqual({ kind: 'version' });
  });

  it('should treat arguments after -- as paths', () => {
    expect(parseArgs(['--', '-weird'])).toEqual({ kind: 'run', path: '-weird' });
  });

  it('should reject unknown options and extra paths', () => {
    expect(parseArgs(['--bogus'])).toEqual({ kind: 'error', message: 'Unknown option: --bogus' });
    expect(parseArgs(['a', 'b'])).toEqual({ kind: 'error', message: 'Unexpected argument: b' });
  });
});

describe('cli.resolveRoot', () => {
  let testDir: string;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: ['file.txt'], subdirs: ['sub'] });
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should return the canonical directory path', async () => {
    const expected = await fs.realpath(path.join(testDir, 'sub'));
    await expect(resolveRoot(path.join(testDir, 'sub', '..', 'sub'))).resolves.toBe(expected);
  });

  it('should reject a missing path', async () => {
    await expect(resolveRoot(path.join(testDir, 'absent'))).rejects.toMatchObject({
      name: 'FatalError',
      code: ErrorCodes.ROOT_NOT_FOUND,
    });
  });

  it('should reject a file', async () => {
    const error = await resolveRoot(path.join(testDir, 'file.txt')).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FatalError);
    expect(error).toMatchObject({ code: ErrorCodes.NOT_A_DIRECTORY });
  });
});

describe('shared.categorizeError', () => {
  it('should map errno codes to categories', () => {
    expect(categorizeError(errnoError('EACCES'))).toBe('permission-denied');
    expect(categorizeError(errnoError('EPERM'))).toBe('permission-denied');
    expect(categorizeError(errnoError('ENOENT'))).toBe('not-found');
    expect(categorizeError(errnoError('EIO'))).toBe('other');
    expect(categorizeError('plain string')).toBe('other');
  });
});
