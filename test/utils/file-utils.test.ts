import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as path from 'path';
import { FileUnreadableError } from '../../src/errors/file-unreadable-error';
import {
  countLines,
  directoryExists,
  fileExists,
  fileStem,
  findFiles,
  readSourceFile,
  shouldExclude,
  toPosixPath,
  tryReadText,
} from '../../src/utils/file-utils';
import { createTempRepo, removeTempRepo } from '../test-utils';

describe('file-utils', () => {
  let root: string;

  beforeAll(async () => {
    root = await createTempRepo({
      'b.txt': 'b\n',
      'a/z.ts': '',
      'a/y.ts': '',
      'node_modules/m/index.js': '',
      'vendor/lib.min.js': '',
    });
  });

  afterAll(async () => {
    await removeTempRepo(root);
  });

  it('walks the tree in name order with POSIX relative paths', async () => {
    expect(await findFiles(root)).toEqual(['a/y.ts', 'a/z.ts', 'b.txt', 'node_modules/m/index.js', 'vendor/lib.min.js']);
  });

  it('skips excluded directory names and path patterns', async () => {
    const files = await findFiles(root, { excludeDirectories: ['node_modules'], excludePatterns: ['**/*.min.*'] });
    expect(files).toEqual(['a/y.ts', 'a/z.ts', 'b.txt']);
  });

  it('respects the depth limit', async () => {
    expect(await findFiles(root, { maxDepth: 0 })).toEqual(['b.txt']);
  });

  it('distinguishes files from directories', async () => {
    expect(await fileExists(path.join(root, 'b.txt'))).toBe(true);
    expect(await fileExists(path.join(root, 'a'))).toBe(false);
    expect(await directoryExists(path.join(root, 'a'))).toBe(true);
    expect(await directoryExists(path.join(root, 'missing'))).toBe(false);
  });

  it('wraps read failures in FileUnreadableError', async () => {
    await expect(readSourceFile(path.join(root, 'missing.ts'))).rejects.toBeInstanceOf(FileUnreadableError);
    expect(await tryReadText(path.join(root, 'missing.ts'))).toBeNull();
    expect(await tryReadText(path.join(root, 'b.txt'))).toBe('b\n');
  });

  it('derives stems, line counts and POSIX paths', () => {
    expect(fileStem('src/app.test.ts')).toBe('app.test');
    expect(countLines('one\ntwo\n')).toBe(3);
    expect(toPosixPath('src\\core\\a.ts')).toBe('src/core/a.ts');
    expect(shouldExclude('src\\gen\\a.min.js', ['**/*.min.*'])).toBe(true);
  });
});
