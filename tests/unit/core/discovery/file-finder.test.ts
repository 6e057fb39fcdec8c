/**
 * Tests for source file discovery.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { discoverFiles } from '../../../../src/core/discovery/file-finder.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

describe('discoverFiles', () => {
  let root: string;

  async function touch(relative: string, content = ''): Promise<void> {
    const filePath = path.join(root, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  function relativeAll(files: string[]): string[] {
    return files.map((file) => path.relative(root, file).split(path.sep).join('/'));
  }

  beforeAll(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'file-finder-test-')));
    await touch('src/a.ts');
    await touch('src/b.py');
    await touch('node_modules/pkg/index.js');
    await touch('build/out.js');
    await touch('vendor/lib.go');
    await touch('.hidden/c.go');
    await touch('notes.txt');
    await touch('generated/model.ts');
    await touch('.dupscopeignore', '# generated sources\ngenerated/\n');
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should find supported files outside ignored directories, sorted', async () => {
    const files = await discoverFiles(root);

    expect(relativeAll(files)).toEqual(['.hidden/c.go', 'src/a.ts', 'src/b.py']);
    expect(files.every((file) => path.isAbsolute(file))).toBe(true);
  });

  it('should honor custom extensions with or without a dot', async () => {
    const files = await discoverFiles(root, { extensions: ['py', '.txt'] });

    expect(relativeAll(files)).toEqual(['notes.txt', 'src/b.py']);
  });

  it('should return nothing for an empty extension list', async () => {
    await expect(discoverFiles(root, { extensions: [] })).resolves.toEqual([]);
  });

  it('should descend into every directory when ignoreDirs is empty', async () => {
    const files = await discoverFiles(root, { extensions: ['.go'], ignoreDirs: [] });

    expect(relativeAll(files)).toEqual(['.hidden/c.go', 'vendor/lib.go']);
  });

  it('should skip the ignore file when asked', async () => {
    const files = await discoverFiles(root, { extensions: ['.ts'], useIgnoreFile: false });

    expect(relativeAll(files)).toEqual(['generated/model.ts', 'src/a.ts']);
  });

  it('should reject a missing root', async () => {
    await expect(discoverFiles(path.join(root, 'missing'))).rejects.toMatchObject({
      name: 'ConfigError',
      code: ErrorCodes.ROOT_NOT_FOUND,
    });
  });

  it('should reject a root that is a file', async () => {
    await expect(discoverFiles(path.join(root, 'notes.txt'))).rejects.toMatchObject({
      code: ErrorCodes.ROOT_NOT_DIRECTORY,
    });
  });
});
