/**
 * Tests for the analysis runner.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { resolveConfig, runAnalysis } from '../../../../src/core/analysis/runner.js';
import { getDefaultConfig, mergeConfig } from '../../../../src/core/config/loader.js';
import { BlockExtractor } from '../../../../src/extractors/block-extractor.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';

const ADD = 'def add(a, b):\n    return a + b\n';
const ADD_RENAMED = 'def add(a, c):\n    return a + c\n';

describe('runAnalysis', () => {
  let root: string;
  let log: Logger;

  async function write(name: string, content: string): Promise<string> {
    const filePath = path.join(root, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'runner-test-')));
    log = new Logger();
    log.setLevel('silent');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should group identical functions across files', async () => {
    const a = await write('a.py', ADD);
    const b = await write('b.py', ADD);
    await write('c.py', 'def ok():\n    return 1\n\n??? broken\n');

    const report = await runAnalysis({
      root,
      config: mergeConfig(getDefaultConfig(), { minSize: 5 }),
      logger: log,
    });

    expect(report.root).toBe(root);
    expect(report.strategy).toBe('exact');
    expect(report.minSize).toBe(5);
    expect(report.duplicates).toEqual([
      {
        size: 5,
        numDuplicates: 2,
        locations: [
          { file: a, startLine: 1, endLine: 2 },
          { file: b, startLine: 1, endLine: 2 },
        ],
        crossFile: true,
        tokens: ['add', 'a', 'b', 'a', 'b'],
        similarity: 1,
      },
    ]);
    expect(report.diagnostics).toMatchObject({
      filesScanned: 3,
      filesParsed: 2,
      filesSkipped: 0,
      filesFailed: 1,
      blocksExtracted: 2,
      blocksMatched: 2,
      comparisons: 0,
      prunedPairs: 0,
    });
    expect(report.diagnostics.failures).toEqual([
      expect.objectContaining({ file: path.join(root, 'c.py'), code: ErrorCodes.SYNTAX_ERROR }),
    ]);
  });

  it('should drop blocks below the size floor', async () => {
    await write('a.py', ADD);
    await write('b.py', ADD);

    const report = await runAnalysis({
      root,
      config: mergeConfig(getDefaultConfig(), { minSize: 6 }),
      logger: log,
    });

    expect(report.duplicates).toEqual([]);
    expect(report.diagnostics.blocksExtracted).toBe(2);
    expect(report.diagnostics.blocksMatched).toBe(0);
  });

  it('should produce the same report on repeated runs', async () => {
    await write('a.py', ADD);
    await write('b.py', ADD);
    const config = mergeConfig(getDefaultConfig(), { minSize: 5 });

    const first = await runAnalysis({ root, config, logger: log });
    const second = await runAnalysis({ root, config, logger: log });

    expect(second).toEqual(first);
  });

  it('should score near-duplicates with the pairwise strategy', async () => {
    const a = await write('a.py', ADD);
    const b = await write('b.py', ADD_RENAMED);

    const report = await runAnalysis({
      root,
      config: mergeConfig(getDefaultConfig(), {
        minSize: 5,
        minSimilarity: 0.5,
        strategy: 'pairwise',
      }),
      logger: log,
    });

    expect(report.strategy).toBe('pairwise');
    expect(report.duplicates).toEqual([
      {
        size: 5,
        numDuplicates: 2,
        locations: [
          { file: a, startLine: 1, endLine: 2 },
          { file: b, startLine: 1, endLine: 2 },
        ],
        crossFile: true,
        tokens: ['add', 'a', 'b', 'a', 'b'],
        similarity: 0.5,
      },
    ]);
    expect(report.diagnostics.comparisons).toBe(1);
  });

  it('should read the config file from the root', async () => {
    await write('a.py', ADD);
    await write('b.py', ADD);
    await write('.dupscope.yaml', 'duplicates:\n  min_size: 5\n');

    const report = await runAnalysis({ root, logger: log });

    expect(report.minSize).toBe(5);
    expect(report.duplicates).toHaveLength(1);
  });

  it('should apply overrides over the config file', async () => {
    await write('.dupscope.yaml', 'duplicates:\n  min_size: 5\n');

    const config = await resolveConfig({ root, overrides: { minSize: 9, strategy: 'pairwise' } });

    expect(config.duplicates.min_size).toBe(9);
    expect(config.duplicates.strategy).toBe('pairwise');
  });

  it('should reject a missing root', async () => {
    await expect(
      runAnalysis({ root: path.join(root, 'missing'), config: getDefaultConfig(), logger: log })
    ).rejects.toMatchObject({ code: ErrorCodes.ROOT_NOT_FOUND });
  });

  it('should reject invalid thresholds before scanning', async () => {
    await expect(
      runAnalysis({ root: path.join(root, 'missing'), overrides: { minSimilarity: 3 }, logger: log })
    ).rejects.toMatchObject({ code: ErrorCodes.INVALID_OPTION });
  });

  it('should not dispose an injected extractor', async () => {
    await write('a.py', ADD);
    const extractor = new BlockExtractor({ logger: log });
    const dispose = vi.spyOn(extractor, 'dispose');

    await runAnalysis({ root, config: getDefaultConfig(), extractor, logger: log });

    expect(dispose).not.toHaveBeenCalled();
    extractor.dispose();
  });
});
