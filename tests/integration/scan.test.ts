/**
 * End-to-end scans through the CLI program over a mixed-language tree.
 */
import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createCli } from '../../src/cli/index.js';
import { runAnalysis } from '../../src/core/analysis/runner.js';
import { logger } from '../../src/utils/logger.js';

const PYTHON_ADD = 'def add(a, b):\n    return a + b\n';
const JS_ADD = 'function add(a, b) {\n  return a + b;\n}\n';
const TS_ADD = 'export function add(a, b) {\n  return a + b;\n}\n';
const GO_ADD = 'package calc\n\nfunc Add(a int, b int) int {\n\treturn a + b\n}\n';

describe('scan (integration)', () => {
  let root: string;

  async function write(relative: string, content: string): Promise<void> {
    const filePath = path.join(root, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  beforeAll(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'scan-integration-')));
    await write('a.py', PYTHON_ADD);
    await write('b.js', JS_ADD);
    await write('c.ts', TS_ADD);
    await write('go/one.go', GO_ADD);
    await write('go/two.go', GO_ADD);
    await write('node_modules/dep/index.ts', TS_ADD);
    await write('README.md', '# calc\n');
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
  });

  it('should match the same function across languages', async () => {
    const report = await runAnalysis({ root, overrides: { minSize: 5 }, logger });

    expect(report.duplicates.map((group) => ({
      size: group.size,
      files: group.locations.map((location) => path.relative(root, location.file).split(path.sep).join('/')),
    }))).toEqual([
      { size: 5, files: ['a.py', 'b.js', 'c.ts'] },
      { size: 8, files: ['go/one.go', 'go/two.go'] },
    ]);
    expect(report.diagnostics).toMatchObject({
      filesScanned: 5,
      filesParsed: 5,
      filesSkipped: 0,
      filesFailed: 0,
      blocksExtracted: 5,
    });
  });

  it('should print a JSON report through the CLI', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await createCli().parseAsync(['node', 'dupscope', 'scan', root, '--format', 'json', '--min-size', '5', '-q']);

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const report: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(report).toMatchObject({
      summary: { groups: 2, duplicated_blocks: 5, cross_file_groups: 2 },
      duplicates: [
        { size: 8, tokens: ['Add', 'a', 'int', 'b', 'int', 'int', 'a', 'b'] },
        { size: 5, tokens: ['add', 'a', 'b', 'a', 'b'] },
      ],
    });
  });

  it('should exit with code 2 when duplicates are found and requested', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    await createCli().parseAsync([
      'node', 'dupscope', 'scan', root, '--min-size', '5', '--fail-on-duplicates', '--no-color', '-q',
    ]);

    expect(exitSpy).toHaveBeenCalledWith(2);
  });

  it('should apply the pairwise strategy from flags', async () => {
    const report = await runAnalysis({
      root,
      overrides: { minSize: 5, strategy: 'pairwise', minSimilarity: 1, extensions: ['.go'] },
      logger,
    });

    expect(report.strategy).toBe('pairwise');
    expect(report.duplicates).toHaveLength(1);
    expect(report.duplicates[0]).toMatchObject({ size: 8, numDuplicates: 2, similarity: 1, crossFile: true });
  });
});
