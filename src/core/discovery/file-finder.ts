/**
 * Source file discovery for a scan root.
 */
import * as path from 'node:path';
import { globFiles, fileExists, isDirectory } from '../../utils/file-system.js';
import { loadIgnoreFile } from '../../utils/ignore-file.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { normalizeExtension } from '../../extractors/extractor-registry.js';
import { DEFAULT_EXTENSIONS, DEFAULT_IGNORE_DIRS } from '../config/schema.js';

export interface DiscoveryOptions {
  /** Extensions to collect, with or without the leading dot */
  extensions?: string[];
  /** Directory names skipped wherever they appear */
  ignoreDirs?: string[];
  /** Apply `.dupscopeignore` from the root (default: true) */
  useIgnoreFile?: boolean;
}

/**
 * Find every source file under `root` with one of the configured extensions.
 * Returns absolute paths in lexicographic order.
 */
export async function discoverFiles(root: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const absoluteRoot = path.resolve(root);
  await assertScanRoot(absoluteRoot);

  const extensions = Array.from(
    new Set((options.extensions ?? DEFAULT_EXTENSIONS).map(normalizeExtension))
  );
  if (extensions.length === 0) return [];

  const ignoreDirs = options.ignoreDirs ?? DEFAULT_IGNORE_DIRS;

  const files = await globFiles(
    extensions.map((ext) => `**/*${ext}`),
    {
      cwd: absoluteRoot,
      ignore: ignoreDirs.map((dir) => `**/${dir}/**`),
      absolute: true,
      dot: true,
    }
  );

  let kept = files.map((file) => path.resolve(file));
  if (options.useIgnoreFile ?? true) {
    const ignoreFilter = await loadIgnoreFile(absoluteRoot);
    kept = kept.filter((file) => !ignoreFilter.ignores(path.relative(absoluteRoot, file)));
  }

  return Array.from(new Set(kept)).sort();
}

async function assertScanRoot(root: string): Promise<void> {
  if (!(await fileExists(root))) {
    throw new ConfigError(ErrorCodes.ROOT_NOT_FOUND, `Path does not exist: ${root}`, { root });
  }
  if (!(await isDirectory(root))) {
    throw new ConfigError(ErrorCodes.ROOT_NOT_DIRECTORY, `Path is not a directory: ${root}`, { root });
  }
}
