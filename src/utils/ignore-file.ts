/**
 * .dupscopeignore support - gitignore-style patterns for excluding files
 * from a scan.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export const IGNORE_FILENAME = '.dupscopeignore';

export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from the scan root
   */
  ignores(filePath: string): boolean;
}

/**
 * Load .dupscopeignore from the scan root.
 * A missing or unreadable file yields a filter that ignores nothing.
 */
export async function loadIgnoreFile(root: string): Promise<IgnoreFilter> {
  const ignorePath = join(root, IGNORE_FILENAME);
  const patterns: string[] = [];

  if (await fileExists(ignorePath)) {
    try {
      patterns.push(...parseIgnoreFile(await readFile(ignorePath)));
    } catch (error) {
      logger.warn(`Could not read ${ignorePath}: ${errorMessage(error)}`);
    }
  }

  return createIgnoreFilter(patterns);
}

export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      return ig.ignores(filePath.replace(/\\/g, '/'));
    },
  };
}

/**
 * Parse ignore file content (gitignore syntax).
 * Blank lines and `#` comments are dropped; `!` negations are kept.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
