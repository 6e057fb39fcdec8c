/**
 * Helpers shared by the report formatters.
 */
import * as path from 'node:path';
import type { SourceLocation } from '../../core/blocks/types.js';
import type { DuplicateGroup } from '../../core/duplicates/types.js';

/**
 * Groups ordered by size descending, then by first location.
 * Returns a new array.
 */
export function sortGroups(groups: readonly DuplicateGroup[]): DuplicateGroup[] {
  return [...groups].sort((a, b) => {
    if (a.size !== b.size) return b.size - a.size;
    return compareLocations(a.locations[0], b.locations[0]);
  });
}

function compareLocations(a: SourceLocation | undefined, b: SourceLocation | undefined): number {
  if (!a || !b) return a ? -1 : b ? 1 : 0;
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  return a.startLine - b.startLine;
}

/**
 * Path relative to the scan root when the file lives under it.
 */
export function displayPath(root: string, file: string): string {
  const relative = path.relative(root, file);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return file;
  }
  return relative.split(path.sep).join('/');
}

export function formatLines(location: SourceLocation): string {
  if (location.endLine === null || location.endLine === location.startLine) {
    return String(location.startLine);
  }
  return `${location.startLine}-${location.endLine}`;
}

export function formatPercent(similarity: number): string {
  return `${Math.round(similarity * 100)}%`;
}

/**
 * First tokens of a group, for previews.
 */
export function tokenPreview(tokens: readonly string[], limit = 12): string {
  const shown = tokens.slice(0, limit).join(' ');
  return tokens.length > limit ? `${shown} …` : shown;
}
