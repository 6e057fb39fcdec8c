/**
 * Structural query catalog for the grammar-backed extractor.
 *
 * Bundled patterns live in `queries/<language>/<category>.scm` at the package
 * root; `.dupscope.yaml` may replace or add categories per language.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { listDirSync, readFileSync } from '../utils/file-system.js';

/** language -> category -> query source */
export type QueryCatalog = Record<string, Record<string, string>>;

const QUERY_FILE_EXTENSION = '.scm';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Same relative location from src/extractors and dist/extractors */
export const BUNDLED_QUERY_DIR = path.resolve(__dirname, '../../queries');

/**
 * Load every `<language>/<category>.scm` file under a directory.
 * Languages and categories come out in name order.
 */
export function loadQueryCatalog(queryDir: string = BUNDLED_QUERY_DIR): QueryCatalog {
  const catalog: QueryCatalog = {};

  for (const language of listDirSync(queryDir)) {
    const languageDir = path.join(queryDir, language);
    const categories: Record<string, string> = {};

    for (const entry of listDirSync(languageDir)) {
      if (!entry.endsWith(QUERY_FILE_EXTENSION)) continue;
      const category = entry.slice(0, -QUERY_FILE_EXTENSION.length);
      categories[category] = readFileSync(path.join(languageDir, entry));
    }

    if (Object.keys(categories).length > 0) {
      catalog[language] = categories;
    }
  }

  return catalog;
}

/**
 * Overlay configured queries on a base catalog.
 * A configured category replaces the bundled one of the same name; new
 * categories run after the bundled ones.
 */
export function mergeQueryCatalogs(base: QueryCatalog, overrides: QueryCatalog = {}): QueryCatalog {
  const merged: QueryCatalog = {};

  for (const [language, categories] of Object.entries(base)) {
    merged[language] = { ...categories };
  }
  for (const [language, categories] of Object.entries(overrides)) {
    merged[language] = { ...merged[language], ...categories };
  }

  return merged;
}

/**
 * Categories of a language in the order they run.
 */
export function getCategories(catalog: QueryCatalog, language: string): Array<[string, string]> {
  return Object.entries(catalog[language] ?? {});
}
