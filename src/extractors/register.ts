/**
 * Default extractor wiring: ts-morph for the TypeScript family, tree-sitter
 * grammars for Python, Go and C#.
 */
import { ExtractorRegistry } from './extractor-registry.js';
import { TypeScriptExtractor, TYPESCRIPT_EXTENSIONS } from './typescript.js';
import { GrammarExtractor, DEFAULT_GRAMMAR_LANGUAGES } from './grammar.js';
import type { GrammarProvider } from './grammar-provider.js';
import { TreeSitterGrammarProvider } from './tree-sitter/tree-sitter-provider.js';
import { loadQueryCatalog, mergeQueryCatalogs, type QueryCatalog } from './queries.js';
import type { Logger } from '../utils/logger.js';

export const TYPESCRIPT_EXTRACTOR_ID = 'typescript';
export const GRAMMAR_EXTRACTOR_ID = 'grammar';

export interface RegistryOptions {
  /** Grammar source; tree-sitter when omitted */
  provider?: GrammarProvider;
  /** Per-language category overrides layered on the bundled queries */
  queries?: QueryCatalog;
  /** Directory holding the bundled `<language>/<category>.scm` files */
  queryDir?: string;
  logger?: Logger;
}

/**
 * Create a registry with every built-in extractor registered.
 * Instances are created on the first file of their kind.
 */
export function createDefaultRegistry(options: RegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();

  registry.register(
    TYPESCRIPT_EXTRACTOR_ID,
    () => new TypeScriptExtractor(),
    ['typescript', 'javascript'],
    TYPESCRIPT_EXTENSIONS
  );

  registry.register(
    GRAMMAR_EXTRACTOR_ID,
    () => {
      const queries = mergeQueryCatalogs(loadQueryCatalog(options.queryDir), options.queries);
      const provider: GrammarProvider = options.provider ?? new TreeSitterGrammarProvider();
      return new GrammarExtractor({ provider, queries, logger: options.logger });
    },
    DEFAULT_GRAMMAR_LANGUAGES.map((binding) => binding.language),
    DEFAULT_GRAMMAR_LANGUAGES.flatMap((binding) => binding.extensions)
  );

  return registry;
}
