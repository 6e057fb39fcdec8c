/**
 * Block extraction: language extractors, registry and the file-level entry point.
 */
export * from './interface.types.js';
export * from './grammar-provider.js';
export { ExtractorRegistry, normalizeExtension, type ExtractorFactory } from './extractor-registry.js';
export { TypeScriptExtractor, TYPESCRIPT_EXTENSIONS } from './typescript.js';
export {
  GrammarExtractor,
  DEFAULT_GRAMMAR_LANGUAGES,
  type GrammarExtractorOptions,
  type GrammarLanguageBinding,
} from './grammar.js';
export { TreeSitterGrammarProvider } from './tree-sitter/tree-sitter-provider.js';
export {
  BUNDLED_QUERY_DIR,
  loadQueryCatalog,
  mergeQueryCatalogs,
  getCategories,
  type QueryCatalog,
} from './queries.js';
export {
  createDefaultRegistry,
  TYPESCRIPT_EXTRACTOR_ID,
  GRAMMAR_EXTRACTOR_ID,
  type RegistryOptions,
} from './register.js';
export {
  BlockExtractor,
  defaultConcurrency,
  type BlockExtractorOptions,
  type DiagnosticEntry,
  type ExtractionDiagnostics,
  type ExtractAllOptions,
  type ExtractAllResult,
} from './block-extractor.js';
