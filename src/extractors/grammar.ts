/**
 * Grammar-backed extractor: tree-sitter parsers plus structural queries.
 *
 * Parsers and compiled queries are created on first use of a language and
 * cached on the instance for the rest of its life.
 */
import * as path from 'node:path';
import type { LanguageExtractor, LanguageExtraction, SupportedLanguage } from './interface.types.js';
import type {
  GrammarCapture,
  GrammarLanguage,
  GrammarNode,
  GrammarParser,
  GrammarProvider,
  GrammarQuery,
  GrammarTree,
} from './grammar-provider.js';
import { getCategories, type QueryCatalog } from './queries.js';
import { collectTokens, findErrorNode, getNodeLines } from './tree-sitter/TreeSitterUtils.js';
import {
  createCodeBlock,
  createSourceLocation,
  isBlockKind,
  type BlockKind,
  type CodeBlock,
} from '../core/blocks/types.js';
import { ExtractionError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface GrammarLanguageBinding {
  language: SupportedLanguage;
  extensions: string[];
}

export const DEFAULT_GRAMMAR_LANGUAGES: GrammarLanguageBinding[] = [
  { language: 'python', extensions: ['.py'] },
  { language: 'go', extensions: ['.go'] },
  { language: 'c_sharp', extensions: ['.cs'] },
];

export interface GrammarExtractorOptions<N extends GrammarNode> {
  provider: GrammarProvider<N>;
  queries: QueryCatalog;
  languages?: GrammarLanguageBinding[];
  logger?: Logger;
}

interface CompiledCategory<N extends GrammarNode> {
  category: string;
  query: Result<GrammarQuery<N>, ExtractionError>;
}

interface LanguageState<N extends GrammarNode> {
  parser: GrammarParser<N>;
  categories: CompiledCategory<N>[];
}

export class GrammarExtractor<N extends GrammarNode = GrammarNode> implements LanguageExtractor {
  readonly supportedLanguages: SupportedLanguage[];
  readonly supportedExtensions: string[];

  private readonly provider: GrammarProvider<N>;
  private readonly queries: QueryCatalog;
  private readonly languageByExtension = new Map<string, SupportedLanguage>();
  private readonly cache = new Map<string, Result<LanguageState<N>, ExtractionError>>();
  private readonly log: Logger;

  constructor(options: GrammarExtractorOptions<N>) {
    const bindings = options.languages ?? DEFAULT_GRAMMAR_LANGUAGES;

    this.provider = options.provider;
    this.queries = options.queries;
    this.log = (options.logger ?? rootLogger).child('grammar');

    for (const binding of bindings) {
      for (const ext of binding.extensions) {
        this.languageByExtension.set(ext.toLowerCase(), binding.language);
      }
    }
    this.supportedLanguages = bindings.map((b) => b.language);
    this.supportedExtensions = Array.from(this.languageByExtension.keys());
  }

  /**
   * Language a path resolves to, or null when its extension is not bound.
   */
  languageFor(filePath: string): SupportedLanguage | null {
    return this.languageByExtension.get(path.extname(filePath).toLowerCase()) ?? null;
  }

  /**
   * Number of languages whose parser and queries have been built.
   */
  get cachedLanguageCount(): number {
    return this.cache.size;
  }

  extract(filePath: string, content: string): LanguageExtraction {
    const language = this.languageFor(filePath);
    if (!language) {
      throw new ExtractionError(
        ErrorCodes.UNSUPPORTED_LANGUAGE,
        `No grammar bound to ${path.extname(filePath) || 'extensionless files'}`,
        { file: filePath }
      );
    }

    const state = this.getState(language);
    if (!state.ok) {
      throw state.error;
    }

    const tree = this.parse(state.value.parser, filePath, content, language);
    const root = tree.rootNode;

    const errorNode = findErrorNode(root);
    if (errorNode) {
      throw new ExtractionError(
        ErrorCodes.SYNTAX_ERROR,
        `Syntax error in ${filePath} at line ${getNodeLines(errorNode).startLine}`,
        { file: filePath, line: getNodeLines(errorNode).startLine, language }
      );
    }

    const blocks: CodeBlock[] = [];
    const warnings: ExtractionError[] = [];

    if (state.value.categories.length === 0) {
      warnings.push(
        new ExtractionError(
          ErrorCodes.QUERY_ERROR,
          `No structural queries defined for ${language}`,
          { language }
        )
      );
    }

    for (const { category, query } of state.value.categories) {
      if (!query.ok) {
        warnings.push(query.error);
        continue;
      }

      let captures: GrammarCapture<N>[];
      try {
        captures = query.value.captures(root);
      } catch (error) {
        const warning = new ExtractionError(
          ErrorCodes.QUERY_ERROR,
          `Query '${category}' failed on ${filePath}: ${errorMessage(error)}`,
          { file: filePath, language, category }
        );
        this.log.warn(warning.message);
        warnings.push(warning);
        continue;
      }

      for (const capture of captures) {
        const kind = blockKindFor(capture.name, category);
        const lines = getNodeLines(capture.node);
        blocks.push(
          createCodeBlock(
            collectTokens(capture.node, content),
            createSourceLocation(filePath, lines.startLine, lines.endLine),
            kind
          )
        );
      }
    }

    return { blocks, warnings };
  }

  dispose(): void {
    this.cache.clear();
  }

  private parse(
    parser: GrammarParser<N>,
    filePath: string,
    content: string,
    language: string
  ): GrammarTree<N> {
    try {
      return parser.parse(content);
    } catch (error) {
      throw new ExtractionError(
        ErrorCodes.PARSER_ERROR,
        `Failed to parse ${filePath}: ${errorMessage(error)}`,
        { file: filePath, language }
      );
    }
  }

  /**
   * Build (once) the parser and compiled queries for a language.
   * Failures are cached too, so a broken grammar is reported per file
   * without being rebuilt.
   */
  private getState(language: SupportedLanguage): Result<LanguageState<N>, ExtractionError> {
    const cached = this.cache.get(language);
    if (cached) return cached;

    const state = this.buildState(language);
    this.cache.set(language, state);
    return state;
  }

  private buildState(language: SupportedLanguage): Result<LanguageState<N>, ExtractionError> {
    if (!this.provider.supports(language)) {
      return err(
        new ExtractionError(
          ErrorCodes.UNSUPPORTED_LANGUAGE,
          `No grammar installed for ${language}`,
          { language }
        )
      );
    }

    let parser: GrammarParser<N>;
    let grammar: GrammarLanguage<N>;
    try {
      parser = this.provider.getParser(language);
      grammar = this.provider.getLanguage(language);
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(
              ErrorCodes.PARSER_ERROR,
              `Failed to create a ${language} parser: ${errorMessage(error)}`,
              { language }
            );
      this.log.warn(failure.message);
      return err(failure);
    }

    const categories: CompiledCategory<N>[] = [];
    for (const [category, source] of getCategories(this.queries, language)) {
      categories.push({ category, query: this.compile(grammar, category, source) });
    }

    this.log.debug(`Prepared ${language} grammar`, {
      categories: categories.map((c) => c.category),
    });

    return ok({ parser, categories });
  }

  private compile(
    grammar: GrammarLanguage<N>,
    category: string,
    source: string
  ): Result<GrammarQuery<N>, ExtractionError> {
    const language = grammar.name;
    try {
      return ok(grammar.query(source));
    } catch (error) {
      const failure = new ExtractionError(
        ErrorCodes.QUERY_ERROR,
        `Query '${category}' for ${language} does not compile: ${errorMessage(error)}`,
        { language, category }
      );
      this.log.warn(failure.message);
      return err(failure);
    }
  }
}

/**
 * Capture names win over category names; neither has to be a known kind.
 */
function blockKindFor(captureName: string, category: string): BlockKind | undefined {
  if (isBlockKind(captureName)) return captureName;
  if (isBlockKind(category)) return category;
  return undefined;
}
