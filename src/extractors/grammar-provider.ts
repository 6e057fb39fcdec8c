/**
 * Grammar provider contract consumed by the grammar-backed extractor.
 *
 * Mirrors the shape of a tree-sitter binding: a parser turning source text
 * into a concrete syntax tree, and a language compiling structural queries
 * over that tree. Kept structural so tests can supply plain objects.
 */

export interface GrammarPoint {
  row: number;
  column: number;
}

export interface GrammarNode {
  readonly type: string;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: GrammarPoint;
  readonly endPosition: GrammarPoint;
  readonly children: readonly GrammarNode[];
}

export interface GrammarTree<N extends GrammarNode = GrammarNode> {
  readonly rootNode: N;
}

export interface GrammarParser<N extends GrammarNode = GrammarNode> {
  parse(source: string): GrammarTree<N>;
}

export interface GrammarCapture<N extends GrammarNode = GrammarNode> {
  node: N;
  name: string;
}

export interface GrammarQuery<N extends GrammarNode = GrammarNode> {
  captures(root: N): GrammarCapture<N>[];
}

export interface GrammarLanguage<N extends GrammarNode = GrammarNode> {
  readonly name: string;
  /**
   * Compile a structural query. Throws when the pattern does not compile.
   */
  query(source: string): GrammarQuery<N>;
}

export interface GrammarProvider<N extends GrammarNode = GrammarNode> {
  /** Whether a grammar is installed for the language */
  supports(language: string): boolean;
  /** Create a parser bound to the language. Throws when unsupported. */
  getParser(language: string): GrammarParser<N>;
  /** Get the language handle used to compile queries. Throws when unsupported. */
  getLanguage(language: string): GrammarLanguage<N>;
}
