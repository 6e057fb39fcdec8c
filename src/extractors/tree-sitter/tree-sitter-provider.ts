/**
 * Grammar provider backed by the native tree-sitter binding.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import Go from 'tree-sitter-go';
import CSharp from 'tree-sitter-c-sharp';
import type {
  GrammarLanguage,
  GrammarParser,
  GrammarProvider,
  GrammarQuery,
} from '../grammar-provider.js';
import { ExtractionError, ErrorCodes, errorMessage } from '../../utils/errors.js';

/**
 * Installed grammars by language name.
 *
 * Note: The type assertion `as unknown as Parser.Language` is required because
 * the grammar packages' TypeScript definitions don't extend tree-sitter's
 * Language type, despite being compatible at runtime.
 */
const GRAMMARS: ReadonlyMap<string, Parser.Language> = new Map([
  ['python', Python as unknown as Parser.Language],
  ['go', Go as unknown as Parser.Language],
  ['c_sharp', CSharp as unknown as Parser.Language],
]);

export class TreeSitterGrammarProvider implements GrammarProvider<Parser.SyntaxNode> {
  supports(language: string): boolean {
    return GRAMMARS.has(language);
  }

  getParser(language: string): GrammarParser<Parser.SyntaxNode> {
    const grammar = this.grammarFor(language);
    const parser = new Parser();
    try {
      parser.setLanguage(grammar);
    } catch (error) {
      throw new ExtractionError(
        ErrorCodes.PARSER_ERROR,
        `Failed to load the ${language} grammar: ${errorMessage(error)}`,
        { language }
      );
    }
    return {
      // The binding's default buffer rejects inputs of 32 KB and more
      parse: (source) => parser.parse(source, undefined, { bufferSize: source.length * 2 + 1 }),
    };
  }

  getLanguage(language: string): GrammarLanguage<Parser.SyntaxNode> {
    const grammar = this.grammarFor(language);
    return {
      name: language,
      query(source: string): GrammarQuery<Parser.SyntaxNode> {
        const compiled = new Parser.Query(grammar, source);
        return {
          captures: (root) => compiled.captures(root).map(({ node, name }) => ({ node, name })),
        };
      },
    };
  }

  private grammarFor(language: string): Parser.Language {
    const grammar = GRAMMARS.get(language);
    if (!grammar) {
      throw new ExtractionError(
        ErrorCodes.UNSUPPORTED_LANGUAGE,
        `No grammar installed for language: ${language}`,
        { language, available: Array.from(GRAMMARS.keys()) }
      );
    }
    return grammar;
  }
}
