/**
 * Shared syntax-tree utilities for the grammar-backed extractor.
 * Works on any GrammarNode, tree-sitter nodes included.
 */
import type { GrammarNode } from '../grammar-provider.js';

/**
 * Node types whose text is emitted whole as one literal token.
 * Their children (string content, escapes, interpolations) are not visited.
 */
const LITERAL_NODE_TYPES: ReadonlySet<string> = new Set([
  // Python
  'string',
  'integer',
  'float',
  // Go
  'interpreted_string_literal',
  'raw_string_literal',
  'int_literal',
  'float_literal',
  'imaginary_literal',
  'rune_literal',
  // Common names in other grammars
  'number',
  'string_literal',
  'char_literal',
  'character_literal',
  'integer_literal',
  'real_literal',
  'verbatim_string_literal',
]);

/** Node type produced by tree-sitter where the input does not parse */
const ERROR_NODE_TYPE = 'ERROR';

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(node: GrammarNode, sourceCode: string): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Gets the start and end line numbers of a node (1-based).
 * Tree-sitter rows are 0-based.
 */
export function getNodeLines(node: GrammarNode): {
  startLine: number;
  endLine: number;
} {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

export function isIdentifierNode(node: GrammarNode): boolean {
  return node.type === 'identifier' || node.type.endsWith('_identifier');
}

export function isLiteralNode(node: GrammarNode): boolean {
  return LITERAL_NODE_TYPES.has(node.type);
}

/**
 * Walks the tree depth-first, calling the callback for each node.
 * Returning false from the callback skips that node's children.
 */
export function walkTree(
  node: GrammarNode,
  callback: (node: GrammarNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Finds the first node (in document order) that tree-sitter could not parse.
 */
export function findErrorNode(root: GrammarNode): GrammarNode | null {
  let found: GrammarNode | null = null;
  walkTree(root, (node) => {
    if (found) return false;
    if (node.type === ERROR_NODE_TYPE) {
      found = node;
      return false;
    }
    return true;
  });
  return found;
}

/**
 * Collects identifier and literal tokens under a node, in document order.
 * Keywords, punctuation and operators are not tokens.
 */
export function collectTokens(root: GrammarNode, sourceCode: string): string[] {
  const tokens: string[] = [];

  walkTree(root, (node) => {
    if (isLiteralNode(node)) {
      tokens.push(getNodeText(node, sourceCode));
      return false;
    }
    if (isIdentifierNode(node)) {
      tokens.push(getNodeText(node, sourceCode));
    }
    return true;
  });

  return tokens;
}
