/**
 * TypeScript/JavaScript extractor using ts-morph.
 *
 * This is the native path: the tool's own language is walked with its own
 * compiler, no tree-sitter grammar involved.
 */
import * as path from 'node:path';
import { Project, Node, SyntaxKind, type SourceFile } from 'ts-morph';
import type { LanguageExtractor, LanguageExtraction, SupportedLanguage } from './interface.types.js';
import {
  createCodeBlock,
  createSourceLocation,
  type BlockKind,
  type CodeBlock,
} from '../core/blocks/types.js';
import { ExtractionError, ErrorCodes } from '../utils/errors.js';

export const TYPESCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

/** Syntax kinds harvested as tokens: identifiers and literals */
const TOKEN_KINDS: ReadonlySet<SyntaxKind> = new Set([
  SyntaxKind.Identifier,
  SyntaxKind.PrivateIdentifier,
  SyntaxKind.StringLiteral,
  SyntaxKind.NumericLiteral,
  SyntaxKind.BigIntLiteral,
  SyntaxKind.NoSubstitutionTemplateLiteral,
  SyntaxKind.RegularExpressionLiteral,
  SyntaxKind.TemplateHead,
  SyntaxKind.TemplateMiddle,
  SyntaxKind.TemplateTail,
]);

interface Declaration {
  name: string;
  /** Node that spells the name; skipped during the token walk */
  nameNode?: Node;
  kind: BlockKind;
}

/**
 * Extracts functions, methods, classes, interfaces, enums and type aliases
 * from TypeScript and JavaScript sources.
 */
export class TypeScriptExtractor implements LanguageExtractor {
  readonly supportedLanguages: SupportedLanguage[] = ['typescript', 'javascript'];
  readonly supportedExtensions = TYPESCRIPT_EXTENSIONS;

  private project: Project;
  private fileCounter = 0;

  constructor() {
    this.project = new Project({
      useInMemoryFileSystem: true,
      skipLoadingLibFiles: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        noLib: true,
        skipLibCheck: true,
      },
      skipFileDependencyResolution: true,
    });
  }

  extract(filePath: string, content: string): LanguageExtraction {
    // Unique virtual path per call; the extension picks the script kind
    this.fileCounter++;
    const virtualPath = `/dupscope/${this.fileCounter}/${path.basename(filePath)}`;
    const sourceFile = this.project.createSourceFile(virtualPath, content, { overwrite: true });

    try {
      this.assertNoSyntaxErrors(sourceFile, filePath);
      return { blocks: this.collectBlocks(sourceFile, filePath), warnings: [] };
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }

  /**
   * A syntax error anywhere in the file rejects the whole file.
   */
  private assertNoSyntaxErrors(sourceFile: SourceFile, filePath: string): void {
    const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
    if (diagnostics.length === 0) return;

    const first = diagnostics[0];
    const text = first.getMessageText();
    const message = typeof text === 'string' ? text : text.getMessageText();

    throw new ExtractionError(
      ErrorCodes.SYNTAX_ERROR,
      `Syntax error in ${filePath}: ${message}`,
      { file: filePath, line: first.getLineNumber(), errorCount: diagnostics.length }
    );
  }

  private collectBlocks(sourceFile: SourceFile, filePath: string): CodeBlock[] {
    const blocks: CodeBlock[] = [];

    sourceFile.forEachDescendant((node) => {
      const declaration = describeDeclaration(node);
      if (!declaration) return;

      const tokens = [declaration.name, ...collectTokens(node, declaration.nameNode)];
      const location = createSourceLocation(
        filePath,
        node.getStartLineNumber(),
        node.getEndLineNumber()
      );
      blocks.push(createCodeBlock(tokens, location, declaration.kind));
    });

    return blocks;
  }
}

/**
 * Identify block-forming declarations. Anonymous ones are not blocks.
 */
function describeDeclaration(node: Node): Declaration | undefined {
  if (Node.isFunctionDeclaration(node)) {
    return named(node.getNameNode(), 'function');
  }
  if (Node.isMethodDeclaration(node) || Node.isGetAccessorDeclaration(node) || Node.isSetAccessorDeclaration(node)) {
    return named(node.getNameNode(), 'method');
  }
  if (Node.isConstructorDeclaration(node)) {
    return { name: 'constructor', kind: 'method' };
  }
  if (Node.isClassDeclaration(node) || Node.isClassExpression(node)) {
    return named(node.getNameNode(), 'class');
  }
  if (Node.isInterfaceDeclaration(node)) {
    return named(node.getNameNode(), 'interface');
  }
  if (Node.isEnumDeclaration(node)) {
    return named(node.getNameNode(), 'enum');
  }
  if (Node.isTypeAliasDeclaration(node)) {
    return named(node.getNameNode(), 'type');
  }
  if (Node.isVariableDeclaration(node)) {
    const initializer = node.getInitializer();
    const nameNode = node.getNameNode();
    if (
      initializer &&
      (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer)) &&
      Node.isIdentifier(nameNode)
    ) {
      return named(nameNode, 'function');
    }
  }
  return undefined;
}

function named(nameNode: Node | undefined, kind: BlockKind): Declaration | undefined {
  if (!nameNode) return undefined;
  return { name: nameNode.getText(), nameNode, kind };
}

/**
 * Depth-first, document-order walk collecting identifier and literal text.
 */
function collectTokens(root: Node, skip?: Node): string[] {
  const tokens: string[] = [];
  const skipped = skip?.compilerNode;

  root.forEachDescendant((node, traversal) => {
    if (node.compilerNode === skipped) {
      traversal.skip();
      return;
    }
    if (TOKEN_KINDS.has(node.getKind())) {
      tokens.push(node.getText());
    }
  });

  return tokens;
}
