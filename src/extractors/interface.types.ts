/**
 * Language extractor interface definition.
 */
import type { CodeBlock } from '../core/blocks/types.js';
import type { ExtractionError } from '../utils/errors.js';
import type { Result } from '../utils/result.js';

/**
 * Languages with a registered extractor.
 */
export type SupportedLanguage = 'typescript' | 'javascript' | 'python' | 'go' | 'c_sharp';

/**
 * Output of a language extractor for one file.
 * `warnings` carries failed query categories that did not stop the file.
 */
export interface LanguageExtraction {
  blocks: CodeBlock[];
  warnings: ExtractionError[];
}

/**
 * Extracts code blocks from one family of languages.
 *
 * `extract` throws an ExtractionError for whole-file failures (syntax error,
 * unavailable grammar); the BlockExtractor turns those into values.
 */
export interface LanguageExtractor {
  /** Languages this extractor supports */
  readonly supportedLanguages: SupportedLanguage[];

  /** File extensions this extractor handles */
  readonly supportedExtensions: string[];

  /**
   * Extract blocks from already-loaded source text.
   * @param filePath Path recorded in block locations; also selects the dialect
   */
  extract(filePath: string, content: string): LanguageExtraction;

  /**
   * Release parsers and caches.
   */
  dispose(): void;
}

/**
 * Extraction outcome for one file, as seen by callers of BlockExtractor.
 */
export interface FileExtraction {
  file: string;
  /** Extractor id the file was dispatched to, null when unsupported */
  extractor: string | null;
  result: Result<CodeBlock[], ExtractionError>;
  warnings: ExtractionError[];
}
