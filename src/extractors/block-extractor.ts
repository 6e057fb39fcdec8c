/**
 * Block extraction entry point.
 *
 * Reads files, dispatches them by extension through the registry and turns
 * every per-file failure into a value. Nothing here rejects.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import type { CodeBlock } from '../core/blocks/types.js';
import type { FileExtraction, LanguageExtractor } from './interface.types.js';
import type { ExtractorRegistry } from './extractor-registry.js';
import { createDefaultRegistry, type RegistryOptions } from './register.js';
import { readFile } from '../utils/file-system.js';
import { ExtractionError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { err, ok, unwrapOr } from '../utils/result.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface DiagnosticEntry {
  file: string;
  code: string;
  message: string;
}

export interface ExtractionDiagnostics {
  filesScanned: number;
  filesParsed: number;
  /** Files with no extractor for their extension */
  filesSkipped: number;
  filesFailed: number;
  blocksExtracted: number;
  failures: DiagnosticEntry[];
  warnings: DiagnosticEntry[];
}

export interface ExtractAllResult {
  /** Blocks of every file, in input file order */
  blocks: CodeBlock[];
  files: FileExtraction[];
  diagnostics: ExtractionDiagnostics;
}

export interface ExtractAllOptions {
  concurrency?: number;
}

export interface BlockExtractorOptions extends RegistryOptions {
  /** Pre-built registry; the default registry is created when omitted */
  registry?: ExtractorRegistry;
}

/**
 * 75% of available CPUs, min 2, max 16.
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

export class BlockExtractor {
  private readonly registry: ExtractorRegistry;
  private readonly log: Logger;

  constructor(options: BlockExtractorOptions = {}) {
    this.log = (options.logger ?? rootLogger).child('extract');
    this.registry = options.registry ?? createDefaultRegistry(options);
  }

  isSupported(filePath: string): boolean {
    return this.registry.isSupported(path.extname(filePath));
  }

  getSupportedExtensions(): string[] {
    return this.registry.getSupportedExtensions();
  }

  /**
   * Extract blocks from one file. Failures degrade to an empty list.
   */
  async extract(filePath: string): Promise<CodeBlock[]> {
    const extraction = await this.extractFile(filePath);
    return unwrapOr(extraction.result, []);
  }

  /**
   * Extract one file, keeping the failure reason and query warnings.
   */
  async extractFile(filePath: string): Promise<FileExtraction> {
    const extension = path.extname(filePath);
    const id = this.registry.resolveId(extension);

    if (!id) {
      this.log.debug(`Skipping ${filePath}: no extractor for '${extension}'`);
      return {
        file: filePath,
        extractor: null,
        result: err(
          new ExtractionError(
            ErrorCodes.UNSUPPORTED_LANGUAGE,
            `Unsupported file extension: ${extension || '(none)'}`,
            { file: filePath, extension }
          )
        ),
        warnings: [],
      };
    }

    let content: string;
    try {
      content = await readFile(filePath);
    } catch (error) {
      return this.failed(filePath, id, new ExtractionError(
        ErrorCodes.READ_ERROR,
        `Cannot read ${filePath}: ${errorMessage(error)}`,
        { file: filePath }
      ));
    }

    try {
      const extractor = this.requireExtractor(id);
      const { blocks, warnings } = extractor.extract(filePath, content);
      for (const warning of warnings) {
        this.log.debug(warning.message, { file: filePath, code: warning.code });
      }
      return { file: filePath, extractor: id, result: ok(blocks), warnings };
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(
              ErrorCodes.PARSER_ERROR,
              `Failed to extract ${filePath}: ${errorMessage(error)}`,
              { file: filePath }
            );
      return this.failed(filePath, id, failure);
    }
  }

  /**
   * Extract many files in batches of `concurrency`, keeping input order.
   */
  async extractAll(filePaths: string[], options: ExtractAllOptions = {}): Promise<ExtractAllResult> {
    const concurrency = Math.max(1, options.concurrency ?? defaultConcurrency());
    const files: FileExtraction[] = [];

    for (let i = 0; i < filePaths.length; i += concurrency) {
      const batch = filePaths.slice(i, i + concurrency);
      const batchResults = await Promise.allSettled(batch.map((fp) => this.extractFile(fp)));

      for (let j = 0; j < batchResults.length; j++) {
        const result = batchResults[j];
        if (result.status === 'fulfilled') {
          files.push(result.value);
        } else {
          files.push({
            file: batch[j],
            extractor: null,
            result: err(new ExtractionError(
              ErrorCodes.PARSER_ERROR,
              `Extraction failed: ${errorMessage(result.reason)}`,
              { file: batch[j] }
            )),
            warnings: [],
          });
        }
      }
    }

    return summarize(files);
  }

  /**
   * Release every extractor instance and its caches.
   */
  dispose(): void {
    this.registry.disposeAll();
  }

  private requireExtractor(id: string): LanguageExtractor {
    const extractor = this.registry.getById(id);
    if (!extractor) {
      throw new ExtractionError(ErrorCodes.PARSER_ERROR, `Extractor '${id}' is not registered`);
    }
    return extractor;
  }

  private failed(filePath: string, id: string, error: ExtractionError): FileExtraction {
    this.log.warn(error.message);
    return { file: filePath, extractor: id, result: err(error), warnings: [] };
  }
}

function summarize(files: FileExtraction[]): ExtractAllResult {
  const blocks: CodeBlock[] = [];
  const diagnostics: ExtractionDiagnostics = {
    filesScanned: files.length,
    filesParsed: 0,
    filesSkipped: 0,
    filesFailed: 0,
    blocksExtracted: 0,
    failures: [],
    warnings: [],
  };

  for (const file of files) {
    for (const warning of file.warnings) {
      diagnostics.warnings.push({ file: file.file, code: warning.code, message: warning.message });
    }

    if (file.result.ok) {
      diagnostics.filesParsed++;
      diagnostics.blocksExtracted += file.result.value.length;
      blocks.push(...file.result.value);
    } else if (file.result.error.code === ErrorCodes.UNSUPPORTED_LANGUAGE) {
      diagnostics.filesSkipped++;
    } else {
      diagnostics.filesFailed++;
      diagnostics.failures.push({
        file: file.file,
        code: file.result.error.code,
        message: file.result.error.message,
      });
    }
  }

  return { blocks, files, diagnostics };
}
