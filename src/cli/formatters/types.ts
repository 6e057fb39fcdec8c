/**
 * Report formatter type definitions.
 */
import type { AnalysisReport } from '../../core/analysis/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat } from '../../core/config/schema.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'markdown'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output (text only) */
  colors: boolean;
  /** Include token previews and per-file diagnostics */
  verbose: boolean;
}

/**
 * Interface for report formatters.
 */
export interface IFormatter {
  format(report: AnalysisReport): string;
}
