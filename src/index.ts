/**
 * dupscope - duplicate code detection across languages.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Blocks and matching
export * from './core/blocks/types.js';
export * from './core/duplicates/index.js';

// Extraction
export * from './extractors/index.js';

// Discovery and analysis
export * from './core/discovery/index.js';
export * from './core/analysis/index.js';

// Report formatting
export {
  createFormatter,
  formatReport,
  writeReport,
  sortGroups,
  TextFormatter,
  JsonFormatter,
  MarkdownFormatter,
  OUTPUT_FORMATS,
  type FormatOptions,
  type IFormatter,
} from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
