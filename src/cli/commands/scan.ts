/**
 * CLI command for scanning a directory tree for duplicated code.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { runAnalysis, resolveConfig } from '../../core/analysis/runner.js';
import type { ConfigOverrides } from '../../core/config/loader.js';
import { OutputFormatSchema, StrategySchema } from '../../core/config/schema.js';
import { formatReport, writeReport } from '../formatters/index.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DUPLICATES_FOUND = 2;

export interface ScanOptions {
  minSize?: string;
  minSimilarity?: string;
  strategy?: string;
  format?: string;
  output?: string;
  ignoreDirs?: string[];
  extensions?: string[];
  concurrency?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
  failOnDuplicates?: boolean;
}

export function createScanCommand(): Command {
  return new Command('scan')
    .description('Find duplicated functions, methods and classes under a directory')
    .argument('[path]', 'Directory to scan', '.')
    .option('--min-size <n>', 'Minimum tokens for a block to be compared (default: 50)')
    .option('--min-similarity <x>', 'Minimum Jaccard similarity, 0 to 1, for the pairwise strategy (default: 0.8)')
    .option('--strategy <name>', 'Matching strategy: exact | pairwise (default: exact)')
    .option('--format <format>', 'Output format: text | json | markdown (default: text)')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('--ignore-dirs <dirs...>', 'Directory names to skip (replaces the defaults)')
    .option('--extensions <exts...>', 'File extensions to scan (replaces the defaults)')
    .option('--concurrency <n>', 'Files extracted in parallel')
    .option('-c, --config <path>', 'Config file, relative to the working directory (default: .dupscope.yaml in the scanned directory)')
    .option('-v, --verbose', 'Debug logging, token previews and per-file diagnostics')
    .option('-q, --quiet', 'Only log errors')
    .option('--no-color', 'Disable colored output')
    .option('--fail-on-duplicates', 'Exit with code 2 when duplicates are found')
    .action(async (target: string, options: ScanOptions) => {
      try {
        const code = await runScan(target, options);
        if (code !== EXIT_SUCCESS) {
          process.exit(code);
        }
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(EXIT_FAILURE);
      }
    });
}

/**
 * Run a scan and print or write the report. Returns the exit code.
 */
export async function runScan(target: string, options: ScanOptions): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }

  const root = path.resolve(target);
  const overrides = parseOverrides(options);
  // Flag paths are relative to the working directory, like --output
  const configPath = options.config !== undefined ? path.resolve(options.config) : undefined;
  const config = await resolveConfig({ root, configPath, overrides });

  const report = await runAnalysis({ root, config });

  const outputFile = config.output.file ? path.resolve(root, config.output.file) : undefined;
  const rendered = formatReport(report, config.output.format, {
    colors: options.color !== false && !outputFile,
    verbose: options.verbose ?? false,
  });
  await writeReport(rendered, outputFile);

  if (outputFile) {
    logger.info(`Report written to ${outputFile}`);
  }

  return options.failOnDuplicates && report.duplicates.length > 0
    ? EXIT_DUPLICATES_FOUND
    : EXIT_SUCCESS;
}

/**
 * Turn raw flag strings into typed overrides. Range checks happen when the
 * overrides are merged into the config.
 */
export function parseOverrides(options: ScanOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {
    extensions: options.extensions,
    ignoreDirs: options.ignoreDirs,
  };

  if (options.minSize !== undefined) {
    overrides.minSize = parseNumber('--min-size', options.minSize);
  }
  if (options.minSimilarity !== undefined) {
    overrides.minSimilarity = parseNumber('--min-similarity', options.minSimilarity);
  }
  if (options.concurrency !== undefined) {
    overrides.concurrency = parseNumber('--concurrency', options.concurrency);
  }
  if (options.strategy !== undefined) {
    const strategy = StrategySchema.safeParse(options.strategy);
    if (!strategy.success) {
      throw invalidOption('--strategy', options.strategy, StrategySchema.options);
    }
    overrides.strategy = strategy.data;
  }
  if (options.format !== undefined) {
    const format = OutputFormatSchema.safeParse(options.format);
    if (!format.success) {
      throw invalidOption('--format', options.format, OutputFormatSchema.options);
    }
    overrides.format = format.data;
  }
  if (options.output !== undefined) {
    overrides.outputFile = path.resolve(options.output);
  }

  return overrides;
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(ErrorCodes.INVALID_OPTION, `${flag} expects a number, got '${raw}'`, {
      option: flag,
      value: raw,
    });
  }
  return value;
}

function invalidOption(flag: string, raw: string, allowed: readonly string[]): ConfigError {
  return new ConfigError(
    ErrorCodes.INVALID_OPTION,
    `${flag} must be one of ${allowed.join(', ')}, got '${raw}'`,
    { option: flag, value: raw }
  );
}
