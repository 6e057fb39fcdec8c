/**
 * Schema for `.dupscope.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_EXTENSIONS = [
  '.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs',
  '.py', '.go', '.cs',
];

export const DEFAULT_IGNORE_DIRS = [
  '.git', '.venv', 'venv', 'env', 'ENV', 'build', 'dist', 'node_modules',
  '__pycache__', '.pytest_cache', 'coverage', 'vendor', 'bower_components',
  '.vscode', '.idea', '.vs', '.next',
];

export const StrategySchema = z.enum(['exact', 'pairwise']);

export const OutputFormatSchema = z.enum(['text', 'json', 'markdown']);

/** Which files a scan visits. */
export const ScanSettingsSchema = z.object({
  extensions: z.array(z.string().min(1)).default(DEFAULT_EXTENSIONS),
  ignore_dirs: z.array(z.string().min(1)).default(DEFAULT_IGNORE_DIRS),
});

/** Duplicate detection thresholds. */
export const DuplicateSettingsSchema = z.object({
  /** Minimum number of tokens for a block to be considered */
  min_size: z.number().int().min(0).default(50),
  /** Minimum Jaccard similarity for the pairwise strategy */
  min_similarity: z.number().min(0).max(1).default(0.8),
  strategy: StrategySchema.default('exact'),
});

/**
 * Extra or replacement structural queries, keyed by language then category.
 *
 * @example
 * extraction:
 *   queries:
 *     python:
 *       lambda: "(lambda) @function"
 */
export const QueryOverridesSchema = z.record(z.string(), z.record(z.string(), z.string()));

export const ExtractionSettingsSchema = z.object({
  /** Files extracted in parallel (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  queries: z.preprocess((val) => val ?? {}, QueryOverridesSchema),
});

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('text'),
  /** Write the report here instead of stdout */
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  scan: withDefaults(ScanSettingsSchema),
  duplicates: withDefaults(DuplicateSettingsSchema),
  extraction: withDefaults(ExtractionSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type Strategy = z.infer<typeof StrategySchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type DuplicateSettings = z.infer<typeof DuplicateSettingsSchema>;
export type QueryOverrides = z.infer<typeof QueryOverridesSchema>;
export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
