/**
 * Analysis run types.
 */
import type { Config } from '../config/schema.js';
import type { ConfigOverrides } from '../config/loader.js';
import type { DuplicateGroup, MatchStrategyName } from '../duplicates/types.js';
import type { ExtractionDiagnostics, BlockExtractor } from '../../extractors/block-extractor.js';
import type { Logger } from '../../utils/logger.js';

export interface AnalysisOptions {
  /** Directory to scan */
  root: string;
  /** Config file, relative to root (default: `.dupscope.yaml`) */
  configPath?: string;
  /** Already-resolved configuration; skips loading */
  config?: Config;
  /** Values that win over the config file */
  overrides?: ConfigOverrides;
  /** Extractor to use instead of a fresh default one; not disposed by the run */
  extractor?: BlockExtractor;
  logger?: Logger;
}

export interface AnalysisDiagnostics extends ExtractionDiagnostics {
  /** Blocks that reached matching after the size floor */
  blocksMatched: number;
  /** Similarity computations (pairwise strategy) */
  comparisons: number;
  /** Pairs skipped by the size-ratio bound (pairwise strategy) */
  prunedPairs: number;
}

export interface AnalysisReport {
  root: string;
  strategy: MatchStrategyName;
  minSize: number;
  minSimilarity: number;
  duplicates: DuplicateGroup[];
  diagnostics: AnalysisDiagnostics;
}
