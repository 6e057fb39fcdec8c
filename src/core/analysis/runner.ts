/**
 * Analysis runner: configuration, discovery, extraction, matching.
 */
import * as path from 'node:path';
import { loadConfig, mergeConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { discoverFiles } from '../discovery/file-finder.js';
import { DuplicateMatcher } from '../duplicates/matcher.js';
import { BlockExtractor } from '../../extractors/block-extractor.js';
import { logger as rootLogger } from '../../utils/logger.js';
import type { AnalysisOptions, AnalysisReport } from './types.js';

/**
 * Resolve configuration for a run: defaults <- config file <- overrides.
 */
export async function resolveConfig(options: AnalysisOptions): Promise<Config> {
  const base = options.config ?? (await loadConfig(path.resolve(options.root), options.configPath));
  return mergeConfig(base, options.overrides);
}

/**
 * Scan a directory tree for duplicated code blocks.
 * Only configuration problems (bad config, missing root) reject.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisReport> {
  const log = (options.logger ?? rootLogger).child('analysis');
  const root = path.resolve(options.root);
  const config = await resolveConfig(options);

  // Validate thresholds before touching the filesystem
  const matcher = new DuplicateMatcher({
    minSize: config.duplicates.min_size,
    minSimilarity: config.duplicates.min_similarity,
    strategy: config.duplicates.strategy,
  });

  const files = await discoverFiles(root, {
    extensions: config.scan.extensions,
    ignoreDirs: config.scan.ignore_dirs,
  });
  log.debug(`Discovered ${files.length} file(s) under ${root}`);

  const extractor =
    options.extractor ??
    new BlockExtractor({ queries: config.extraction.queries, logger: options.logger });

  try {
    const extraction = await extractor.extractAll(files, {
      concurrency: config.extraction.concurrency,
    });
    log.debug(`Extracted ${extraction.diagnostics.blocksExtracted} block(s)`);

    const { groups, stats } = matcher.matchWithStats(extraction.blocks);
    log.debug(`Found ${groups.length} duplicate group(s)`, {
      strategy: matcher.strategyName,
      comparisons: stats.comparisons,
      prunedPairs: stats.prunedPairs,
    });

    return {
      root,
      strategy: matcher.strategyName,
      minSize: matcher.minSize,
      minSimilarity: matcher.minSimilarity,
      duplicates: groups,
      diagnostics: {
        ...extraction.diagnostics,
        blocksMatched: stats.received - stats.malformed - stats.belowMinSize,
        comparisons: stats.comparisons,
        prunedPairs: stats.prunedPairs,
      },
    };
  } finally {
    if (!options.extractor) {
      extractor.dispose();
    }
  }
}
