import type { AnalysisReport } from '../../core/analysis/types.js';
import type { DuplicateGroup } from '../../core/duplicates/types.js';
import type { IFormatter } from './types.js';
import { displayPath, sortGroups } from './shared.js';

/**
 * JSON report for machine consumption. Field names are snake_case.
 */
export class JsonFormatter implements IFormatter {
  format(report: AnalysisReport): string {
    const groups = sortGroups(report.duplicates);
    const d = report.diagnostics;

    const output = {
      root: report.root,
      strategy: report.strategy,
      min_size: report.minSize,
      min_similarity: report.minSimilarity,
      summary: {
        groups: groups.length,
        duplicated_blocks: groups.reduce((sum, g) => sum + g.numDuplicates, 0),
        cross_file_groups: groups.filter((g) => g.crossFile).length,
      },
      duplicates: groups.map((group) => this.transformGroup(report.root, group)),
      diagnostics: {
        files_scanned: d.filesScanned,
        files_parsed: d.filesParsed,
        files_skipped: d.filesSkipped,
        files_failed: d.filesFailed,
        blocks_extracted: d.blocksExtracted,
        blocks_matched: d.blocksMatched,
        comparisons: d.comparisons,
        pruned_pairs: d.prunedPairs,
        failures: d.failures.map((f) => ({ ...f, file: displayPath(report.root, f.file) })),
        warnings: d.warnings.map((w) => ({ ...w, file: displayPath(report.root, w.file) })),
      },
    };

    return JSON.stringify(output, null, 2);
  }

  private transformGroup(root: string, group: DuplicateGroup): Record<string, unknown> {
    return {
      size: group.size,
      num_duplicates: group.numDuplicates,
      cross_file: group.crossFile,
      similarity: group.similarity,
      locations: group.locations.map((location) => ({
        file: displayPath(root, location.file),
        start_line: location.startLine,
        end_line: location.endLine,
      })),
      tokens: group.tokens,
    };
  }
}
