import type { AnalysisReport } from '../../core/analysis/types.js';
import type { DuplicateGroup } from '../../core/duplicates/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { displayPath, formatLines, formatPercent, sortGroups, tokenPreview } from './shared.js';

/**
 * Markdown report: a summary table followed by one section per group.
 */
export class MarkdownFormatter implements IFormatter {
  private verbose: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.verbose = options.verbose ?? false;
  }

  format(report: AnalysisReport): string {
    const groups = sortGroups(report.duplicates);
    const d = report.diagnostics;
    const lines: string[] = [
      '# Duplicate code report',
      '',
      '| Metric | Value |',
      '| --- | --- |',
      `| Root | \`${report.root}\` |`,
      `| Strategy | ${report.strategy} |`,
      `| Min size | ${report.minSize} |`,
      `| Min similarity | ${report.minSimilarity} |`,
      `| Files scanned | ${d.filesScanned} |`,
      `| Files parsed | ${d.filesParsed} |`,
      `| Files skipped | ${d.filesSkipped} |`,
      `| Files failed | ${d.filesFailed} |`,
      `| Blocks extracted | ${d.blocksExtracted} |`,
      `| Duplicate groups | ${groups.length} |`,
    ];

    groups.forEach((group, index) => {
      lines.push('', ...this.formatGroup(report.root, group, index + 1));
    });

    if (d.failures.length > 0) {
      lines.push('', '## Failed files', '');
      for (const failure of d.failures) {
        lines.push(`- \`${displayPath(report.root, failure.file)}\` (${failure.code}): ${escapeCell(failure.message)}`);
      }
    }

    return lines.join('\n') + '\n';
  }

  private formatGroup(root: string, group: DuplicateGroup, position: number): string[] {
    const lines = [
      `## Group ${position}: ${group.size} tokens, ${group.numDuplicates} copies`,
      '',
      `- Similarity: ${formatPercent(group.similarity)}`,
      `- Cross-file: ${group.crossFile ? 'yes' : 'no'}`,
      '',
      '| File | Lines |',
      '| --- | --- |',
    ];

    for (const location of group.locations) {
      lines.push(`| \`${escapeCell(displayPath(root, location.file))}\` | ${formatLines(location)} |`);
    }

    if (this.verbose) {
      lines.push('', `Tokens: \`${tokenPreview(group.tokens).replace(/`/g, "'")}\``);
    }

    return lines;
  }
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
