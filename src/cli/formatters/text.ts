import chalk from 'chalk';
import type { AnalysisReport } from '../../core/analysis/types.js';
import type { DuplicateGroup } from '../../core/duplicates/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { displayPath, formatLines, formatPercent, sortGroups, tokenPreview } from './shared.js';

type Color = 'red' | 'green' | 'yellow' | 'dim' | 'bold';

/**
 * Human-readable report for the terminal.
 */
export class TextFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  format(report: AnalysisReport): string {
    const lines: string[] = [];
    const groups = sortGroups(report.duplicates);

    lines.push(this.colorize(`Duplicate code report for ${report.root}`, 'bold'));
    lines.push(
      this.colorize(
        `Strategy: ${report.strategy}, min size: ${report.minSize}, min similarity: ${report.minSimilarity}`,
        'dim'
      )
    );
    lines.push('');

    if (groups.length === 0) {
      lines.push(this.colorize('No duplicates found.', 'green'));
    }

    groups.forEach((group, index) => {
      lines.push(...this.formatGroup(report.root, group, index + 1));
      lines.push('');
    });

    if (this.options.verbose) {
      lines.push(...this.formatDiagnostics(report));
    }

    lines.push(this.formatSummary(report, groups.length));
    return lines.join('\n');
  }

  private formatGroup(root: string, group: DuplicateGroup, position: number): string[] {
    const scope = group.crossFile ? 'cross-file' : 'same file';
    const lines = [
      this.colorize(
        `[${position}] ${group.size} tokens, ${group.numDuplicates} copies, ${scope}, similarity ${formatPercent(group.similarity)}`,
        'yellow'
      ),
    ];

    for (const location of group.locations) {
      lines.push(`    ${displayPath(root, location.file)}:${formatLines(location)}`);
    }

    if (this.options.verbose) {
      lines.push(this.colorize(`    tokens: ${tokenPreview(group.tokens)}`, 'dim'));
    }

    return lines;
  }

  private formatDiagnostics(report: AnalysisReport): string[] {
    const { failures, warnings } = report.diagnostics;
    const lines: string[] = [];

    if (failures.length > 0) {
      lines.push(this.colorize(`Failed files (${failures.length}):`, 'red'));
      for (const failure of failures) {
        lines.push(`    ${displayPath(report.root, failure.file)} [${failure.code}] ${failure.message}`);
      }
      lines.push('');
    }

    if (warnings.length > 0) {
      lines.push(this.colorize(`Warnings (${warnings.length}):`, 'yellow'));
      for (const warning of warnings) {
        lines.push(`    ${displayPath(report.root, warning.file)} [${warning.code}] ${warning.message}`);
      }
      lines.push('');
    }

    return lines;
  }

  private formatSummary(report: AnalysisReport, groupCount: number): string {
    const d = report.diagnostics;
    const summary =
      `${groupCount} duplicate group(s); ` +
      `${d.filesScanned} file(s) scanned, ${d.filesParsed} parsed, ` +
      `${d.filesSkipped} skipped, ${d.filesFailed} failed; ` +
      `${d.blocksExtracted} block(s) extracted`;
    return this.colorize(summary, groupCount > 0 ? 'yellow' : 'green');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
