/**
 * Report formatters and output.
 */
import type { AnalysisReport } from '../../core/analysis/types.js';
import { writeFile } from '../../utils/file-system.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';
import { TextFormatter } from './text.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';

export * from './types.js';
export { TextFormatter } from './text.js';
export { JsonFormatter } from './json.js';
export { MarkdownFormatter } from './markdown.js';
export { sortGroups, displayPath } from './shared.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'markdown':
      return new MarkdownFormatter(options);
    case 'text':
      return new TextFormatter(options);
  }
}

export function formatReport(
  report: AnalysisReport,
  format: OutputFormat,
  options: Partial<FormatOptions> = {}
): string {
  return createFormatter(format, options).format(report);
}

/**
 * Print a rendered report, or write it to a file (parent directories are created).
 */
export async function writeReport(content: string, outputFile?: string): Promise<void> {
  if (outputFile) {
    await writeFile(outputFile, content.endsWith('\n') ? content : `${content}\n`);
    return;
  }
  console.log(content);
}
