/**
 * CLI command listing the languages and extensions the scanner understands.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { createDefaultRegistry } from '../../extractors/register.js';

export function createLanguagesCommand(): Command {
  return new Command('languages')
    .description('List supported languages and file extensions')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const registry = createDefaultRegistry();
      const languages = registry.getSupportedLanguages();
      const extensions = registry.getSupportedExtensions();

      if (options.json) {
        console.log(JSON.stringify({ languages, extensions }, null, 2));
        return;
      }

      console.log(chalk.bold('Supported languages'));
      console.log(`  ${languages.join(', ')}`);
      console.log(chalk.bold('Extensions'));
      console.log(`  ${extensions.join(' ')}`);
    });
}
