import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createScanCommand } from './commands/scan.js';
import { createLanguagesCommand } from './commands/languages.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = readPackageVersion(resolve(__dirname, '../../package.json'));

function readPackageVersion(packageJsonPath: string): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('dupscope')
    .description('Find duplicated code blocks across TypeScript, JavaScript, Python, Go and C# sources')
    .version(VERSION);
  [createScanCommand, createLanguagesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
