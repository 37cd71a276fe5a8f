/**
 * Command line interface.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createDialectsCommand } from './commands/dialects.js';
import { createInspectCommand } from './commands/inspect.js';
import { createCheckCommand } from './commands/check.js';
import { createMatchCommand } from './commands/match.js';
import { createExportCommand } from './commands/export.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('dialect-forge')
    .description('Compose, derive and inspect SQL dialect grammars')
    .version(readVersion());
  [createDialectsCommand, createInspectCommand, createCheckCommand, createMatchCommand, createExportCommand].forEach(
    (cmd) => program.addCommand(cmd())
  );
  return program;
}
