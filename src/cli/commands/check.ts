/**
 * Build and publish a dialect, reporting unresolved references.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { prepareContext } from './setup.js';
import { buildDialectFromDefinition, loadDialectDefinition } from '../../core/dialect/loader.js';
import type { Dialect } from '../../core/dialect/dialect.js';
import type { DialectRegistry } from '../../core/dialect/registry.js';
import { logger as log } from '../../utils/logger.js';

interface CheckOptions {
  config?: string;
}

const DEFINITION_FILE = /\.ya?ml$/i;

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Build and publish a dialect or a YAML dialect definition')
    .argument('<target>', 'Dialect name or path to a definition file')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (target: string, options: CheckOptions) => {
      try {
        const passed = await runCheck(target, options);
        if (!passed) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runCheck(target: string, options: CheckOptions): Promise<boolean> {
  const { projectRoot, registry } = await prepareContext(options.config);
  const dialect = DEFINITION_FILE.test(target)
    ? await buildFromFile(path.resolve(projectRoot, target), registry)
    : registry.load(target);

  const unresolved = dialect.unresolvedReferences();
  if (unresolved.length > 0) {
    log.fail(`${dialect.name}: ${unresolved.length} unresolved reference(s)`);
    for (const reference of unresolved) {
      console.log(`  ${chalk.red(reference.name)} ${chalk.dim(`referenced from ${reference.from}`)}`);
    }
    return false;
  }

  dialect.publish();
  log.success(`${dialect.name}: ${dialect.segments().length} segments, ${dialect.fragments().length} fragments`);
  return true;
}

async function buildFromFile(filePath: string, registry: DialectRegistry): Promise<Dialect> {
  const definition = await loadDialectDefinition(filePath);
  return buildDialectFromDefinition(definition, registry);
}
