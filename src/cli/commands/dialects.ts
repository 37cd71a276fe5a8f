/**
 * List registered dialects.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { prepareContext } from './setup.js';
import { logger as log } from '../../utils/logger.js';

interface DialectsOptions {
  config?: string;
  json?: boolean;
}

/**
 * Create the dialects command.
 */
export function createDialectsCommand(): Command {
  return new Command('dialects')
    .description('List registered dialects')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (options: DialectsOptions) => {
      try {
        await runDialects(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runDialects(options: DialectsOptions): Promise<void> {
  const { registry } = await prepareContext(options.config);
  const dialects = registry.names().map((name) => {
    const dialect = registry.load(name);
    return { name, parent: dialect.parent?.name ?? null, entries: dialect.names().length };
  });

  if (options.json) {
    console.log(JSON.stringify(dialects, null, 2));
    return;
  }

  for (const dialect of dialects) {
    const origin = dialect.parent ? `derived from ${dialect.parent}` : 'base';
    console.log(`${chalk.cyan(dialect.name)} ${chalk.dim(`(${origin}, ${dialect.entries} entries)`)}`);
  }
}
