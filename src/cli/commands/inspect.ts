/**
 * Show the keyword sets, registry and edit history of a dialect.
 */
import { Command } from 'commander';
import { prepareContext } from './setup.js';
import { formatDialectSummary, summarizeDialect } from '../formatters/dialect.js';
import { logger as log } from '../../utils/logger.js';

interface InspectOptions {
  config?: string;
  json?: boolean;
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show the keyword sets, segments, fragments and history of a dialect')
    .argument('<dialect>', 'Dialect name')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action(async (name: string, options: InspectOptions) => {
      try {
        await runInspect(name, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runInspect(name: string, options: InspectOptions): Promise<void> {
  const { registry } = await prepareContext(options.config);
  const summary = summarizeDialect(registry.load(name));

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(formatDialectSummary(summary));
  }
}
