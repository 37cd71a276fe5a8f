/**
 * Print the full description of a dialect.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { prepareContext } from './setup.js';
import { exportDialect } from '../../core/dialect/export.js';
import { writeFile } from '../../utils/file-system.js';
import { stringifyYaml, writeYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

interface ExportOptions {
  config?: string;
  json?: boolean;
  output?: string;
}

/**
 * Create the export command.
 */
export function createExportCommand(): Command {
  return new Command('export')
    .description('Print a dialect as a self-contained YAML definition')
    .argument('<dialect>', 'Dialect name')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .action(async (name: string, options: ExportOptions) => {
      try {
        await runExport(name, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runExport(name: string, options: ExportOptions): Promise<void> {
  const { projectRoot, registry } = await prepareContext(options.config);
  const definition = exportDialect(registry.load(name));

  if (!options.output) {
    console.log(options.json ? JSON.stringify(definition, null, 2) : stringifyYaml(definition));
    return;
  }

  const outputPath = path.resolve(projectRoot, options.output);
  if (options.json) {
    await writeFile(outputPath, `${JSON.stringify(definition, null, 2)}\n`);
  } else {
    await writeYaml(outputPath, definition);
  }
  log.success(`Wrote ${name} to ${outputPath}`);
}
