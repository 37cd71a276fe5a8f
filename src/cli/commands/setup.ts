/**
 * Shared command setup: configuration, log level and the dialect registry.
 */
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { registerDefinitionFiles } from '../../core/dialect/loader.js';
import { dialectRegistry, type DialectRegistry } from '../../core/dialect/registry.js';
import { registerBuiltinDialects } from '../../dialects/index.js';
import { logger as log } from '../../utils/logger.js';

export interface CommandContext {
  projectRoot: string;
  config: Config;
  registry: DialectRegistry;
}

/**
 * Load configuration and register built-in and configured dialects.
 */
export async function prepareContext(configPath: string | undefined): Promise<CommandContext> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, configPath);
  log.setLevel(config.log_level);

  registerBuiltinDialects(dialectRegistry);
  const registered = await registerDefinitionFiles(config.definitions, projectRoot, dialectRegistry);
  if (registered.length > 0) {
    log.debug(`Registered ${registered.length} dialect definition(s): ${registered.join(', ')}`);
  }

  return { projectRoot, config, registry: dialectRegistry };
}
