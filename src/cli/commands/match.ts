/**
 * Match SQL text against a dialect rule.
 */
import { Command } from 'commander';
import { prepareContext } from './setup.js';
import { formatMatchTree } from '../formatters/dialect.js';
import { lexSql } from '../../core/matching/lexer.js';
import { PegMatcher } from '../../core/matching/matcher.js';
import { logger as log } from '../../utils/logger.js';

interface MatchOptions {
  config?: string;
  rule?: string;
  json?: boolean;
}

/**
 * Create the match command.
 */
export function createMatchCommand(): Command {
  return new Command('match')
    .description('Match SQL text against a dialect and print the tree')
    .argument('<dialect>', 'Dialect name')
    .argument('<sql>', 'SQL text')
    .option('-c, --config <path>', 'Path to config file')
    .option('-r, --rule <name>', 'Registry entry to match (default: entry_rule from config)')
    .option('--json', 'Output as JSON')
    .action(async (name: string, sql: string, options: MatchOptions) => {
      try {
        const matched = await runMatch(name, sql, options);
        if (!matched) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runMatch(name: string, sql: string, options: MatchOptions): Promise<boolean> {
  const { config, registry } = await prepareContext(options.config);
  const dialect = registry.load(name);
  const rule = options.rule ?? config.entry_rule;
  const tokens = lexSql(sql);
  const result = new PegMatcher(dialect, { maxDepth: config.max_depth }).matchAll(rule, tokens);

  if (options.json) {
    console.log(JSON.stringify({ dialect: name, rule, ...result }, null, 2));
    return result.ok;
  }

  if (!result.ok) {
    const found = tokens[result.pos];
    const at = found ? `'${found.raw}' (offset ${found.offset})` : 'end of input';
    log.fail(`${rule} does not match in ${name}: expected ${result.expected} at ${at}`);
    return false;
  }

  console.log(formatMatchTree(result.nodes));
  return true;
}
