/**
 * Human-readable output for dialect inspection and match trees.
 */
import chalk from 'chalk';
import type { Dialect } from '../../core/dialect/dialect.js';
import { formatGrammar } from '../../core/grammar/describe.js';
import type { MatchedNode } from '../../core/matching/types.js';

/**
 * Structured summary of a dialect, shared by the human and JSON outputs.
 */
export interface DialectSummary {
  name: string;
  parent: string | null;
  published: boolean;
  keywordSets: Record<string, number>;
  segments: Array<{ name: string; type: string; grammar: string }>;
  fragments: Array<{ name: string; grammar: string }>;
  history: string[];
}

export function summarizeDialect(dialect: Dialect): DialectSummary {
  const keywordSets: Record<string, number> = {};
  for (const setName of dialect.keywordSetNames()) {
    keywordSets[setName] = dialect.keywords(setName).size;
  }

  return {
    name: dialect.name,
    parent: dialect.parent?.name ?? null,
    published: dialect.isPublished,
    keywordSets,
    segments: dialect.segments().map((segment) => ({
      name: segment.name,
      type: segment.type,
      grammar: formatGrammar(segment.grammar),
    })),
    fragments: dialect.fragments().map((fragment) => ({
      name: fragment.name,
      grammar: formatGrammar(fragment.grammar),
    })),
    history: dialect.history.map((edit) => {
      switch (edit.op) {
        case 'derive':
          return `derive from ${edit.from}`;
        case 'keywords.update':
        case 'keywords.difference_update':
          return `${edit.op} ${edit.set} (${edit.keywords.length})`;
        case 'keywords.promote':
          return `keywords.promote ${edit.from} -> ${edit.to} (${edit.keywords.length})`;
        default:
          return `${edit.op} ${edit.kind} ${edit.name}`;
      }
    }),
  };
}

export function formatDialectSummary(summary: DialectSummary): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Dialect: ${summary.name}`));
  lines.push(`  Derived from: ${summary.parent ?? chalk.dim('(base dialect)')}`);
  lines.push('');

  lines.push(chalk.bold('Keyword sets:'));
  for (const [setName, size] of Object.entries(summary.keywordSets)) {
    lines.push(`  ${setName}: ${size}`);
  }
  lines.push('');

  lines.push(chalk.bold(`Segments (${summary.segments.length}):`));
  for (const segment of summary.segments) {
    lines.push(`  ${chalk.cyan(segment.name)} ${chalk.dim(`[${segment.type}]`)}`);
    lines.push(`    ${segment.grammar}`);
  }
  lines.push('');

  lines.push(chalk.bold(`Fragments (${summary.fragments.length}):`));
  for (const fragment of summary.fragments) {
    lines.push(`  ${chalk.cyan(fragment.name)} = ${fragment.grammar}`);
  }

  if (summary.history.length > 0) {
    lines.push('');
    lines.push(chalk.bold('History:'));
    for (const entry of summary.history) {
      lines.push(`  ${entry}`);
    }
  }

  return lines.join('\n');
}

/**
 * Render a match tree, one node per line, indented by depth.
 */
export function formatMatchTree(nodes: readonly MatchedNode[], depth = 0): string {
  const indent = '  '.repeat(depth);
  const lines: string[] = [];
  for (const node of nodes) {
    if (node.kind === 'token') {
      lines.push(`${indent}${node.type}: ${JSON.stringify(node.value)}`);
    } else {
      lines.push(`${indent}${chalk.cyan(node.type)} ${chalk.dim(`(${node.name})`)}`);
      const children = formatMatchTree(node.children, depth + 1);
      if (children) lines.push(children);
    }
  }
  return lines.join('\n');
}
