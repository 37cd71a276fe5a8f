/**
 * Dump a dialect as a self-contained definition.
 */
import { describeGrammar } from '../grammar/describe.js';
import type { Dialect } from './dialect.js';
import type { DialectDefinition } from './schema.js';

/**
 * Describe every keyword set and registry entry of a dialect.
 * The result has no `derive_from`: it rebuilds the same dialect on its own.
 */
export function exportDialect(dialect: Dialect): DialectDefinition {
  const keywords: DialectDefinition['keywords'] = {};
  for (const setName of dialect.keywordSetNames()) {
    keywords[setName] = { add: dialect.keywords(setName).values(), remove: [] };
  }

  const add: DialectDefinition['add'] = {};
  for (const fragment of dialect.fragments()) {
    add[fragment.name] = describeGrammar(fragment.grammar);
  }

  return {
    name: dialect.name,
    ...(dialect.parent ? { description: `Derived from ${dialect.parent.name}` } : {}),
    exclusive_keyword_groups: dialect.exclusiveKeywordGroups.map((group) => [...group]),
    keywords,
    promote: [],
    add,
    replace: {},
    segments: dialect.segments().map((segment) => ({
      name: segment.name,
      type: segment.type,
      grammar: describeGrammar(segment.grammar),
      ...(segment.description ? { description: segment.description } : {}),
      replace: false,
    })),
  };
}
