/**
 * Traversal helpers over grammar trees.
 */
import type { GrammarNode, RefNode } from './types.js';

/**
 * Direct child grammars of a node, including exclusions and delimiters.
 */
export function childNodes(node: GrammarNode): GrammarNode[] {
  const result: GrammarNode[] = [];
  if ('children' in node) {
    result.push(...node.children);
  }
  if (node.type === 'delimited') {
    result.push(node.delimiter);
  }
  if ((node.type === 'ref' || 'children' in node) && node.exclude) {
    result.push(node.exclude);
  }
  return result;
}

/**
 * Depth-first pre-order walk. Returning false from the visitor skips the node's children.
 */
export function walkGrammar(
  node: GrammarNode,
  visit: (node: GrammarNode, depth: number) => boolean | void,
  depth = 0
): void {
  if (visit(node, depth) === false) return;
  for (const child of childNodes(node)) {
    walkGrammar(child, visit, depth + 1);
  }
}

/**
 * All references in a grammar tree, in walk order (duplicates kept).
 */
export function collectReferences(node: GrammarNode): RefNode[] {
  const refs: RefNode[] = [];
  walkGrammar(node, (current) => {
    if (current.type === 'ref') refs.push(current);
  });
  return refs;
}

/**
 * Names of keyword sets that patterns in the tree exclude.
 */
export function collectAntiKeywordSets(node: GrammarNode): string[] {
  const names = new Set<string>();
  walkGrammar(node, (current) => {
    if (current.type === 'pattern' && current.antiKeywordSet) {
      names.add(current.antiKeywordSet);
    }
  });
  return [...names];
}

/**
 * Canonical string for a grammar tree. Two trees with the same key are structurally equal.
 */
export function grammarKey(node: GrammarNode): string {
  return canonicalJson(node);
}

export function grammarEquals(a: GrammarNode, b: GrammarNode): boolean {
  return grammarKey(a) === grammarKey(b);
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}
