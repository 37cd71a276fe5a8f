/**
 * Static checks over a dialect's registry: reference resolution and left recursion.
 *
 * These run when a dialect is published so that a grammar that could never match
 * fails at build time instead of at the first statement.
 */
import type { GrammarNode } from '../grammar/types.js';
import { collectAntiKeywordSets, collectReferences } from '../grammar/walk.js';

/**
 * Read-only view of a registry used by the checks.
 */
export interface GrammarLibrary {
  names(): string[];
  has(name: string): boolean;
  grammar(name: string): GrammarNode;
}

export interface UnresolvedReference {
  /** Registry entry containing the reference. */
  from: string;
  /** Name that could not be resolved. */
  name: string;
}

/**
 * Every reference in the library that names a missing entry.
 */
export function findUnresolvedReferences(library: GrammarLibrary): UnresolvedReference[] {
  const unresolved: UnresolvedReference[] = [];
  for (const entryName of library.names()) {
    const seen = new Set<string>();
    for (const reference of collectReferences(library.grammar(entryName))) {
      if (seen.has(reference.name)) continue;
      seen.add(reference.name);
      if (!library.has(reference.name)) {
        unresolved.push({ from: entryName, name: reference.name });
      }
    }
  }
  return unresolved;
}

/**
 * Keyword set names referenced by patterns that are not in `knownSets`.
 */
export function findUnknownKeywordSets(
  library: GrammarLibrary,
  knownSets: ReadonlySet<string>
): UnresolvedReference[] {
  const unknown: UnresolvedReference[] = [];
  for (const entryName of library.names()) {
    for (const setName of collectAntiKeywordSets(library.grammar(entryName))) {
      if (!knownSets.has(setName)) {
        unknown.push({ from: entryName, name: setName });
      }
    }
  }
  return unknown;
}

/**
 * Entries that can match without consuming a token, found by iterating to a fixpoint.
 */
export function findNullableEntries(library: GrammarLibrary): Set<string> {
  const nullable = new Set<string>();
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of library.names()) {
      if (!nullable.has(name) && canBeEmpty(library.grammar(name), nullable)) {
        nullable.add(name);
        changed = true;
      }
    }
  }
  return nullable;
}

/**
 * Find a left-recursive cycle, returned as the chain of entry names, or null.
 * Assumes every reference resolves.
 */
export function findLeftRecursion(library: GrammarLibrary): string[] | null {
  const nullable = findNullableEntries(library);
  for (const name of library.names()) {
    const cycle = searchLeftCycle(library, nullable, name, [name], new Set());
    if (cycle) return cycle;
  }
  return null;
}

function searchLeftCycle(
  library: GrammarLibrary,
  nullable: ReadonlySet<string>,
  current: string,
  path: string[],
  visited: Set<string>
): string[] | null {
  for (const next of leadingReferences(library.grammar(current), nullable)) {
    if (next === path[0]) {
      return [...path, next];
    }
    if (visited.has(next) || !library.has(next)) continue;
    visited.add(next);
    const cycle = searchLeftCycle(library, nullable, next, [...path, next], visited);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Names that can be matched at the very first token of `node`.
 */
function leadingReferences(node: GrammarNode, nullable: ReadonlySet<string>): string[] {
  switch (node.type) {
    case 'ref':
      return [node.name];
    case 'sequence':
      return leadingInOrder(node.children, nullable);
    case 'oneOf':
    case 'anyNumberOf':
    case 'delimited':
      return node.children.flatMap((child) => leadingReferences(child, nullable));
    case 'bracketed':
      return node.bracketOptional ? leadingInOrder(node.children, nullable) : [];
    default:
      return [];
  }
}

function leadingInOrder(children: readonly GrammarNode[], nullable: ReadonlySet<string>): string[] {
  const names: string[] = [];
  for (const child of children) {
    names.push(...leadingReferences(child, nullable));
    if (!canBeEmpty(child, nullable)) break;
  }
  return names;
}

function canBeEmpty(node: GrammarNode, nullable: ReadonlySet<string>): boolean {
  if (node.optional) return true;
  switch (node.type) {
    case 'ref':
      return nullable.has(node.name);
    case 'anyNumberOf':
      return node.min === 0 || node.children.some((child) => canBeEmpty(child, nullable));
    case 'sequence':
      return node.children.every((child) => canBeEmpty(child, nullable));
    case 'oneOf':
      return node.children.some((child) => canBeEmpty(child, nullable));
    case 'bracketed':
      return node.bracketOptional && node.children.every((child) => canBeEmpty(child, nullable));
    case 'delimited':
      return node.minDelimiters === 0 && node.children.some((child) => canBeEmpty(child, nullable));
    default:
      return false;
  }
}
