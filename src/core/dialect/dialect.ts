/**
 * Dialects: keyword sets plus a registry of named grammar fragments and segments.
 *
 * A dialect is built by ordinary calls, then published. Publication resolves every
 * reference against the finished registry and seals the dialect; derived dialects are full
 * value copies made with `copyAs`, never lookups that fall through to a parent.
 */
import { DialectError, GrammarError, KeywordError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { toNode } from '../grammar/builders.js';
import type { GrammarInput, GrammarNode } from '../grammar/types.js';
import { KeywordSet, normalizeKeywords, type KeywordChange, type KeywordSetHooks } from '../keywords/keyword-set.js';
import {
  findLeftRecursion,
  findUnknownKeywordSets,
  findUnresolvedReferences,
  type GrammarLibrary,
  type UnresolvedReference,
} from './resolver.js';
import { assertRegistryName, type SegmentDefinition } from './segment.js';

export const RESERVED_KEYWORDS = 'reserved_keywords';
export const UNRESERVED_KEYWORDS = 'unreserved_keywords';

/** Keyword sets that may not share members unless a keyword is demoted first. */
export const DEFAULT_EXCLUSIVE_GROUPS: readonly (readonly string[])[] = [
  [RESERVED_KEYWORDS, UNRESERVED_KEYWORDS],
];

export type RegistryEntry =
  | { readonly kind: 'fragment'; readonly name: string; readonly grammar: GrammarNode }
  | { readonly kind: 'segment'; readonly name: string; readonly definition: SegmentDefinition };

export type RegistryEntryKind = RegistryEntry['kind'];

/** One recorded change to a dialect, in the order it was made. */
export type DialectEdit =
  | { readonly op: 'derive'; readonly from: string }
  | { readonly op: 'keywords.update' | 'keywords.difference_update'; readonly set: string; readonly keywords: readonly string[] }
  | { readonly op: 'keywords.promote'; readonly from: string; readonly to: string; readonly keywords: readonly string[] }
  | { readonly op: 'add' | 'register' | 'replace'; readonly kind: RegistryEntryKind; readonly name: string };

export interface DialectOptions {
  /** Groups of keyword sets whose members must stay disjoint. */
  exclusiveKeywordGroups?: readonly (readonly string[])[];
  /** Initial keyword sets by name. */
  keywordSets?: Record<string, Iterable<string>>;
}

export interface ReplaceOptions {
  /** Replace an existing entry instead of adding a new one. */
  replace?: boolean;
}

export class Dialect implements GrammarLibrary {
  private readonly keywordSets = new Map<string, KeywordSet>();
  private readonly library = new Map<string, RegistryEntry>();
  private readonly exclusiveGroups: readonly (readonly string[])[];
  private readonly edits: DialectEdit[] = [];
  private published = false;
  private parentDialect?: Dialect;

  constructor(
    public readonly name: string,
    options: DialectOptions = {}
  ) {
    if (!name.trim()) {
      throw new DialectError(ErrorCodes.UNKNOWN_DIALECT, 'Dialect name must not be empty');
    }
    this.exclusiveGroups = (options.exclusiveKeywordGroups ?? DEFAULT_EXCLUSIVE_GROUPS).map((group) =>
      Object.freeze([...group])
    );
    for (const [setName, members] of Object.entries(options.keywordSets ?? {})) {
      this.keywords(setName).update(members);
    }
    this.edits.length = 0;
  }

  /** The dialect this one was copied from. Used for diagnostics only. */
  get parent(): Dialect | undefined {
    return this.parentDialect;
  }

  get exclusiveKeywordGroups(): readonly (readonly string[])[] {
    return this.exclusiveGroups;
  }

  get isPublished(): boolean {
    return this.published;
  }

  /** Edits applied to this dialect since it was created or derived. */
  get history(): readonly DialectEdit[] {
    return [...this.edits];
  }

  // ---------------------------------------------------------------------------
  // Keywords
  // ---------------------------------------------------------------------------

  /**
   * Get a keyword set by name, creating an empty one while the dialect is unpublished.
   */
  keywords(setName: string): KeywordSet {
    const existing = this.keywordSets.get(setName);
    if (existing) return existing;
    this.assertMutable(`create keyword set '${setName}'`);
    const created = new KeywordSet(setName, [], this.keywordHooks());
    this.keywordSets.set(setName, created);
    return created;
  }

  hasKeywordSet(setName: string): boolean {
    return this.keywordSets.has(setName);
  }

  keywordSetNames(): string[] {
    return [...this.keywordSets.keys()];
  }

  /**
   * Whether `word` is a member of the named set. Missing sets contain nothing.
   */
  isKeyword(word: string, setName: string = RESERVED_KEYWORDS): boolean {
    return this.keywordSets.get(setName)?.has(word) ?? false;
  }

  /**
   * Move keywords from one set to another in a single step.
   * Keywords missing from `from` are still added to `to`; repeating a promotion is a no-op.
   */
  promoteKeywords(from: string, to: string, keywords: Iterable<string>): this {
    this.assertMutable(`promote keywords from '${from}' to '${to}'`);
    const normalized = normalizeKeywords(keywords);
    const source = this.keywords(from);
    const target = this.keywords(to);
    this.assertClassification(to, normalized, new Set([from]));
    source.removeAll(normalized);
    target.insertAll(normalized);
    this.record({ op: 'keywords.promote', from, to, keywords: normalized });
    return this;
  }

  private keywordHooks(): KeywordSetHooks {
    return {
      beforeUpdate: (setName: string, keywords: readonly string[]) => {
        this.assertMutable(`update keyword set '${setName}'`);
        this.assertClassification(setName, keywords, new Set());
      },
      beforeRemove: (setName: string) => {
        this.assertMutable(`update keyword set '${setName}'`);
      },
      afterChange: (change: KeywordChange) => {
        this.record({
          op: change.action === 'update' ? 'keywords.update' : 'keywords.difference_update',
          set: change.setName,
          keywords: change.keywords,
        });
      },
    };
  }

  /**
   * Reject keywords that would end up in two sets of the same exclusive group.
   */
  private assertClassification(setName: string, keywords: readonly string[], ignoring: ReadonlySet<string>): void {
    for (const group of this.exclusiveGroups) {
      if (!group.includes(setName)) continue;
      for (const other of group) {
        if (other === setName || ignoring.has(other)) continue;
        const otherSet = this.keywordSets.get(other);
        if (!otherSet) continue;
        const conflicts = keywords.filter((keyword) => otherSet.has(keyword));
        if (conflicts.length > 0) {
          throw new KeywordError(
            ErrorCodes.INVALID_KEYWORD_CLASSIFICATION,
            `Cannot add ${conflicts.join(', ')} to '${setName}' in dialect '${this.name}': ` +
              `already in mutually exclusive set '${other}'. Remove them from '${other}' first.`,
            { dialect: this.name, set: setName, conflictingSet: other, keywords: conflicts }
          );
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  /**
   * Add named grammar fragments. With `replace`, every name must already exist.
   * All names are checked before any is inserted.
   */
  add(fragments: Record<string, GrammarInput>, options: ReplaceOptions = {}): this {
    const entries = Object.entries(fragments);
    this.assertMutable(`add ${entries.map(([name]) => `'${name}'`).join(', ')}`);
    const prepared = entries.map(([name, grammar]): RegistryEntry => {
      assertRegistryName(name);
      this.assertAvailability(name, options.replace ?? false);
      const entry: RegistryEntry = { kind: 'fragment', name, grammar: toNode(grammar) };
      return Object.freeze(entry);
    });
    for (const entry of prepared) {
      this.store(entry, options.replace ?? false);
    }
    return this;
  }

  /**
   * Register a segment. With `replace`, the segment must already exist and is replaced whole.
   */
  register(definition: SegmentDefinition, options: ReplaceOptions = {}): this {
    this.assertMutable(`register '${definition.name}'`);
    assertRegistryName(definition.name);
    this.assertAvailability(definition.name, options.replace ?? false);
    const entry: RegistryEntry = { kind: 'segment', name: definition.name, definition };
    this.store(Object.freeze(entry), options.replace ?? false);
    return this;
  }

  has(name: string): boolean {
    return this.library.has(name);
  }

  /** Registry names in insertion order. */
  names(): string[] {
    return [...this.library.keys()];
  }

  entry(name: string): RegistryEntry {
    const found = this.library.get(name);
    if (!found) {
      throw new DialectError(
        ErrorCodes.UNKNOWN_SEGMENT,
        `'${name}' is not defined in dialect '${this.name}'`,
        { dialect: this.name, name }
      );
    }
    return found;
  }

  segment(name: string): SegmentDefinition {
    const found = this.entry(name);
    if (found.kind !== 'segment') {
      throw new DialectError(
        ErrorCodes.UNKNOWN_SEGMENT,
        `'${name}' in dialect '${this.name}' is a grammar fragment, not a segment`,
        { dialect: this.name, name }
      );
    }
    return found.definition;
  }

  /** The grammar of a fragment, or the match grammar of a segment. */
  grammar(name: string): GrammarNode {
    const found = this.entry(name);
    return found.kind === 'segment' ? found.definition.grammar : found.grammar;
  }

  segments(): SegmentDefinition[] {
    const result: SegmentDefinition[] = [];
    for (const entry of this.library.values()) {
      if (entry.kind === 'segment') result.push(entry.definition);
    }
    return result;
  }

  fragments(): Array<{ name: string; grammar: GrammarNode }> {
    const result: Array<{ name: string; grammar: GrammarNode }> = [];
    for (const entry of this.library.values()) {
      if (entry.kind === 'fragment') result.push({ name: entry.name, grammar: entry.grammar });
    }
    return result;
  }

  private assertAvailability(name: string, replace: boolean): void {
    const exists = this.library.has(name);
    if (exists && !replace) {
      throw new DialectError(
        ErrorCodes.DUPLICATE_DEFINITION,
        `'${name}' is already defined in dialect '${this.name}'; pass { replace: true } to redefine it`,
        { dialect: this.name, name }
      );
    }
    if (!exists && replace) {
      throw new DialectError(
        ErrorCodes.UNKNOWN_SEGMENT,
        `Cannot replace '${name}': it is not defined in dialect '${this.name}'`,
        { dialect: this.name, name }
      );
    }
  }

  private store(entry: RegistryEntry, replace: boolean): void {
    const previous = this.library.get(entry.name);
    this.library.set(entry.name, entry);
    if (replace) {
      if (previous && previous.kind !== entry.kind) {
        log.debug(`'${entry.name}' changed from ${previous.kind} to ${entry.kind}`, { dialect: this.name });
      }
      log.debug(`Replaced '${entry.name}'`, { dialect: this.name });
      this.record({ op: 'replace', kind: entry.kind, name: entry.name });
    } else {
      this.record({ op: entry.kind === 'segment' ? 'register' : 'add', kind: entry.kind, name: entry.name });
    }
  }

  // ---------------------------------------------------------------------------
  // Derivation and publication
  // ---------------------------------------------------------------------------

  /**
   * Copy this dialect under a new name. The copy is unpublished and fully independent.
   */
  copyAs(name: string): Dialect {
    const copy = new Dialect(name, { exclusiveKeywordGroups: this.exclusiveGroups });
    for (const [setName, set] of this.keywordSets) {
      copy.keywordSets.set(setName, set.clone(copy.keywordHooks()));
    }
    for (const [entryName, entry] of this.library) {
      copy.library.set(entryName, entry);
    }
    copy.parentDialect = this;
    copy.record({ op: 'derive', from: this.name });
    log.debug(`Derived from '${this.name}'`, { dialect: name });
    return copy;
  }

  /**
   * References that do not resolve in this dialect's registry.
   */
  unresolvedReferences(): UnresolvedReference[] {
    return findUnresolvedReferences(this);
  }

  /**
   * Resolve every reference and seal the dialect. Calling it again is a no-op.
   */
  publish(): this {
    if (this.published) return this;

    const unresolved = this.unresolvedReferences();
    if (unresolved.length > 0) {
      throw new DialectError(
        ErrorCodes.UNKNOWN_SEGMENT,
        `Dialect '${this.name}' has ${unresolved.length} unresolved reference(s): ` +
          unresolved.map((r) => `'${r.name}' (in ${r.from})`).join(', '),
        { dialect: this.name, unresolved }
      );
    }

    const unknownSets = findUnknownKeywordSets(this, new Set(this.keywordSets.keys()));
    if (unknownSets.length > 0) {
      throw new GrammarError(
        ErrorCodes.MALFORMED_GRAMMAR,
        `Dialect '${this.name}' has patterns excluding unknown keyword set(s): ` +
          unknownSets.map((r) => `'${r.name}' (in ${r.from})`).join(', '),
        { dialect: this.name, unknownSets }
      );
    }

    const cycle = findLeftRecursion(this);
    if (cycle) {
      throw new GrammarError(
        ErrorCodes.MALFORMED_GRAMMAR,
        `Dialect '${this.name}' has a left-recursive rule: ${cycle.join(' -> ')}`,
        { dialect: this.name, cycle }
      );
    }

    this.published = true;
    log.debug(`Published with ${this.library.size} entries`, { dialect: this.name });
    return this;
  }

  private assertMutable(action: string): void {
    if (this.published) {
      throw new DialectError(
        ErrorCodes.DIALECT_PUBLISHED,
        `Cannot ${action}: dialect '${this.name}' is published. Derive a new dialect with copyAs() instead.`,
        { dialect: this.name }
      );
    }
  }

  private record(edit: DialectEdit): void {
    this.edits.push(edit);
  }
}

/**
 * Derive a new dialect from `base`. Equivalent to `base.copyAs(name)`.
 */
export function deriveDialect(base: Dialect, name: string): Dialect {
  return base.copyAs(name);
}
