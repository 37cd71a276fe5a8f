/**
 * Named, case-insensitive keyword membership sets.
 */

/**
 * Callbacks a KeywordSet invokes around mutations.
 * The owning dialect supplies them to enforce publication and exclusive classification.
 */
export interface KeywordSetHooks {
  /** Called before any mutation; throws to reject it. */
  beforeUpdate?(setName: string, keywords: readonly string[]): void;
  /** Called before a removal; throws to reject it. */
  beforeRemove?(setName: string, keywords: readonly string[]): void;
  /** Called after a mutation that was accepted. */
  afterChange?(change: KeywordChange): void;
}

export interface KeywordChange {
  setName: string;
  action: 'update' | 'difference_update';
  keywords: string[];
}

/**
 * Normalize a keyword to its stored form. Returns null for blank input.
 */
export function normalizeKeyword(keyword: string): string | null {
  const trimmed = keyword.trim();
  return trimmed ? trimmed.toUpperCase() : null;
}

/**
 * Normalize a list of keywords, dropping blanks and duplicates while keeping first-seen order.
 */
export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = normalizeKeyword(keyword);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export class KeywordSet {
  private readonly members: Set<string>;

  constructor(
    public readonly name: string,
    members: Iterable<string> = [],
    private readonly hooks: KeywordSetHooks = {}
  ) {
    this.members = new Set(normalizeKeywords(members));
  }

  get size(): number {
    return this.members.size;
  }

  has(keyword: string): boolean {
    const normalized = normalizeKeyword(keyword);
    return normalized !== null && this.members.has(normalized);
  }

  /**
   * Add keywords. Keywords already present are left alone.
   */
  update(keywords: Iterable<string>): this {
    const normalized = normalizeKeywords(keywords);
    this.hooks.beforeUpdate?.(this.name, normalized);
    this.insertAll(normalized);
    this.hooks.afterChange?.({ setName: this.name, action: 'update', keywords: normalized });
    return this;
  }

  /**
   * Remove keywords. Keywords already absent are ignored.
   */
  differenceUpdate(keywords: Iterable<string>): this {
    const normalized = normalizeKeywords(keywords);
    this.hooks.beforeRemove?.(this.name, normalized);
    this.removeAll(normalized);
    this.hooks.afterChange?.({ setName: this.name, action: 'difference_update', keywords: normalized });
    return this;
  }

  /**
   * Sorted copy of the members.
   */
  values(): string[] {
    return [...this.members].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.values()[Symbol.iterator]();
  }

  /**
   * Copy the members into a new set owned by another dialect.
   */
  clone(hooks: KeywordSetHooks = {}): KeywordSet {
    return new KeywordSet(this.name, this.members, hooks);
  }

  /** @internal Unchecked insertion used by atomic promotion. */
  insertAll(keywords: readonly string[]): void {
    for (const keyword of keywords) {
      this.members.add(keyword);
    }
  }

  /** @internal Unchecked removal used by atomic promotion. */
  removeAll(keywords: readonly string[]): void {
    for (const keyword of keywords) {
      this.members.delete(keyword);
    }
  }
}
