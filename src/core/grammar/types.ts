/**
 * Grammar node definitions.
 *
 * Nodes are frozen plain objects discriminated by `type`. They hold no behaviour:
 * matching engines interpret them, and the constructors in builders.ts validate them.
 */

/** Token kinds produced by a lexer and consumed by `namedToken` nodes. */
export const TOKEN_KINDS = [
  'word',
  'number',
  'symbol',
  'single_quote',
  'double_quote',
  'bracket_quote',
] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];

export type BracketPair = 'round' | 'square' | 'curly';

export const BRACKET_PAIRS: Readonly<Record<BracketPair, readonly [string, string]>> = {
  round: ['(', ')'],
  square: ['[', ']'],
  curly: ['{', '}'],
};

interface NodeBase {
  /** Whether a containing sequence may skip this node. */
  readonly optional: boolean;
}

interface CompositeBase extends NodeBase {
  readonly children: readonly GrammarNode[];
  /** When set, the node fails wherever this grammar matches at the start position. */
  readonly exclude?: GrammarNode;
}

/** A case-insensitive keyword such as `DROP`. */
export interface KeywordNode extends NodeBase {
  readonly type: 'keyword';
  readonly value: string;
  readonly segmentType: string;
}

/** An exact raw token such as `+=`. */
export interface SymbolNode extends NodeBase {
  readonly type: 'symbol';
  readonly value: string;
  readonly name: string;
  readonly segmentType: string;
}

/** A regular expression that must match a whole token. */
export interface PatternNode extends NodeBase {
  readonly type: 'pattern';
  readonly source: string;
  readonly flags: string;
  readonly name: string;
  readonly segmentType: string;
  /** Keyword set whose members this pattern refuses to match. */
  readonly antiKeywordSet?: string;
  /** Characters stripped from both ends of the matched value. */
  readonly trimChars?: readonly string[];
}

/** Any token of a given lexer kind. */
export interface NamedTokenNode extends NodeBase {
  readonly type: 'namedToken';
  readonly tokenKind: TokenKind;
  readonly name: string;
  readonly segmentType: string;
  readonly trimChars?: readonly string[];
}

/** A by-name pointer into the dialect registry, resolved when matching. */
export interface RefNode extends NodeBase {
  readonly type: 'ref';
  readonly name: string;
  readonly exclude?: GrammarNode;
}

export interface SequenceNode extends CompositeBase {
  readonly type: 'sequence';
  /** Name of the suffix wrapper that produced this sequence, if any. */
  readonly wrapper?: string;
}

export interface OneOfNode extends CompositeBase {
  readonly type: 'oneOf';
}

export interface AnyNumberOfNode extends CompositeBase {
  readonly type: 'anyNumberOf';
  readonly min: number;
  /** Upper bound on repetitions; null means unbounded. */
  readonly max: number | null;
}

export interface BracketedNode extends CompositeBase {
  readonly type: 'bracketed';
  readonly bracketPair: BracketPair;
  /** When true the content may also appear without brackets. */
  readonly bracketOptional: boolean;
}

export interface DelimitedNode extends CompositeBase {
  readonly type: 'delimited';
  readonly delimiter: GrammarNode;
  readonly allowTrailing: boolean;
  readonly minDelimiters: number;
}

export type TerminalNode = KeywordNode | SymbolNode | PatternNode | NamedTokenNode;

export type CompositeNode =
  | SequenceNode
  | OneOfNode
  | AnyNumberOfNode
  | BracketedNode
  | DelimitedNode;

export type GrammarNode = TerminalNode | RefNode | CompositeNode;

export type GrammarNodeType = GrammarNode['type'];

/** Anything accepted where a child grammar is expected; strings become keywords. */
export type GrammarInput = GrammarNode | string;

export function isCompositeNode(node: GrammarNode): node is CompositeNode {
  return 'children' in node;
}
