/**
 * The contract between published dialects and a matching engine.
 */
import type { GrammarNode, TokenKind } from '../grammar/types.js';

/**
 * A code token. Whitespace and comments never reach the matcher.
 */
export interface Token {
  kind: TokenKind;
  /** Source text of the token, quotes included. */
  raw: string;
  /** Zero-based character offset in the input. */
  offset: number;
}

/** A node of the tree produced by a successful match. */
export type MatchedNode = MatchedToken | MatchedSegment;

export interface MatchedToken {
  kind: 'token';
  /** Type tag from the terminal grammar, e.g. `keyword` or `variable`. */
  type: string;
  /** Name of the terminal grammar that consumed the token. */
  name: string;
  raw: string;
  /** Raw text with any trim characters removed. */
  value: string;
  /** Index of the token in the stream. */
  index: number;
}

export interface MatchedSegment {
  kind: 'segment';
  /** Type tag of the segment definition, e.g. `drop_statement`. */
  type: string;
  /** Registry name of the segment. */
  name: string;
  /** Index of the first token, inclusive. */
  start: number;
  /** Index after the last token. */
  end: number;
  children: MatchedNode[];
}

/**
 * Outcome of one match attempt. A non-match is an ordinary value, not an exception.
 */
export type MatchResult =
  | { ok: true; pos: number; nodes: MatchedNode[] }
  | { ok: false; pos: number; expected: string };

export interface GrammarMatcher {
  /**
   * Match a registry entry (by name) or a grammar node starting at `start`.
   * Throws only for structural problems such as an unresolvable reference.
   */
  match(rule: string | GrammarNode, tokens: readonly Token[], start?: number): MatchResult;

  /**
   * Like `match`, but succeeds only when every token is consumed.
   */
  matchAll(rule: string | GrammarNode, tokens: readonly Token[]): MatchResult;
}
