/**
 * Reference matching engine over published dialects.
 *
 * PEG-style evaluation with these fixed rules:
 * - sequence: children in order, all-or-nothing; optional children may be skipped
 * - oneOf: the longest successful alternative wins; ties go to the first declared
 * - anyNumberOf: greedy rounds, each taking the longest alternative, until no progress
 * - bracketed: open bracket, content as a sequence, then the matching close bracket
 * - delimited: a trailing delimiter is left unconsumed unless allowed
 */
import { DialectError, GrammarError, ErrorCodes } from '../../utils/errors.js';
import { ref } from '../grammar/builders.js';
import { BRACKET_PAIRS, type GrammarNode, type PatternNode } from '../grammar/types.js';
import type { Dialect } from '../dialect/dialect.js';
import type { GrammarMatcher, MatchedNode, MatchResult, Token } from './types.js';

export interface MatcherOptions {
  /** Maximum reference nesting before matching aborts. */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 200;

interface MatchState {
  tokens: readonly Token[];
  depth: number;
}

type Success = Extract<MatchResult, { ok: true }>;

function ok(pos: number, nodes: MatchedNode[]): MatchResult {
  return { ok: true, pos, nodes };
}

function fail(pos: number, expected: string): MatchResult {
  return { ok: false, pos, expected };
}

/**
 * Pick the result to report among several: the longest success, ties going to the
 * earliest candidate; without a success, the failure that got furthest.
 */
function best(results: MatchResult[]): MatchResult {
  let winner: Success | null = null;
  for (const result of results) {
    if (result.ok && (winner === null || result.pos > winner.pos)) {
      winner = result;
    }
  }
  if (winner) return winner;

  const furthest = Math.max(...results.map((r) => r.pos));
  const expected = results
    .filter((r): r is Extract<MatchResult, { ok: false }> => !r.ok && r.pos === furthest)
    .map((r) => r.expected);
  return fail(furthest, [...new Set(expected)].join(' or '));
}

function trim(raw: string, trimChars: readonly string[] | undefined): string {
  if (!trimChars || trimChars.length === 0) return raw;
  let start = 0;
  let end = raw.length;
  let changed = true;
  while (changed) {
    changed = false;
    for (const chars of trimChars) {
      if (end - start >= chars.length && raw.startsWith(chars, start)) {
        start += chars.length;
        changed = true;
      }
      if (end - start >= chars.length && raw.endsWith(chars, end)) {
        end -= chars.length;
        changed = true;
      }
    }
  }
  return raw.slice(start, end);
}

export class PegMatcher implements GrammarMatcher {
  private readonly maxDepth: number;
  private readonly patterns = new WeakMap<PatternNode, RegExp>();

  constructor(
    private readonly dialect: Dialect,
    options: MatcherOptions = {}
  ) {
    if (!dialect.isPublished) {
      throw new DialectError(
        ErrorCodes.DIALECT_NOT_PUBLISHED,
        `Dialect '${dialect.name}' must be published before matching`,
        { dialect: dialect.name }
      );
    }
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  match(rule: string | GrammarNode, tokens: readonly Token[], start = 0): MatchResult {
    const node = typeof rule === 'string' ? ref(rule) : rule;
    return this.matchNode(node, start, { tokens, depth: 0 });
  }

  matchAll(rule: string | GrammarNode, tokens: readonly Token[]): MatchResult {
    const result = this.match(rule, tokens, 0);
    if (result.ok && result.pos !== tokens.length) {
      return fail(result.pos, 'end of input');
    }
    return result;
  }

  private matchNode(node: GrammarNode, pos: number, state: MatchState): MatchResult {
    if ('exclude' in node && node.exclude) {
      const excluded = this.matchNode(node.exclude, pos, state);
      if (excluded.ok) {
        return fail(pos, `anything but ${describeExpected(node.exclude)}`);
      }
    }

    switch (node.type) {
      case 'keyword':
      case 'symbol':
      case 'pattern':
      case 'namedToken':
        return this.matchTerminal(node, pos, state);
      case 'ref':
        return this.matchReference(node.name, pos, state);
      case 'sequence':
        return this.matchInOrder(node.children, pos, state);
      case 'oneOf':
        return this.matchLongest(node.children, pos, state);
      case 'anyNumberOf':
        return this.matchRepeated(node.children, node.min, node.max, pos, state);
      case 'bracketed':
        return this.matchBracketed(node, pos, state);
      case 'delimited':
        return this.matchDelimited(node, pos, state);
    }
  }

  private matchTerminal(
    node: Extract<GrammarNode, { type: 'keyword' | 'symbol' | 'pattern' | 'namedToken' }>,
    pos: number,
    state: MatchState
  ): MatchResult {
    const token = state.tokens[pos];
    const expected = describeExpected(node);
    if (!token) return fail(pos, expected);

    let matched: boolean;
    let name: string;
    let trimChars: readonly string[] | undefined;
    switch (node.type) {
      case 'keyword':
        matched = token.kind === 'word' && token.raw.toUpperCase() === node.value;
        name = node.value.toLowerCase();
        break;
      case 'symbol':
        matched = token.raw === node.value;
        name = node.name;
        break;
      case 'pattern':
        matched =
          this.compile(node).test(token.raw) &&
          !(node.antiKeywordSet && this.dialect.isKeyword(token.raw, node.antiKeywordSet));
        name = node.name;
        trimChars = node.trimChars;
        break;
      case 'namedToken':
        matched = token.kind === node.tokenKind;
        name = node.name;
        trimChars = node.trimChars;
        break;
    }

    if (!matched) return fail(pos, expected);
    return ok(pos + 1, [
      {
        kind: 'token',
        type: node.segmentType,
        name,
        raw: token.raw,
        value: trim(token.raw, trimChars),
        index: pos,
      },
    ]);
  }

  private matchReference(name: string, pos: number, state: MatchState): MatchResult {
    const entry = this.dialect.entry(name);
    if (state.depth >= this.maxDepth) {
      throw new GrammarError(
        ErrorCodes.MAX_DEPTH_EXCEEDED,
        `Maximum grammar depth (${this.maxDepth}) exceeded while matching '${name}'`,
        { name, maxDepth: this.maxDepth, position: pos }
      );
    }

    const grammar = entry.kind === 'segment' ? entry.definition.grammar : entry.grammar;
    state.depth++;
    let result: MatchResult;
    try {
      result = this.matchNode(grammar, pos, state);
    } finally {
      state.depth--;
    }

    if (!result.ok || entry.kind === 'fragment') return result;
    return ok(result.pos, [
      {
        kind: 'segment',
        type: entry.definition.type,
        name,
        start: pos,
        end: result.pos,
        children: result.nodes,
      },
    ]);
  }

  private matchInOrder(children: readonly GrammarNode[], pos: number, state: MatchState): MatchResult {
    const nodes: MatchedNode[] = [];
    let current = pos;
    for (const child of children) {
      const result = this.matchNode(child, current, state);
      if (result.ok) {
        nodes.push(...result.nodes);
        current = result.pos;
      } else if (!child.optional) {
        return result;
      }
    }
    return ok(current, nodes);
  }

  private matchLongest(children: readonly GrammarNode[], pos: number, state: MatchState): MatchResult {
    return best(children.map((child) => this.matchNode(child, pos, state)));
  }

  private matchRepeated(
    children: readonly GrammarNode[],
    min: number,
    max: number | null,
    pos: number,
    state: MatchState
  ): MatchResult {
    const nodes: MatchedNode[] = [];
    let current = pos;
    let count = 0;
    let lastFailure: MatchResult | null = null;

    while (max === null || count < max) {
      const result = this.matchLongest(children, current, state);
      if (!result.ok) {
        lastFailure = result;
        break;
      }
      if (result.pos === current) break;
      nodes.push(...result.nodes);
      current = result.pos;
      count++;
    }

    if (count < min) {
      return lastFailure ?? fail(current, `at least ${min} repetition(s)`);
    }
    return ok(current, nodes);
  }

  private matchBracketed(
    node: Extract<GrammarNode, { type: 'bracketed' }>,
    pos: number,
    state: MatchState
  ): MatchResult {
    const [open, close] = BRACKET_PAIRS[node.bracketPair];
    const candidates: MatchResult[] = [this.matchWithBrackets(node.children, open, close, pos, state)];
    if (node.bracketOptional) {
      candidates.push(this.matchInOrder(node.children, pos, state));
    }
    return best(candidates);
  }

  private matchWithBrackets(
    children: readonly GrammarNode[],
    open: string,
    close: string,
    pos: number,
    state: MatchState
  ): MatchResult {
    const first = state.tokens[pos];
    if (!first || first.kind !== 'symbol' || first.raw !== open) {
      return fail(pos, `'${open}'`);
    }
    const content = this.matchInOrder(children, pos + 1, state);
    if (!content.ok) return content;
    const last = state.tokens[content.pos];
    if (!last || last.kind !== 'symbol' || last.raw !== close) {
      return fail(content.pos, `'${close}'`);
    }
    const end = content.pos + 1;
    return ok(end, [
      {
        kind: 'segment',
        type: 'bracketed',
        name: 'bracketed',
        start: pos,
        end,
        children: [
          { kind: 'token', type: 'start_bracket', name: open, raw: open, value: open, index: pos },
          ...content.nodes,
          { kind: 'token', type: 'end_bracket', name: close, raw: close, value: close, index: content.pos },
        ],
      },
    ]);
  }

  private matchDelimited(
    node: Extract<GrammarNode, { type: 'delimited' }>,
    pos: number,
    state: MatchState
  ): MatchResult {
    const first = this.matchLongest(node.children, pos, state);
    if (!first.ok) return first;

    const nodes = [...first.nodes];
    let current = first.pos;
    let delimiters = 0;

    for (;;) {
      const delimiter = this.matchNode(node.delimiter, current, state);
      if (!delimiter.ok || delimiter.pos === current) break;
      const element = this.matchLongest(node.children, delimiter.pos, state);
      if (!element.ok) {
        if (node.allowTrailing) {
          nodes.push(...delimiter.nodes);
          current = delimiter.pos;
          delimiters++;
        }
        break;
      }
      nodes.push(...delimiter.nodes, ...element.nodes);
      current = element.pos;
      delimiters++;
    }

    if (delimiters < node.minDelimiters) {
      return fail(current, `at least ${node.minDelimiters} delimiter(s)`);
    }
    return ok(current, nodes);
  }

  private compile(node: PatternNode): RegExp {
    let compiled = this.patterns.get(node);
    if (!compiled) {
      compiled = new RegExp(`^(?:${node.source})$`, node.flags);
      this.patterns.set(node, compiled);
    }
    return compiled;
  }
}

function describeExpected(node: GrammarNode): string {
  switch (node.type) {
    case 'keyword':
      return node.value;
    case 'symbol':
      return `'${node.value}'`;
    case 'pattern':
    case 'namedToken':
      return node.name;
    case 'ref':
      return node.name;
    default:
      return node.type;
  }
}

/**
 * Flatten a match tree into the raw tokens it covers.
 */
export function matchedTokens(nodes: readonly MatchedNode[]): string[] {
  return nodes.flatMap((node) => (node.kind === 'token' ? [node.raw] : matchedTokens(node.children)));
}
