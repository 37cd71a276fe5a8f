/**
 * Grammar node constructors.
 *
 * Each constructor validates its configuration and returns a frozen node. Structural
 * mistakes surface here, at dialect build time, rather than while matching text.
 */
import { GrammarError, ErrorCodes } from '../../utils/errors.js';
import {
  BRACKET_PAIRS,
  TOKEN_KINDS,
  type AnyNumberOfNode,
  type BracketPair,
  type BracketedNode,
  type DelimitedNode,
  type GrammarInput,
  type GrammarNode,
  type KeywordNode,
  type NamedTokenNode,
  type OneOfNode,
  type PatternNode,
  type RefNode,
  type SequenceNode,
  type SymbolNode,
  type TokenKind,
} from './types.js';
import { grammarKey } from './walk.js';

export interface NodeOptions {
  optional?: boolean;
}

export interface CompositeOptions extends NodeOptions {
  exclude?: GrammarInput;
}

export interface KeywordOptions extends NodeOptions {
  segmentType?: string;
}

export interface SymbolOptions extends NodeOptions {
  name?: string;
  segmentType?: string;
}

export interface PatternOptions extends NodeOptions {
  name: string;
  /** Flags for a pattern given as a string source. */
  flags?: string;
  segmentType?: string;
  antiKeywordSet?: string;
  trimChars?: readonly string[];
}

export interface NamedTokenOptions extends NodeOptions {
  name?: string;
  segmentType?: string;
  trimChars?: readonly string[];
}

export interface RefOptions extends NodeOptions {
  exclude?: GrammarInput;
}

export interface SequenceOptions extends CompositeOptions {
  wrapper?: string;
}

export interface AnyNumberOfOptions extends CompositeOptions {
  min?: number;
  max?: number | null;
}

export interface BracketedOptions extends CompositeOptions {
  bracketPair?: BracketPair;
}

export interface DelimitedOptions extends CompositeOptions {
  delimiter?: GrammarInput;
  allowTrailing?: boolean;
  minDelimiters?: number;
}

const STATEFUL_REGEX_FLAGS = /[gy]/;

function malformed(message: string, details?: Record<string, unknown>): never {
  throw new GrammarError(ErrorCodes.MALFORMED_GRAMMAR, message, details);
}

function freezeNode<T extends GrammarNode>(node: T): T {
  return Object.freeze(node);
}

function withExclude<T extends { exclude?: GrammarNode }>(node: T, exclude: GrammarInput | undefined): T {
  return exclude === undefined ? node : { ...node, exclude: toNode(exclude) };
}

function checkTrimChars(trimChars: readonly string[] | undefined, owner: string): readonly string[] | undefined {
  if (trimChars === undefined) return undefined;
  if (trimChars.some((c) => c.length === 0)) {
    malformed(`Empty trim character on '${owner}'`, { owner });
  }
  return Object.freeze([...trimChars]);
}

/**
 * Coerce a grammar input to a node. Strings become keywords.
 */
export function toNode(input: GrammarInput): GrammarNode {
  return typeof input === 'string' ? keyword(input) : input;
}

function toChildren(inputs: readonly GrammarInput[], combinator: string): readonly GrammarNode[] {
  if (inputs.length === 0) {
    malformed(`${combinator} requires at least one child`, { combinator });
  }
  return Object.freeze(inputs.map(toNode));
}

/**
 * Alternatives must be required and distinct so that the longest-match,
 * first-declared tie-break always has a single winner.
 */
function checkAlternatives(children: readonly GrammarNode[], combinator: string): void {
  const seen = new Map<string, number>();
  children.forEach((child, index) => {
    if (child.optional) {
      throw new GrammarError(
        ErrorCodes.AMBIGUOUS_ALTERNATIVE,
        `${combinator} alternative #${index + 1} is marked optional; mark the ${combinator} optional instead`,
        { combinator, index }
      );
    }
    const key = grammarKey(child);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new GrammarError(
        ErrorCodes.AMBIGUOUS_ALTERNATIVE,
        `${combinator} alternatives #${previous + 1} and #${index + 1} are identical`,
        { combinator, indices: [previous, index] }
      );
    }
    seen.set(key, index);
  });
}

export function keyword(value: string, options: KeywordOptions = {}): KeywordNode {
  const word = value.trim();
  if (!word || /\s/.test(word)) {
    malformed(`Invalid keyword '${value}': keywords are single non-empty words`, { value });
  }
  return freezeNode({
    type: 'keyword',
    value: word.toUpperCase(),
    segmentType: options.segmentType ?? 'keyword',
    optional: options.optional ?? false,
  });
}

export function symbol(value: string, options: SymbolOptions = {}): SymbolNode {
  if (!value || /\s/.test(value)) {
    malformed(`Invalid symbol '${value}'`, { value });
  }
  return freezeNode({
    type: 'symbol',
    value,
    name: options.name ?? value,
    segmentType: options.segmentType ?? 'symbol',
    optional: options.optional ?? false,
  });
}

export function pattern(regex: string | RegExp, options: PatternOptions): PatternNode {
  const source = typeof regex === 'string' ? regex : regex.source;
  const flags = typeof regex === 'string' ? options.flags ?? '' : regex.flags;
  if (!options.name) {
    malformed(`Pattern /${source}/ needs a name`, { source });
  }
  if (!source) {
    malformed(`Pattern '${options.name}' has an empty expression`, { name: options.name });
  }
  if (STATEFUL_REGEX_FLAGS.test(flags)) {
    malformed(`Pattern '${options.name}' uses stateful flags '${flags}'`, { name: options.name, flags });
  }
  try {
    new RegExp(source, flags);
  } catch (error) {
    malformed(`Pattern '${options.name}' is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`, {
      name: options.name,
      source,
    });
  }
  const node: PatternNode = {
    type: 'pattern',
    source,
    flags,
    name: options.name,
    segmentType: options.segmentType ?? options.name,
    optional: options.optional ?? false,
  };
  const trimChars = checkTrimChars(options.trimChars, options.name);
  return freezeNode({
    ...node,
    ...(options.antiKeywordSet ? { antiKeywordSet: options.antiKeywordSet } : {}),
    ...(trimChars ? { trimChars } : {}),
  });
}

export function namedToken(tokenKind: TokenKind, options: NamedTokenOptions = {}): NamedTokenNode {
  if (!TOKEN_KINDS.includes(tokenKind)) {
    malformed(`Unknown token kind '${tokenKind}'`, { tokenKind, known: TOKEN_KINDS });
  }
  const name = options.name ?? tokenKind;
  const trimChars = checkTrimChars(options.trimChars, name);
  return freezeNode({
    type: 'namedToken',
    tokenKind,
    name,
    segmentType: options.segmentType ?? name,
    optional: options.optional ?? false,
    ...(trimChars ? { trimChars } : {}),
  });
}

export function ref(name: string, options: RefOptions = {}): RefNode {
  if (!name.trim()) {
    malformed('Reference name must not be empty');
  }
  return freezeNode(
    withExclude<RefNode>({ type: 'ref' as const, name, optional: options.optional ?? false }, options.exclude)
  );
}

export function sequence(children: readonly GrammarInput[], options: SequenceOptions = {}): SequenceNode {
  const node: SequenceNode = {
    type: 'sequence',
    children: toChildren(children, 'sequence'),
    optional: options.optional ?? false,
    ...(options.wrapper ? { wrapper: options.wrapper } : {}),
  };
  return freezeNode(withExclude(node, options.exclude));
}

export function oneOf(children: readonly GrammarInput[], options: CompositeOptions = {}): OneOfNode {
  const nodes = toChildren(children, 'oneOf');
  checkAlternatives(nodes, 'oneOf');
  return freezeNode(
    withExclude<OneOfNode>({ type: 'oneOf' as const, children: nodes, optional: options.optional ?? false }, options.exclude)
  );
}

export function anyNumberOf(children: readonly GrammarInput[], options: AnyNumberOfOptions = {}): AnyNumberOfNode {
  const nodes = toChildren(children, 'anyNumberOf');
  checkAlternatives(nodes, 'anyNumberOf');
  const min = options.min ?? 0;
  const max = options.max ?? null;
  if (!Number.isInteger(min) || min < 0) {
    malformed(`anyNumberOf min must be a non-negative integer, got ${min}`, { min });
  }
  if (max !== null && (!Number.isInteger(max) || max < 1 || max < min)) {
    malformed(`anyNumberOf max must be an integer >= max(1, min), got ${max}`, { min, max });
  }
  return freezeNode(
    withExclude<AnyNumberOfNode>(
      { type: 'anyNumberOf' as const, children: nodes, min, max, optional: options.optional ?? false },
      options.exclude
    )
  );
}

export function bracketed(children: readonly GrammarInput[], options: BracketedOptions = {}): BracketedNode {
  return buildBracketed(children, options, false);
}

/**
 * Content that may appear with or without the surrounding bracket pair.
 */
export function optionallyBracketed(children: readonly GrammarInput[], options: BracketedOptions = {}): BracketedNode {
  return buildBracketed(children, options, true);
}

function buildBracketed(
  children: readonly GrammarInput[],
  options: BracketedOptions,
  bracketOptional: boolean
): BracketedNode {
  const bracketPair = options.bracketPair ?? 'round';
  if (!Object.prototype.hasOwnProperty.call(BRACKET_PAIRS, bracketPair)) {
    malformed(`Unknown bracket pair '${bracketPair}'`, { bracketPair, known: Object.keys(BRACKET_PAIRS) });
  }
  return freezeNode(
    withExclude<BracketedNode>(
      {
        type: 'bracketed' as const,
        children: toChildren(children, 'bracketed'),
        bracketPair,
        bracketOptional,
        optional: options.optional ?? false,
      },
      options.exclude
    )
  );
}

export function delimited(children: readonly GrammarInput[], options: DelimitedOptions = {}): DelimitedNode {
  const nodes = toChildren(children, 'delimited');
  checkAlternatives(nodes, 'delimited');
  const minDelimiters = options.minDelimiters ?? 0;
  if (!Number.isInteger(minDelimiters) || minDelimiters < 0) {
    malformed(`delimited minDelimiters must be a non-negative integer, got ${minDelimiters}`, { minDelimiters });
  }
  const delimiter = toNode(options.delimiter ?? ref('CommaSegment'));
  if (delimiter.optional) {
    malformed('delimited delimiter cannot be optional');
  }
  return freezeNode(
    withExclude<DelimitedNode>(
      {
        type: 'delimited' as const,
        children: nodes,
        delimiter,
        allowTrailing: options.allowTrailing ?? false,
        minDelimiters,
        optional: options.optional ?? false,
      },
      options.exclude
    )
  );
}
