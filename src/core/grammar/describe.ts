/**
 * Conversion between grammar nodes and their structural descriptions.
 *
 * `describeGrammar` emits every field so that a description is a complete record of the
 * tree; `buildGrammar` re-runs the constructors, so a rebuilt tree is validated exactly like
 * one written in code.
 */
import { GrammarError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import {
  anyNumberOf,
  bracketed,
  delimited,
  keyword,
  namedToken,
  oneOf,
  optionallyBracketed,
  pattern,
  ref,
  sequence,
  symbol,
} from './builders.js';
import { GrammarDescriptionSchema, type GrammarDescription, type GrammarNodeDescription } from './schema.js';
import { BRACKET_PAIRS, type GrammarNode } from './types.js';

export function describeGrammar(node: GrammarNode): GrammarNodeDescription {
  switch (node.type) {
    case 'keyword':
      return { type: 'keyword', value: node.value, segmentType: node.segmentType, optional: node.optional };
    case 'symbol':
      return {
        type: 'symbol',
        value: node.value,
        name: node.name,
        segmentType: node.segmentType,
        optional: node.optional,
      };
    case 'pattern':
      return {
        type: 'pattern',
        source: node.source,
        flags: node.flags,
        name: node.name,
        segmentType: node.segmentType,
        optional: node.optional,
        ...(node.antiKeywordSet ? { antiKeywordSet: node.antiKeywordSet } : {}),
        ...(node.trimChars ? { trimChars: [...node.trimChars] } : {}),
      };
    case 'namedToken':
      return {
        type: 'namedToken',
        tokenKind: node.tokenKind,
        name: node.name,
        segmentType: node.segmentType,
        optional: node.optional,
        ...(node.trimChars ? { trimChars: [...node.trimChars] } : {}),
      };
    case 'ref':
      return {
        type: 'ref',
        name: node.name,
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
      };
    case 'sequence':
      return {
        type: 'sequence',
        children: node.children.map(describeGrammar),
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
        ...(node.wrapper ? { wrapper: node.wrapper } : {}),
      };
    case 'oneOf':
      return {
        type: 'oneOf',
        children: node.children.map(describeGrammar),
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
      };
    case 'anyNumberOf':
      return {
        type: 'anyNumberOf',
        children: node.children.map(describeGrammar),
        min: node.min,
        max: node.max,
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
      };
    case 'bracketed':
      return {
        type: 'bracketed',
        children: node.children.map(describeGrammar),
        bracketPair: node.bracketPair,
        bracketOptional: node.bracketOptional,
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
      };
    case 'delimited':
      return {
        type: 'delimited',
        children: node.children.map(describeGrammar),
        delimiter: describeGrammar(node.delimiter),
        allowTrailing: node.allowTrailing,
        minDelimiters: node.minDelimiters,
        optional: node.optional,
        ...(node.exclude ? { exclude: describeGrammar(node.exclude) } : {}),
      };
  }
}

/**
 * Validate an untrusted value as a grammar description.
 */
export function parseGrammarDescription(value: unknown): GrammarDescription {
  const result = GrammarDescriptionSchema.safeParse(value);
  if (!result.success) {
    throw new GrammarError(
      ErrorCodes.MALFORMED_GRAMMAR,
      `Invalid grammar description: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Rebuild a grammar tree from a validated description.
 */
export function buildGrammar(description: GrammarDescription): GrammarNode {
  if (typeof description === 'string') {
    return keyword(description);
  }
  const optional = description.optional;
  switch (description.type) {
    case 'keyword':
      return keyword(description.value, { optional, segmentType: description.segmentType });
    case 'symbol':
      return symbol(description.value, { optional, name: description.name, segmentType: description.segmentType });
    case 'pattern':
      return pattern(description.source, {
        optional,
        flags: description.flags,
        name: description.name,
        segmentType: description.segmentType,
        antiKeywordSet: description.antiKeywordSet,
        trimChars: description.trimChars,
      });
    case 'namedToken':
      return namedToken(description.tokenKind, {
        optional,
        name: description.name,
        segmentType: description.segmentType,
        trimChars: description.trimChars,
      });
    case 'ref':
      return ref(description.name, { optional, exclude: buildOptional(description.exclude) });
    case 'sequence':
      return sequence(description.children.map(buildGrammar), {
        optional,
        exclude: buildOptional(description.exclude),
        wrapper: description.wrapper,
      });
    case 'oneOf':
      return oneOf(description.children.map(buildGrammar), {
        optional,
        exclude: buildOptional(description.exclude),
      });
    case 'anyNumberOf':
      return anyNumberOf(description.children.map(buildGrammar), {
        optional,
        exclude: buildOptional(description.exclude),
        min: description.min,
        max: description.max,
      });
    case 'bracketed': {
      const build = description.bracketOptional ? optionallyBracketed : bracketed;
      return build(description.children.map(buildGrammar), {
        optional,
        exclude: buildOptional(description.exclude),
        bracketPair: description.bracketPair,
      });
    }
    case 'delimited':
      return delimited(description.children.map(buildGrammar), {
        optional,
        exclude: buildOptional(description.exclude),
        delimiter: buildOptional(description.delimiter),
        allowTrailing: description.allowTrailing,
        minDelimiters: description.minDelimiters,
      });
  }
}

function buildOptional(description: GrammarDescription | undefined): GrammarNode | undefined {
  return description === undefined ? undefined : buildGrammar(description);
}

/**
 * One-line human-readable rendering, e.g. `DROP (TABLE | VIEW) <TableReferenceSegment>`.
 */
export function formatGrammar(node: GrammarNode): string {
  const text = formatBody(node);
  return node.optional ? `[${text}]` : text;
}

function formatBody(node: GrammarNode): string {
  switch (node.type) {
    case 'keyword':
      return node.value;
    case 'symbol':
      return `'${node.value}'`;
    case 'pattern':
      return `/${node.source}/`;
    case 'namedToken':
      return `:${node.tokenKind}`;
    case 'ref':
      return `<${node.name}>`;
    case 'sequence':
      return node.children.map(formatGrammar).join(' ');
    case 'oneOf':
      return `(${node.children.map(formatGrammar).join(' | ')})`;
    case 'anyNumberOf': {
      const inner = node.children.length === 1
        ? formatGrammar(node.children[0])
        : `(${node.children.map(formatGrammar).join(' | ')})`;
      const bound = node.max !== null
        ? `{${node.min},${node.max}}`
        : node.min === 0 ? '*' : node.min === 1 ? '+' : `{${node.min},}`;
      return `${inner}${bound}`;
    }
    case 'bracketed': {
      const [open, close] = BRACKET_PAIRS[node.bracketPair];
      const body = node.children.map(formatGrammar).join(' ');
      return node.bracketOptional ? `${open}?${body}${close}?` : `${open}${body}${close}`;
    }
    case 'delimited':
      return `${node.children.map(formatGrammar).join(' | ')} (${formatGrammar(node.delimiter)} ...)`;
  }
}
