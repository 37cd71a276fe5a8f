/**
 * Segment definitions: named grammar rules tagged with the node type they produce.
 */
import { GrammarError, ErrorCodes } from '../../utils/errors.js';
import { toNode } from '../grammar/builders.js';
import type { GrammarInput, GrammarNode } from '../grammar/types.js';

export interface SegmentDefinition {
  /** Registry key, unique within a dialect. */
  readonly name: string;
  /** Type tag given to nodes this segment produces (e.g. `drop_statement`). */
  readonly type: string;
  readonly grammar: GrammarNode;
  readonly description?: string;
}

export interface SegmentInput {
  name: string;
  type: string;
  grammar: GrammarInput;
  description?: string;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check that a registry name is a plain identifier.
 */
export function assertRegistryName(name: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new GrammarError(
      ErrorCodes.MALFORMED_GRAMMAR,
      `Invalid registry name '${name}': expected an identifier`,
      { name }
    );
  }
}

export function defineSegment(input: SegmentInput): SegmentDefinition {
  assertRegistryName(input.name);
  if (!input.type.trim()) {
    throw new GrammarError(
      ErrorCodes.MALFORMED_GRAMMAR,
      `Segment '${input.name}' needs a type tag`,
      { name: input.name }
    );
  }
  return Object.freeze({
    name: input.name,
    type: input.type,
    grammar: toNode(input.grammar),
    ...(input.description ? { description: input.description } : {}),
  });
}
