/**
 * Sequence wrappers that add a cross-cutting optional suffix to every use.
 *
 * A wrapper is built once and then used in place of `sequence`, so the suffix lives in one
 * place instead of being repeated at each statement definition.
 */
import { GrammarError, ErrorCodes } from '../../utils/errors.js';
import { ref, sequence, toNode, type CompositeOptions } from './builders.js';
import type { GrammarInput, GrammarNode, SequenceNode } from './types.js';
import { grammarEquals } from './walk.js';

export type SequenceConstructor = (
  children: readonly GrammarInput[],
  options?: CompositeOptions
) => SequenceNode;

/**
 * Create a sequence constructor that appends `suffix`, made optional, to its children.
 *
 * The suffix is not appended again when the last child already is that optional suffix,
 * or when the last child is a required sequence produced by the same wrapper.
 */
export function withOptionalSuffix(wrapperName: string, suffix: GrammarInput): SequenceConstructor {
  if (!wrapperName.trim()) {
    throw new GrammarError(ErrorCodes.MALFORMED_GRAMMAR, 'Sequence wrapper needs a name');
  }
  const base = toNode(suffix);
  const optionalSuffix: GrammarNode = base.optional ? base : Object.freeze({ ...base, optional: true });

  return (children, options = {}) => {
    if (children.length === 0) {
      throw new GrammarError(
        ErrorCodes.MALFORMED_GRAMMAR,
        `'${wrapperName}' sequence requires at least one child`,
        { wrapper: wrapperName }
      );
    }
    const nodes = children.map(toNode);
    const last = nodes[nodes.length - 1];
    const alreadySuffixed =
      grammarEquals(last, optionalSuffix) ||
      (last.type === 'sequence' && last.wrapper === wrapperName && !last.optional);

    return sequence(alreadySuffixed ? nodes : [...nodes, optionalSuffix], {
      ...options,
      wrapper: wrapperName,
    });
  };
}

/**
 * Statement sequence that optionally accepts a trailing statement delimiter.
 */
export const terminatedSequence: SequenceConstructor = withOptionalSuffix(
  'terminated',
  ref('DelimiterSegment', { optional: true })
);
