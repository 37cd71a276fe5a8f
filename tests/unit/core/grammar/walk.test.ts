/**
 * Tests for grammar traversal helpers.
 */
import { describe, it, expect } from 'vitest';
import { delimited, keyword, oneOf, pattern, ref, sequence } from '../../../../src/core/grammar/builders.js';
import {
  childNodes,
  collectAntiKeywordSets,
  collectReferences,
  grammarEquals,
  grammarKey,
  walkGrammar,
} from '../../../../src/core/grammar/walk.js';

const grammar = sequence(
  [
    'SELECT',
    delimited([ref('ColumnSegment'), pattern('[a-z]+', { name: 'word', antiKeywordSet: 'reserved_keywords' })], {
      delimiter: ref('CommaSegment'),
    }),
    ref('FromClauseSegment', { optional: true }),
  ],
  { exclude: ref('DropStatementSegment') }
);

describe('childNodes', () => {
  it('should include delimiters and exclusions', () => {
    const list = grammar.children[1];

    expect(childNodes(list).map((node) => node.type)).toEqual(['ref', 'pattern', 'ref']);
    expect(childNodes(grammar)).toHaveLength(4);
    expect(childNodes(keyword('GO'))).toEqual([]);
  });
});

describe('walkGrammar', () => {
  it('should visit in pre-order with depth', () => {
    const visited: string[] = [];
    walkGrammar(oneOf(['GO', sequence(['USE', ref('Db')])]), (node, depth) => {
      visited.push(`${depth}:${node.type}`);
    });

    expect(visited).toEqual(['0:oneOf', '1:keyword', '1:sequence', '2:keyword', '2:ref']);
  });

  it('should skip children when the visitor returns false', () => {
    const visited: string[] = [];
    walkGrammar(sequence([sequence(['A', 'B']), 'C']), (node) => {
      visited.push(node.type);
      return !(node.type === 'sequence' && node.children.length === 2 && node.children[0].type === 'keyword');
    });

    expect(visited).toEqual(['sequence', 'sequence', 'keyword']);
  });
});

describe('collectReferences', () => {
  it('should collect references from every position', () => {
    expect(collectReferences(grammar).map((r) => r.name)).toEqual([
      'ColumnSegment',
      'CommaSegment',
      'FromClauseSegment',
      'DropStatementSegment',
    ]);
  });
});

describe('collectAntiKeywordSets', () => {
  it('should list distinct keyword set names', () => {
    expect(collectAntiKeywordSets(grammar)).toEqual(['reserved_keywords']);
  });
});

describe('grammarEquals', () => {
  it('should compare structure, not identity', () => {
    expect(grammarEquals(sequence(['drop', ref('T')]), sequence(['DROP', ref('T')]))).toBe(true);
    expect(grammarEquals(ref('T'), ref('T', { optional: true }))).toBe(false);
  });

  it('should ignore key order', () => {
    expect(grammarKey(keyword('GO'))).toBe('{"optional":false,"segmentType":"keyword","type":"keyword","value":"GO"}');
  });
});
