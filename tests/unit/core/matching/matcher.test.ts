/**
 * Tests for the PEG matcher.
 */
import { describe, it, expect } from 'vitest';
import type { Dialect } from '../../../../src/core/dialect/dialect.js';
import { defineSegment } from '../../../../src/core/dialect/segment.js';
import {
  anyNumberOf,
  bracketed,
  delimited,
  namedToken,
  oneOf,
  optionallyBracketed,
  pattern,
  ref,
  sequence,
  symbol,
} from '../../../../src/core/grammar/builders.js';
import { buildGrammar, describeGrammar } from '../../../../src/core/grammar/describe.js';
import { terminatedSequence } from '../../../../src/core/grammar/wrapper.js';
import { lexSql } from '../../../../src/core/matching/lexer.js';
import { DEFAULT_MAX_DEPTH, PegMatcher, matchedTokens, type MatcherOptions } from '../../../../src/core/matching/matcher.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { thrownBy } from '../../../helpers/errors.js';
import { buildToyDialect } from '../../../helpers/toy-dialect.js';

function buildMatchDialect(): Dialect {
  const dialect = buildToyDialect('matching');
  dialect.add({
    QualifiedGrammar: sequence([ref('NameSegment'), symbol('.'), ref('NameSegment')]),
    ChoiceGrammar: oneOf([ref('NameSegment'), ref('QualifiedGrammar')]),
    TieGrammar: oneOf([pattern('[a-z]+', { name: 'lower' }), ref('NameSegment')]),
    NumbersGrammar: anyNumberOf([ref('NumberSegment')], { min: 2, max: 3 }),
    MaybeBracketedGrammar: optionallyBracketed([ref('NumberSegment')]),
    NotViewGrammar: ref('NameSegment', { exclude: 'VIEW' }),
    NestedGrammar: oneOf([bracketed([ref('NestedGrammar')]), ref('NumberSegment')]),
    QuotedGrammar: namedToken('double_quote', { name: 'quoted', trimChars: ['"'] }),
  });
  dialect
    .register(
      defineSegment({
        name: 'DropStatementSegment',
        type: 'drop_statement',
        grammar: terminatedSequence(['DROP', 'TABLE', ref('NameSegment')]),
      })
    )
    .register(defineSegment({ name: 'ListSegment', type: 'list', grammar: delimited([ref('NameSegment')]) }))
    .register(
      defineSegment({
        name: 'TrailingListSegment',
        type: 'list',
        grammar: delimited([ref('NameSegment')], { allowTrailing: true }),
      })
    )
    .register(
      defineSegment({
        name: 'PairSegment',
        type: 'list',
        grammar: delimited([ref('NameSegment')], { minDelimiters: 1 }),
      })
    )
    .register(
      defineSegment({
        name: 'CallSegment',
        type: 'call',
        grammar: sequence([ref('NameSegment'), bracketed([delimited([ref('NumberSegment')])])]),
      })
    );
  return dialect.publish();
}

const matcher = (options: MatcherOptions = {}) => new PegMatcher(buildMatchDialect(), options);

describe('PegMatcher', () => {
  it('should require a published dialect', () => {
    expect(thrownBy(() => new PegMatcher(buildToyDialect()))).toMatchObject({
      code: ErrorCodes.DIALECT_NOT_PUBLISHED,
    });
  });

  it('should fail for names missing from the dialect', () => {
    expect(thrownBy(() => matcher().match('MissingSegment', lexSql('x')))).toMatchObject({
      code: ErrorCodes.UNKNOWN_SEGMENT,
    });
  });

  describe('terminated statements', () => {
    it('should accept the statement with or without a delimiter', () => {
      const m = matcher();

      expect(m.matchAll('DropStatementSegment', lexSql('DROP TABLE t'))).toMatchObject({ ok: true, pos: 3 });
      expect(m.matchAll('DropStatementSegment', lexSql('DROP TABLE t;'))).toMatchObject({ ok: true, pos: 4 });
    });

    it('should build a segment tree', () => {
      const result = matcher().match('DropStatementSegment', lexSql('drop TABLE t;'));

      expect(result).toEqual({
        ok: true,
        pos: 4,
        nodes: [
          {
            kind: 'segment',
            type: 'drop_statement',
            name: 'DropStatementSegment',
            start: 0,
            end: 4,
            children: [
              { kind: 'token', type: 'keyword', name: 'drop', raw: 'drop', value: 'drop', index: 0 },
              { kind: 'token', type: 'keyword', name: 'table', raw: 'TABLE', value: 'TABLE', index: 1 },
              { kind: 'token', type: 'identifier', name: 'name', raw: 't', value: 't', index: 2 },
              {
                kind: 'segment',
                type: 'statement_terminator',
                name: 'DelimiterSegment',
                start: 3,
                end: 4,
                children: [
                  {
                    kind: 'token',
                    type: 'statement_terminator',
                    name: 'semicolon',
                    raw: ';',
                    value: ';',
                    index: 3,
                  },
                ],
              },
            ],
          },
        ],
      });
    });

    it.each(['DROP TABLE t', 'DROP TABLE t;', 'DROP TABLE t;;', 'DROP TABLE t x', 'DROP TABLE', 'DROP TABLE t ,'])(
      'should match %j exactly when the plain sequence matches and only a delimiter follows',
      (sql) => {
        const m = matcher();
        const tokens = lexSql(sql);
        const plain = m.match(sequence(['DROP', 'TABLE', ref('NameSegment')]), tokens);
        const rest = plain.ok ? tokens.slice(plain.pos) : [];
        const expected =
          plain.ok && (rest.length === 0 || m.matchAll('DelimiterSegment', rest).ok);

        expect(m.matchAll('DropStatementSegment', tokens).ok).toBe(expected);
      }
    );

    it('should accept only one delimiter', () => {
      expect(matcher().matchAll('DropStatementSegment', lexSql('DROP TABLE t;;'))).toEqual({
        ok: false,
        pos: 4,
        expected: 'end of input',
      });
    });
  });

  describe('terminals', () => {
    it('should reject reserved words where the pattern excludes them', () => {
      expect(matcher().match('DropStatementSegment', lexSql('DROP TABLE from'))).toEqual({
        ok: false,
        pos: 2,
        expected: 'name',
      });
    });

    it('should accept unreserved words as names', () => {
      expect(matcher().matchAll('DropStatementSegment', lexSql('DROP TABLE view'))).toMatchObject({ ok: true });
    });

    it('should strip trim characters from the value', () => {
      const result = matcher().match('QuotedGrammar', lexSql('"a b"'));

      expect(result.ok && result.nodes[0]).toMatchObject({ raw: '"a b"', value: 'a b', name: 'quoted' });
    });

    it('should fail at the end of input', () => {
      expect(matcher().match('DropStatementSegment', lexSql('DROP'))).toEqual({
        ok: false,
        pos: 1,
        expected: 'TABLE',
      });
    });
  });

  describe('oneOf', () => {
    it('should take the longest alternative', () => {
      expect(matcher().match('ChoiceGrammar', lexSql('a.b'))).toMatchObject({ ok: true, pos: 3 });
    });

    it('should break ties by declaration order', () => {
      const result = matcher().match('TieGrammar', lexSql('abc'));

      expect(result.ok && result.nodes.map((node) => node.name)).toEqual(['lower']);
    });

    it('should report every alternative that failed furthest', () => {
      expect(matcher().match('TieGrammar', lexSql('1'))).toEqual({ ok: false, pos: 0, expected: 'lower or name' });
    });
  });

  describe('anyNumberOf', () => {
    it('should stop at the maximum', () => {
      expect(matcher().match('NumbersGrammar', lexSql('1 2 3 4'))).toMatchObject({ ok: true, pos: 3 });
    });

    it('should fail below the minimum', () => {
      expect(matcher().match('NumbersGrammar', lexSql('1'))).toEqual({ ok: false, pos: 1, expected: 'number' });
    });
  });

  describe('bracketed', () => {
    it('should wrap content with bracket tokens', () => {
      const result = matcher().match('CallSegment', lexSql('f(1, 2)'));

      expect(result.ok).toBe(true);
      if (!result.ok || result.nodes[0].kind !== 'segment') return;
      const [, brackets] = result.nodes[0].children;
      expect(brackets).toMatchObject({ kind: 'segment', type: 'bracketed', start: 1, end: 6 });
      expect(brackets.kind === 'segment' && brackets.children.map((node) => node.type)).toEqual([
        'start_bracket',
        'literal',
        'comma',
        'literal',
        'end_bracket',
      ]);
    });

    it('should require the closing bracket', () => {
      expect(matcher().match('CallSegment', lexSql('f(1'))).toEqual({ ok: false, pos: 3, expected: "')'" });
    });

    it('should match optional brackets either way', () => {
      const m = matcher();

      expect(m.match('MaybeBracketedGrammar', lexSql('(1)'))).toMatchObject({ ok: true, pos: 3 });
      expect(m.match('MaybeBracketedGrammar', lexSql('1'))).toMatchObject({ ok: true, pos: 1 });
    });
  });

  describe('delimited', () => {
    it('should leave a trailing delimiter unconsumed by default', () => {
      const m = matcher();

      expect(m.match('ListSegment', lexSql('a, b,'))).toMatchObject({ ok: true, pos: 3 });
      expect(m.matchAll('ListSegment', lexSql('a, b,'))).toEqual({ ok: false, pos: 3, expected: 'end of input' });
    });

    it('should consume a trailing delimiter when allowed', () => {
      expect(matcher().matchAll('TrailingListSegment', lexSql('a, b,'))).toMatchObject({ ok: true, pos: 4 });
    });

    it('should enforce the minimum number of delimiters', () => {
      expect(matcher().match('PairSegment', lexSql('a'))).toEqual({
        ok: false,
        pos: 1,
        expected: 'at least 1 delimiter(s)',
      });
    });
  });

  describe('exclude', () => {
    it('should fail where the excluded grammar matches', () => {
      const m = matcher();

      expect(m.match('NotViewGrammar', lexSql('view'))).toEqual({ ok: false, pos: 0, expected: 'anything but VIEW' });
      expect(m.match('NotViewGrammar', lexSql('other'))).toMatchObject({ ok: true, pos: 1 });
    });
  });

  describe('depth limit', () => {
    it('should default to the configured constant', () => {
      expect(matcher().match('NestedGrammar', lexSql('((((1))))'))).toMatchObject({ ok: true, pos: 9 });
      expect(DEFAULT_MAX_DEPTH).toBe(200);
    });

    it('should abort beyond the maximum depth', () => {
      expect(thrownBy(() => matcher({ maxDepth: 3 }).match('NestedGrammar', lexSql('((((1))))')))).toMatchObject({
        code: ErrorCodes.MAX_DEPTH_EXCEEDED,
      });
    });
  });

  it('should match described and rebuilt grammars identically', () => {
    const dialect = buildMatchDialect();
    const m = new PegMatcher(dialect);
    const tokens = lexSql('f(1, 2, 3)');
    const original = dialect.grammar('CallSegment');

    expect(m.match(buildGrammar(describeGrammar(original)), tokens)).toEqual(m.match(original, tokens));
  });
});

describe('matchedTokens', () => {
  it('should flatten a tree into raw tokens', () => {
    const result = new PegMatcher(buildMatchDialect()).match('CallSegment', lexSql('f(1, 2)'));

    expect(result.ok && matchedTokens(result.nodes)).toEqual(['f', '(', '1', ',', '2', ')']);
  });
});
