/**
 * The ANSI base dialect. Every other built-in dialect is derived from it.
 */
import { fileURLToPath } from 'node:url';
import {
  anyNumberOf,
  bracketed,
  delimited,
  keyword,
  namedToken,
  oneOf,
  pattern,
  ref,
  sequence,
  symbol,
} from '../core/grammar/index.js';
import { Dialect, RESERVED_KEYWORDS, UNRESERVED_KEYWORDS } from '../core/dialect/dialect.js';
import { defineSegment } from '../core/dialect/segment.js';
import { loadKeywordList } from '../core/keywords/keyword-loader.js';

export const ANSI_DIALECT = 'ansi';

/**
 * Location of a bundled keyword list. Source and build output sit at the same depth.
 */
export function keywordResource(fileName: string): string {
  return fileURLToPath(new URL(`../../resources/keywords/${fileName}`, import.meta.url));
}

const IDENTIFIER_PATTERN = '[A-Za-z_][A-Za-z0-9_@$#]*';

export function buildAnsiDialect(): Dialect {
  const ansi = new Dialect(ANSI_DIALECT, {
    keywordSets: {
      [RESERVED_KEYWORDS]: loadKeywordList(keywordResource('ansi-reserved.txt')),
      [UNRESERVED_KEYWORDS]: loadKeywordList(keywordResource('ansi-unreserved.txt')),
    },
  });

  ansi.add({
    CommaSegment: symbol(',', { name: 'comma', segmentType: 'comma' }),
    DotSegment: symbol('.', { name: 'dot', segmentType: 'dot' }),
    StarSegment: symbol('*', { name: 'star', segmentType: 'star' }),
    EqualsSegment: symbol('=', { name: 'equals', segmentType: 'comparison_operator' }),
    ComparisonOperatorGrammar: oneOf([
      ref('EqualsSegment'),
      symbol('<>', { segmentType: 'comparison_operator' }),
      symbol('!=', { segmentType: 'comparison_operator' }),
      symbol('<=', { segmentType: 'comparison_operator' }),
      symbol('>=', { segmentType: 'comparison_operator' }),
      symbol('<', { segmentType: 'comparison_operator' }),
      symbol('>', { segmentType: 'comparison_operator' }),
    ]),

    NakedIdentifierSegment: pattern(IDENTIFIER_PATTERN, {
      name: 'naked_identifier',
      segmentType: 'identifier',
      antiKeywordSet: RESERVED_KEYWORDS,
    }),
    QuotedIdentifierSegment: namedToken('double_quote', {
      name: 'quoted_identifier',
      segmentType: 'identifier',
      trimChars: ['"'],
    }),
    IdentifierGrammar: oneOf([ref('NakedIdentifierSegment'), ref('QuotedIdentifierSegment')]),
    FunctionNameSegment: pattern(IDENTIFIER_PATTERN, {
      name: 'function_name',
      segmentType: 'function_name',
      antiKeywordSet: RESERVED_KEYWORDS,
    }),

    QuotedLiteralSegment: namedToken('single_quote', {
      name: 'quoted_literal',
      segmentType: 'literal',
      trimChars: ["'"],
    }),
    NumericLiteralSegment: namedToken('number', { name: 'numeric_literal', segmentType: 'literal' }),
    NullLiteralSegment: keyword('NULL', { segmentType: 'null_literal' }),
    BooleanLiteralGrammar: oneOf([
      keyword('TRUE', { segmentType: 'boolean_literal' }),
      keyword('FALSE', { segmentType: 'boolean_literal' }),
    ]),
    LiteralGrammar: oneOf([
      ref('QuotedLiteralSegment'),
      ref('NumericLiteralSegment'),
      ref('NullLiteralSegment'),
      ref('BooleanLiteralGrammar'),
    ]),
    ExpressionGrammar: oneOf([ref('LiteralGrammar'), ref('FunctionSegment'), ref('ColumnReferenceSegment')]),

    IfExistsGrammar: sequence(['IF', 'EXISTS']),
    AliasExpressionGrammar: sequence([keyword('AS', { optional: true }), ref('IdentifierGrammar')]),
  });

  ansi
    .register(
      defineSegment({
        name: 'DelimiterSegment',
        type: 'statement_terminator',
        grammar: symbol(';', { name: 'semicolon', segmentType: 'statement_terminator' }),
      })
    )
    .register(
      defineSegment({
        name: 'TableReferenceSegment',
        type: 'table_reference',
        grammar: delimited([ref('IdentifierGrammar')], { delimiter: ref('DotSegment') }),
      })
    )
    .register(
      defineSegment({
        name: 'ColumnReferenceSegment',
        type: 'column_reference',
        grammar: delimited([ref('IdentifierGrammar')], { delimiter: ref('DotSegment') }),
      })
    )
    .register(
      defineSegment({
        name: 'DatatypeSegment',
        type: 'data_type',
        grammar: sequence([
          pattern('[A-Za-z_][A-Za-z0-9_]*', { name: 'data_type_identifier' }),
          bracketed([delimited([ref('NumericLiteralSegment')])], { optional: true }),
        ]),
      })
    )
    .register(
      defineSegment({
        name: 'FunctionSegment',
        type: 'function',
        grammar: sequence([
          ref('FunctionNameSegment'),
          bracketed([delimited([ref('ExpressionGrammar')], { optional: true })]),
        ]),
      })
    )
    .register(
      defineSegment({
        name: 'SelectClauseElementSegment',
        type: 'select_clause_element',
        grammar: oneOf([
          ref('StarSegment'),
          sequence([ref('ExpressionGrammar'), ref('AliasExpressionGrammar', { optional: true })]),
        ]),
      })
    )
    .register(
      defineSegment({
        name: 'SelectStatementSegment',
        type: 'select_statement',
        description: 'SELECT list with optional FROM and a single WHERE comparison.',
        grammar: sequence([
          'SELECT',
          keyword('DISTINCT', { optional: true }),
          delimited([ref('SelectClauseElementSegment')]),
          sequence(['FROM', delimited([ref('TableReferenceSegment')])], { optional: true }),
          sequence(
            ['WHERE', ref('ExpressionGrammar'), ref('ComparisonOperatorGrammar'), ref('ExpressionGrammar')],
            { optional: true }
          ),
        ]),
      })
    )
    .register(
      defineSegment({
        name: 'DropStatementSegment',
        type: 'drop_statement',
        grammar: sequence([
          'DROP',
          oneOf(['TABLE', 'VIEW']),
          ref('IfExistsGrammar', { optional: true }),
          ref('TableReferenceSegment'),
        ]),
      })
    )
    .register(
      defineSegment({
        name: 'UseStatementSegment',
        type: 'use_statement',
        grammar: sequence(['USE', ref('IdentifierGrammar')]),
      })
    )
    .register(
      defineSegment({
        name: 'StatementSegment',
        type: 'statement',
        grammar: oneOf([ref('SelectStatementSegment'), ref('DropStatementSegment'), ref('UseStatementSegment')]),
      })
    )
    .register(
      defineSegment({
        name: 'FileSegment',
        type: 'file',
        description: 'Statements, optionally separated by delimiters.',
        grammar: anyNumberOf([ref('StatementSegment'), ref('DelimiterSegment')], { min: 1 }),
      })
    );

  return ansi;
}
