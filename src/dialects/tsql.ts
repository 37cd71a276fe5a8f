/**
 * The Transact-SQL dialect, derived from ANSI.
 *
 * T-SQL reserves many words ANSI leaves unreserved, adds compound assignment operators,
 * `@variables`, `GO` batch separators and DECLARE/SET statements. Statements defined here
 * accept an optional trailing `;`.
 */
import {
  anyNumberOf,
  keyword,
  namedToken,
  oneOf,
  pattern,
  ref,
  sequence,
  symbol,
  terminatedSequence,
} from '../core/grammar/index.js';
import { RESERVED_KEYWORDS, UNRESERVED_KEYWORDS, type Dialect } from '../core/dialect/dialect.js';
import { defineSegment } from '../core/dialect/segment.js';
import { loadKeywordList } from '../core/keywords/keyword-loader.js';
import { keywordResource } from './ansi.js';

export const TSQL_DIALECT = 'tsql';

const ASSIGNMENT_OPERATORS = [
  ['AdditionAssignmentSegment', '+=', 'addition_assignment'],
  ['SubtractionAssignmentSegment', '-=', 'subtraction_assignment'],
  ['DivisionAssignmentSegment', '/=', 'division_assignment'],
  ['MultiplicationAssignmentSegment', '*=', 'multiplication_assignment'],
  ['ModuloAssignmentSegment', '%=', 'modulo_assignment'],
  ['BitwiseAndAssignmentSegment', '&=', 'binary_and_assignment'],
  ['BitwiseOrAssignmentSegment', '|=', 'binary_or_assignment'],
  ['BitwiseXorAssignmentSegment', '^=', 'binary_xor_assignment'],
] as const;

export function buildTsqlDialect(ansi: Dialect): Dialect {
  const tsql = ansi.copyAs(TSQL_DIALECT);

  const reserved = loadKeywordList(keywordResource('tsql-reserved.txt'));
  tsql.keywords(UNRESERVED_KEYWORDS).differenceUpdate(reserved);
  tsql.keywords(RESERVED_KEYWORDS).update(reserved);

  tsql.add(
    Object.fromEntries(
      ASSIGNMENT_OPERATORS.map(([name, value, symbolName]) => [
        name,
        symbol(value, { name: symbolName, segmentType: 'binary_operator' }),
      ])
    )
  );

  tsql.add({
    ArithmeticBinaryAssignmentOperatorGrammar: oneOf(ASSIGNMENT_OPERATORS.map(([name]) => ref(name))),
    GoSegment: keyword('GO', { segmentType: 'literal' }),
    DoubleQuotedLiteralSegment: namedToken('double_quote', {
      name: 'quoted_literal',
      segmentType: 'literal',
      trimChars: ['"'],
    }),
    // "." allows property and field access on variables.
    VariableNameSegment: pattern('[@][a-zA-Z0-9_.]*', { name: 'declared_variable', segmentType: 'variable' }),
    BracketQuotedIdentifierSegment: namedToken('bracket_quote', {
      name: 'bracket_quoted_identifier',
      segmentType: 'identifier',
      trimChars: ['[', ']'],
    }),
  });

  tsql.add(
    {
      IdentifierGrammar: oneOf([
        ref('NakedIdentifierSegment'),
        ref('QuotedIdentifierSegment'),
        ref('BracketQuotedIdentifierSegment'),
      ]),
      ExpressionGrammar: oneOf([
        ref('LiteralGrammar'),
        ref('VariableNameSegment'),
        ref('FunctionSegment'),
        ref('ColumnReferenceSegment'),
      ]),
    },
    { replace: true }
  );

  tsql.register(
    defineSegment({
      name: 'DeclareStatementSegment',
      type: 'declare_statement',
      grammar: oneOf([
        terminatedSequence(['DECLARE', ref('NakedIdentifierSegment'), 'CURSOR', 'FOR', ref('StatementSegment')]),
        terminatedSequence([
          'DECLARE',
          oneOf(['CONTINUE', 'EXIT', 'UNDO']),
          'HANDLER',
          'FOR',
          oneOf([
            'SQLEXCEPTION',
            'SQLWARNING',
            sequence(['NOT', 'FOUND']),
            sequence(['SQLSTATE', keyword('VALUE', { optional: true }), ref('QuotedLiteralSegment')]),
            oneOf([ref('QuotedLiteralSegment'), ref('NumericLiteralSegment'), ref('NakedIdentifierSegment')]),
          ]),
          ref('StatementSegment'),
        ]),
        terminatedSequence([
          'DECLARE',
          ref('NakedIdentifierSegment'),
          'CONDITION',
          'FOR',
          oneOf([ref('QuotedLiteralSegment'), ref('NumericLiteralSegment')]),
        ]),
        terminatedSequence([
          'DECLARE',
          ref('VariableNameSegment'),
          ref('DatatypeSegment'),
          sequence(
            [
              'DEFAULT',
              oneOf([ref('QuotedLiteralSegment'), ref('NumericLiteralSegment'), ref('FunctionSegment')]),
            ],
            { optional: true }
          ),
        ]),
      ]),
    })
  );

  tsql.register(
    defineSegment({
      name: 'DropStatementSegment',
      type: 'drop_statement',
      grammar: terminatedSequence([
        'DROP',
        oneOf(['TABLE', 'VIEW', 'USER', 'FUNCTION', 'PROCEDURE']),
        ref('IfExistsGrammar', { optional: true }),
        ref('TableReferenceSegment'),
      ]),
    }),
    { replace: true }
  );

  tsql.register(
    defineSegment({
      name: 'GoStatementSegment',
      type: 'go_statement',
      description: 'Batch separator with an optional repeat count.',
      grammar: terminatedSequence([ref('GoSegment'), ref('NumericLiteralSegment', { optional: true })]),
    })
  );

  tsql.register(
    defineSegment({
      name: 'SetAssignmentStatementSegment',
      type: 'set_statement',
      grammar: terminatedSequence([
        'SET',
        ref('VariableNameSegment'),
        oneOf([ref('EqualsSegment'), ref('ArithmeticBinaryAssignmentOperatorGrammar')]),
        anyNumberOf([
          ref('LiteralGrammar'),
          ref('DoubleQuotedLiteralSegment'),
          ref('VariableNameSegment'),
          ref('FunctionSegment'),
        ]),
      ]),
    })
  );

  tsql.register(
    defineSegment({
      name: 'StatementSegment',
      type: 'statement',
      grammar: oneOf([
        ref('SelectStatementSegment'),
        ref('DropStatementSegment'),
        ref('UseStatementSegment'),
        ref('DeclareStatementSegment'),
        ref('GoStatementSegment'),
        ref('SetAssignmentStatementSegment'),
      ]),
    }),
    { replace: true }
  );

  return tsql;
}
