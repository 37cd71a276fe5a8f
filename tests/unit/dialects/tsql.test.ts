/**
 * Tests for the T-SQL dialect.
 */
import { describe, it, expect } from 'vitest';
import { ANSI_DIALECT, TSQL_DIALECT, registerBuiltinDialects } from '../../../src/dialects/index.js';
import { DialectRegistry } from '../../../src/core/dialect/registry.js';
import { leafTokens, matchSql } from '../../helpers/matching.js';

function builtins() {
  const registry = new DialectRegistry();
  registerBuiltinDialects(registry);
  return { ansi: registry.load(ANSI_DIALECT), tsql: registry.load(TSQL_DIALECT) };
}

describe('tsql dialect', () => {
  it('should derive from ansi', () => {
    const { ansi, tsql } = builtins();

    expect(tsql.parent).toBe(ansi);
    expect(tsql.history[0]).toEqual({ op: 'derive', from: 'ansi' });
  });

  it('should accept DROP USER where ansi does not', () => {
    const { ansi, tsql } = builtins();

    expect(matchSql(tsql, 'DROP USER Bob')).toMatchObject({ ok: true, pos: 3 });
    expect(matchSql(tsql, 'DROP USER Bob;')).toMatchObject({ ok: true, pos: 4 });
    expect(matchSql(ansi, 'DROP USER Bob')).toMatchObject({ ok: false });
  });

  it('should leave ansi untouched', () => {
    const { ansi } = builtins();

    expect(ansi.has('DeclareStatementSegment')).toBe(false);
    expect(ansi.has('GoStatementSegment')).toBe(false);
    expect(ansi.isKeyword('VIEW', 'unreserved_keywords')).toBe(true);
  });

  describe('keywords', () => {
    it('should move T-SQL reserved words out of the unreserved set', () => {
      const { tsql } = builtins();

      expect(tsql.isKeyword('VIEW', 'reserved_keywords')).toBe(true);
      expect(tsql.isKeyword('VIEW', 'unreserved_keywords')).toBe(false);
      expect(tsql.isKeyword('HANDLER', 'unreserved_keywords')).toBe(true);
      for (const word of tsql.keywords('reserved_keywords')) {
        expect(tsql.isKeyword(word, 'unreserved_keywords')).toBe(false);
      }
    });

    it('should stop reserved words from being identifiers', () => {
      const { ansi, tsql } = builtins();

      expect(matchSql(ansi, 'USE view')).toMatchObject({ ok: true });
      expect(matchSql(tsql, 'USE view')).toEqual({
        ok: false,
        pos: 1,
        expected: 'naked_identifier or quoted_identifier or bracket_quoted_identifier',
      });
    });
  });

  describe('DECLARE', () => {
    it.each([
      'DECLARE c CURSOR FOR SELECT a FROM t',
      'DECLARE CONTINUE HANDLER FOR SQLEXCEPTION SELECT 1',
      'DECLARE EXIT HANDLER FOR NOT FOUND SELECT 1;',
      "DECLARE UNDO HANDLER FOR SQLSTATE VALUE '42000' SELECT 1",
      "DECLARE oops CONDITION FOR '45000'",
      'DECLARE @x INT',
      "DECLARE @name VARCHAR(20) DEFAULT 'a';",
    ])('should match %j', (sql) => {
      expect(matchSql(builtins().tsql, sql)).toMatchObject({ ok: true });
    });

    it('should type the declared variable', () => {
      const result = matchSql(builtins().tsql, 'DECLARE @x INT');

      expect(result.ok && result.nodes[0]).toMatchObject({ type: 'statement', name: 'StatementSegment' });
      expect(result.ok && leafTokens(result.nodes)[1]).toMatchObject({
        type: 'variable',
        name: 'declared_variable',
        raw: '@x',
      });
    });
  });

  describe('SET', () => {
    it.each(['+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '='])('should accept %s', (operator) => {
      expect(matchSql(builtins().tsql, `SET @x ${operator} 1`)).toMatchObject({ ok: true, pos: 4 });
    });

    it('should tag compound assignment operators', () => {
      const result = matchSql(builtins().tsql, 'SET @x += 1;');

      expect(result.ok && leafTokens(result.nodes)[2]).toEqual({
        kind: 'token',
        type: 'binary_operator',
        name: 'addition_assignment',
        raw: '+=',
        value: '+=',
        index: 2,
      });
    });

    it('should accept dotted variables', () => {
      const result = matchSql(builtins().tsql, 'SET @obj.prop = 1');

      expect(result).toMatchObject({ ok: true, pos: 4 });
      expect(result.ok && leafTokens(result.nodes)[1]).toMatchObject({ type: 'variable', raw: '@obj.prop' });
    });

    it('should accept several values', () => {
      expect(matchSql(builtins().tsql, `SET @msg = "hi" @y 'there'`)).toMatchObject({ ok: true, pos: 6 });
    });
  });

  describe('GO', () => {
    it.each([
      ['GO', 1],
      ['GO 5', 2],
      ['GO;', 2],
    ])('should match %j', (sql, pos) => {
      expect(matchSql(builtins().tsql, sql)).toMatchObject({ ok: true, pos });
    });

    it('should tag the batch separator as a literal', () => {
      const result = matchSql(builtins().tsql, 'GO 5');

      expect(result.ok && leafTokens(result.nodes)[0]).toMatchObject({ type: 'literal', name: 'go' });
    });

    it('should separate batches in a file', () => {
      expect(matchSql(builtins().tsql, 'SELECT 1; GO\nDROP USER Bob', 'FileSegment')).toMatchObject({
        ok: true,
        pos: 7,
      });
    });
  });

  it('should accept bracket identifiers and variables in expressions', () => {
    const { tsql } = builtins();

    expect(matchSql(tsql, 'SELECT [My Col] FROM [dbo].[t]')).toMatchObject({ ok: true });
    expect(matchSql(tsql, 'SELECT @v')).toMatchObject({ ok: true });
  });
});
