/**
 * Tests for the SQL lexer.
 */
import { describe, it, expect } from 'vitest';
import { lexSql } from '../../../../src/core/matching/lexer.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { thrownBy } from '../../../helpers/errors.js';

const kinds = (text: string) => lexSql(text).map((token) => [token.kind, token.raw]);

describe('lexSql', () => {
  it('should split words, numbers and symbols', () => {
    expect(kinds('SELECT a, 1.5 FROM t;')).toEqual([
      ['word', 'SELECT'],
      ['word', 'a'],
      ['symbol', ','],
      ['number', '1.5'],
      ['word', 'FROM'],
      ['word', 't'],
      ['symbol', ';'],
    ]);
  });

  it('should keep compound operators together', () => {
    expect(kinds('SET @x += 1')).toEqual([
      ['word', 'SET'],
      ['word', '@x'],
      ['symbol', '+='],
      ['number', '1'],
    ]);
    expect(kinds('a<>b')).toEqual([
      ['word', 'a'],
      ['symbol', '<>'],
      ['word', 'b'],
    ]);
  });

  it('should drop whitespace and comments', () => {
    expect(kinds('GO -- batch\n/* count */ 5')).toEqual([
      ['word', 'GO'],
      ['number', '5'],
    ]);
  });

  it('should lex quoted tokens whole', () => {
    expect(kinds(`'it''s' "a b" [My Table]`)).toEqual([
      ['single_quote', "'it''s'"],
      ['double_quote', '"a b"'],
      ['bracket_quote', '[My Table]'],
    ]);
  });

  it('should treat brackets around numbers as symbols', () => {
    expect(kinds('[1]')).toEqual([
      ['symbol', '['],
      ['number', '1'],
      ['symbol', ']'],
    ]);
  });

  it('should not include dots in plain words', () => {
    expect(kinds('t.y')).toEqual([
      ['word', 't'],
      ['symbol', '.'],
      ['word', 'y'],
    ]);
  });

  it('should keep dots inside variables', () => {
    expect(kinds('@obj.prop = @@ROWCOUNT')).toEqual([
      ['word', '@obj.prop'],
      ['symbol', '='],
      ['word', '@@ROWCOUNT'],
    ]);
  });

  it('should record character offsets', () => {
    expect(lexSql('  DROP x').map((token) => token.offset)).toEqual([2, 7]);
  });

  it('should return no tokens for blank input', () => {
    expect(lexSql(' \n -- nothing')).toEqual([]);
  });

  it.each([
    ["'abc", 'Unterminated string literal at offset 0'],
    ['a /* open', 'Unterminated block comment at offset 2'],
    ['"id', 'Unterminated quoted identifier at offset 0'],
  ])('should reject %j', (text, message) => {
    const error = thrownBy(() => lexSql(text));

    expect(error).toMatchObject({ code: ErrorCodes.PARSE_ERROR, message });
  });
});
