/**
 * Reference lexer producing code tokens for the matcher.
 *
 * Whitespace and comments are dropped.
 */
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { TokenKind } from '../grammar/types.js';
import type { Token } from './types.js';

const COMPOUND_SYMBOLS = ['+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<>', '!=', '>=', '<=', '||', '::'];

interface LexRule {
  kind: TokenKind | null;
  pattern: RegExp;
}

// Order matters: earlier rules win at the same offset.
const RULES: LexRule[] = [
  { kind: null, pattern: /\s+/y },
  { kind: null, pattern: /--[^\n]*/y },
  { kind: null, pattern: /\/\*[\s\S]*?\*\//y },
  { kind: 'single_quote', pattern: /'(?:[^']|'')*'/y },
  { kind: 'double_quote', pattern: /"(?:[^"]|"")*"/y },
  { kind: 'bracket_quote', pattern: /\[[A-Za-z_@#][^\]\n]*\]/y },
  { kind: 'number', pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y },
  // Variables keep dots for property and field access: @obj.prop
  { kind: 'word', pattern: /@[A-Za-z0-9_@#$.]*/y },
  { kind: 'word', pattern: /[A-Za-z_@#][A-Za-z0-9_@#$]*/y },
];

const UNTERMINATED: Array<{ start: string; what: string }> = [
  { start: '/*', what: 'block comment' },
  { start: "'", what: 'string literal' },
  { start: '"', what: 'quoted identifier' },
];

export function lexSql(text: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  outer: while (offset < text.length) {
    for (const rule of RULES) {
      rule.pattern.lastIndex = offset;
      const match = rule.pattern.exec(text);
      if (match && match[0].length > 0) {
        if (rule.kind) {
          tokens.push({ kind: rule.kind, raw: match[0], offset });
        }
        offset += match[0].length;
        continue outer;
      }
    }

    for (const { start, what } of UNTERMINATED) {
      if (text.startsWith(start, offset)) {
        throw new SystemError(
          ErrorCodes.PARSE_ERROR,
          `Unterminated ${what} at offset ${offset}`,
          { offset }
        );
      }
    }

    const compound = COMPOUND_SYMBOLS.find((symbol) => text.startsWith(symbol, offset));
    const raw = compound ?? text[offset];
    tokens.push({ kind: 'symbol', raw, offset });
    offset += raw.length;
  }

  return tokens;
}
