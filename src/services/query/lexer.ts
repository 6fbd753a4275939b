/**
 * Boolean Query Lexer
 *
 * Splits caller query text into words, quoted phrases, parentheses and the
 * uppercase operators AND / OR / NOT. Lowercase "and", "or", "not" are words.
 *
 * @module services/query/lexer
 */

import { MalformedQueryError } from '../gallica/errors.js';

export type TokenType = 'WORD' | 'PHRASE' | 'AND' | 'OR' | 'NOT' | 'LPAREN' | 'RPAREN' | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the token's first character in the query text */
  index: number;
}

const OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['AND', 'AND'],
  ['OR', 'OR'],
  ['NOT', 'NOT'],
]);

const WORD_BREAKS = new Set(['(', ')', '"']);

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Tokenize query text. The returned list always ends with an EOF token.
 *
 * @throws MalformedQueryError on an unterminated or empty quoted phrase
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'LPAREN' : 'RPAREN', value: ch, index: i });
      i++;
      continue;
    }

    if (ch === '"') {
      const start = i;
      i++;
      let buf = '';
      let closed = false;
      while (i < source.length) {
        const curr = source[i++];
        if (curr === '\\' && i < source.length) {
          buf += source[i++];
          continue;
        }
        if (curr === '"') {
          closed = true;
          break;
        }
        buf += curr;
      }
      if (!closed) {
        throw new MalformedQueryError('Unterminated quoted phrase', start);
      }
      const phrase = buf.trim().replace(/\s+/g, ' ');
      if (phrase.length === 0) {
        throw new MalformedQueryError('Empty quoted phrase', start);
      }
      tokens.push({ type: 'PHRASE', value: phrase, index: start });
      continue;
    }

    const start = i;
    while (i < source.length && !isWhitespace(source[i]) && !WORD_BREAKS.has(source[i])) {
      i++;
    }
    const value = source.slice(start, i);
    tokens.push({ type: OPERATORS.get(value) ?? 'WORD', value, index: start });
  }

  tokens.push({ type: 'EOF', value: '', index: source.length });
  return tokens;
}
