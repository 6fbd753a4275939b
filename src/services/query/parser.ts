/**
 * Boolean Query Parser
 *
 * Recursive descent over the lexer's tokens. Precedence, lowest first:
 *   or    := and ('OR' and)*
 *   and   := not (('AND')? not)*        adjacent operands are implicitly AND-ed
 *   not   := 'NOT' not | primary
 *   primary := WORD | PHRASE | '(' or ')'
 *
 * @module services/query/parser
 */

import { MalformedQueryError } from '../gallica/errors.js';
import { tokenize, type Token, type TokenType } from './lexer.js';

export type QueryNode =
  | { kind: 'term'; value: string }
  | { kind: 'phrase'; value: string }
  | { kind: 'and'; children: QueryNode[] }
  | { kind: 'or'; children: QueryNode[] }
  | { kind: 'not'; operand: QueryNode }
  | { kind: 'group'; expression: QueryNode };

const EXPRESSION_STARTS: ReadonlySet<TokenType> = new Set(['WORD', 'PHRASE', 'LPAREN', 'NOT']);

/**
 * Parse caller query text into an expression tree.
 *
 * @throws MalformedQueryError when the text is blank, parentheses do not balance,
 * or an operator lacks an operand
 */
export function parseQuery(source: string): QueryNode {
  const tokens = tokenize(source);
  if (tokens.length === 1) {
    throw new MalformedQueryError('Query is empty');
  }
  return new Parser(tokens).parse();
}

class Parser {
  private current = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): QueryNode {
    const node = this.orExpression();
    const next = this.peek();
    if (next.type === 'RPAREN') {
      throw new MalformedQueryError('Closing parenthesis without a matching opening one', next.index);
    }
    if (next.type !== 'EOF') {
      throw new MalformedQueryError(`Unexpected token '${next.value}'`, next.index);
    }
    return node;
  }

  private orExpression(): QueryNode {
    const children = [this.andExpression()];
    while (this.match('OR')) {
      children.push(this.andExpression());
    }
    return children.length === 1 ? children[0] : { kind: 'or', children };
  }

  private andExpression(): QueryNode {
    const children = [this.notExpression()];
    for (;;) {
      if (this.match('AND')) {
        children.push(this.notExpression());
      } else if (EXPRESSION_STARTS.has(this.peek().type)) {
        children.push(this.notExpression());
      } else {
        break;
      }
    }
    return children.length === 1 ? children[0] : { kind: 'and', children };
  }

  private notExpression(): QueryNode {
    if (this.match('NOT')) {
      return { kind: 'not', operand: this.notExpression() };
    }
    return this.primary();
  }

  private primary(): QueryNode {
    const token = this.peek();

    switch (token.type) {
      case 'WORD':
        this.advance();
        return { kind: 'term', value: token.value };
      case 'PHRASE':
        this.advance();
        return { kind: 'phrase', value: token.value };
      case 'LPAREN': {
        this.advance();
        if (this.peek().type === 'RPAREN') {
          throw new MalformedQueryError('Empty parentheses', token.index);
        }
        const expression = this.orExpression();
        if (!this.match('RPAREN')) {
          throw new MalformedQueryError('Missing closing parenthesis', token.index);
        }
        return { kind: 'group', expression };
      }
      case 'RPAREN':
        throw new MalformedQueryError(this.missingOperandMessage(), token.index);
      case 'AND':
      case 'OR':
        throw new MalformedQueryError(
          `Operator '${token.value}' is missing its left operand`,
          token.index
        );
      default:
        throw new MalformedQueryError(this.missingOperandMessage(), token.index);
    }
  }

  /** Error text for a position where an operand was expected but none follows */
  private missingOperandMessage(): string {
    const previous = this.current > 0 ? this.tokens[this.current - 1] : undefined;
    if (previous && (previous.type === 'AND' || previous.type === 'OR' || previous.type === 'NOT')) {
      return `Operator '${previous.value}' is missing its right operand`;
    }
    return 'Expected a term, phrase or parenthesized group';
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private advance(): Token {
    const token = this.tokens[this.current];
    if (token.type !== 'EOF') {
      this.current++;
    }
    return token;
  }

  private match(type: TokenType): boolean {
    if (this.peek().type === type) {
      this.advance();
      return true;
    }
    return false;
  }
}
