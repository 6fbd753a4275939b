/**
 * Query compilation - barrel export
 */

export { tokenize, type Token, type TokenType } from './lexer.js';
export { parseQuery, type QueryNode } from './parser.js';
export {
  compileQuery,
  compileSnippetQuery,
  escapeCqlLiteral,
  resolveDocTypeCode,
  DOC_TYPE_CODES,
} from './compiler.js';
