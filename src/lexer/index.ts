/**
 * Lexer module: turns script text into a flat token sequence.
 */
export { PdxLexer, tokenize } from './lexer.js';
export { PdxTokenType, isOperatorToken, isValueToken, formatToken, type Token } from './tokens.js';
