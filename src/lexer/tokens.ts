export enum PdxTokenType {
  IDENTIFIER = 'IDENTIFIER',
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  DATE = 'DATE',
  YES = 'YES',
  NO = 'NO',

  // Operators
  EQUALS = 'EQUALS', // =
  GT = 'GT', // >
  LT = 'LT', // <
  GTE = 'GTE', // >=
  LTE = 'LTE', // <=
  NOT_EQUALS = 'NOT_EQUALS', // !=

  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',

  COMMENT = 'COMMENT',
  // { r g b }
  COLOR = 'COLOR',
  EOF = 'EOF',
}

export interface Token {
  type: PdxTokenType;
  /** Literal text; quotes and `#` are stripped from strings and comments */
  value: string;
  line: number;
  column: number;
  /** Index of the first character in the source text */
  offset: number;
}

const OPERATOR_TYPES: ReadonlySet<PdxTokenType> = new Set([
  PdxTokenType.EQUALS,
  PdxTokenType.GT,
  PdxTokenType.LT,
  PdxTokenType.GTE,
  PdxTokenType.LTE,
  PdxTokenType.NOT_EQUALS,
]);

const VALUE_TYPES: ReadonlySet<PdxTokenType> = new Set([
  PdxTokenType.STRING,
  PdxTokenType.NUMBER,
  PdxTokenType.DATE,
  PdxTokenType.IDENTIFIER,
  PdxTokenType.YES,
  PdxTokenType.NO,
]);

export function isOperatorToken(token: Token): boolean {
  return OPERATOR_TYPES.has(token.type);
}

/** Tokens that can stand on the right of `=` (colour literals are handled apart) */
export function isValueToken(token: Token): boolean {
  return VALUE_TYPES.has(token.type);
}

export function formatToken(token: Token): string {
  return `${token.type}: ${token.value} at [${token.line}:${token.column}]`;
}
