import { isValidDateText } from '../ast/date.js';
import { RGB_LIMITS } from '../config/constants.js';
import { PdxTokenType, type Token } from './tokens.js';

/** Saved cursor state for speculative scans */
interface Checkpoint {
  pos: number;
  line: number;
  column: number;
}

export class PdxLexer {
  private source: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.rollback({ pos: 0, line: 1, column: 1 });
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      const token = this.nextToken();
      if (token) {
        tokens.push(token);
      }
    }

    tokens.push(this.makeToken(PdxTokenType.EOF, '', this.checkpoint()));
    return tokens;
  }

  private nextToken(): Token | null {
    this.skipWhitespace();

    if (this.isAtEnd()) return null;

    const start = this.checkpoint();
    const char = this.peek();

    if (char === '#') return this.readComment(start);

    if (char === '"') return this.readString(start);

    if (char === '=') {
      this.advance();
      return this.makeToken(PdxTokenType.EQUALS, '=', start);
    }

    if (char === '{') {
      const color = this.tryReadColor(start);
      if (color) return color;
      this.advance();
      return this.makeToken(PdxTokenType.LBRACE, '{', start);
    }

    if (char === '}') {
      this.advance();
      return this.makeToken(PdxTokenType.RBRACE, '}', start);
    }

    if (char === '>' || char === '<') {
      this.advance();
      if (this.peek() === '=') {
        this.advance();
        return char === '>'
          ? this.makeToken(PdxTokenType.GTE, '>=', start)
          : this.makeToken(PdxTokenType.LTE, '<=', start);
      }
      return char === '>'
        ? this.makeToken(PdxTokenType.GT, '>', start)
        : this.makeToken(PdxTokenType.LT, '<', start);
    }

    if (char === '!') {
      this.advance();
      if (this.peek() === '=') {
        this.advance();
        return this.makeToken(PdxTokenType.NOT_EQUALS, '!=', start);
      }
      // A lone '!' is not a token
      return null;
    }

    if (this.isDigit(char) || (char === '-' && this.isDigit(this.peekNext()))) {
      return this.readNumberOrDate(start);
    }

    if (this.isIdentifierStart(char)) return this.readIdentifier(start);

    // Unknown character, skip it
    this.advance();
    return null;
  }

  private readComment(start: Checkpoint): Token {
    this.advance(); // consume '#'

    let value = '';
    while (!this.isAtEnd() && this.peek() !== '\n') {
      value += this.advance();
    }

    return this.makeToken(PdxTokenType.COMMENT, value.trim(), start);
  }

  private readString(start: Checkpoint): Token {
    this.advance(); // consume opening quote

    let value = '';
    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\' && this.peekNext() === '"') {
        this.advance();
        value += this.advance();
      } else {
        value += this.advance();
      }
    }

    // Unterminated strings run to the end of input
    if (!this.isAtEnd()) this.advance();

    return this.makeToken(PdxTokenType.STRING, value, start);
  }

  private readNumberOrDate(start: Checkpoint): Token {
    let value = '';

    if (this.peek() === '-') {
      value += this.advance();
    }

    while (this.isDigit(this.peek()) || this.peek() === '.') {
      value += this.advance();
    }

    const type = isValidDateText(value) ? PdxTokenType.DATE : PdxTokenType.NUMBER;
    return this.makeToken(type, value, start);
  }

  private readIdentifier(start: Checkpoint): Token {
    let value = '';

    while (this.isIdentifierPart(this.peek())) {
      value += this.advance();
    }

    const lower = value.toLowerCase();
    if (lower === 'yes') return this.makeToken(PdxTokenType.YES, value, start);
    if (lower === 'no') return this.makeToken(PdxTokenType.NO, value, start);

    if (this.peek() === '.') {
      const date = this.tryReadDateSuffix(value, start);
      if (date) return date;
    }

    return this.makeToken(PdxTokenType.IDENTIFIER, value, start);
  }

  /**
   * Try to extend `prefix` with `.MONTH.DAY`. Rolls back and returns null
   * when the combined text is not a valid date.
   */
  private tryReadDateSuffix(prefix: string, start: Checkpoint): Token | null {
    const saved = this.checkpoint();
    let text = prefix + this.advance(); // consume '.'

    while (this.isDigit(this.peek())) {
      text += this.advance();
    }

    if (this.peek() === '.') {
      text += this.advance();
      while (this.isDigit(this.peek())) {
        text += this.advance();
      }

      if (isValidDateText(text)) {
        return this.makeToken(PdxTokenType.DATE, text, start);
      }
    }

    this.rollback(saved);
    return null;
  }

  /**
   * Scan `{ r g b }` with each component in [0, 255]. The brace group is
   * rejected when another number follows the closing brace, so that numeric
   * lists are not taken for colours. Rolls back and returns null on failure.
   */
  private tryReadColor(start: Checkpoint): Token | null {
    this.advance(); // consume '{'
    this.skipWhitespace();

    for (let i = 0; i < RGB_LIMITS.COMPONENTS; i++) {
      if (!this.isDigit(this.peek())) return this.abandon(start);

      let digits = '';
      while (this.isDigit(this.peek())) {
        digits += this.advance();
      }

      const component = Number(digits);
      if (component < RGB_LIMITS.MIN || component > RGB_LIMITS.MAX) return this.abandon(start);

      if (i < RGB_LIMITS.COMPONENTS - 1) {
        this.skipWhitespace();
        if (this.isAtEnd()) return this.abandon(start);
      }
    }

    this.skipWhitespace();
    if (this.peek() !== '}') return this.abandon(start);

    let next = this.pos + 1;
    while (next < this.source.length && this.isWhitespace(this.source[next])) {
      next++;
    }
    if (next < this.source.length && this.isDigit(this.source[next])) return this.abandon(start);

    this.advance(); // consume '}'
    return this.makeToken(PdxTokenType.COLOR, this.source.slice(start.pos, this.pos), start);
  }

  private abandon(checkpoint: Checkpoint): null {
    this.rollback(checkpoint);
    return null;
  }

  private checkpoint(): Checkpoint {
    return { pos: this.pos, line: this.line, column: this.column };
  }

  private rollback(checkpoint: Checkpoint): void {
    this.pos = checkpoint.pos;
    this.line = checkpoint.line;
    this.column = checkpoint.column;
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  private makeToken(type: PdxTokenType, value: string, start: Checkpoint): Token {
    return { type, value, line: start.line, column: start.column, offset: start.pos };
  }

  private peek(): string {
    return this.source[this.pos] ?? '\0';
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? '\0';
  }

  private advance(): string {
    const char = this.source[this.pos] ?? '';
    this.pos++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isWhitespace(char: string): boolean {
    return /\s/.test(char);
  }

  private isIdentifierStart(char: string): boolean {
    return char === '_' || /\p{L}/u.test(char);
  }

  private isIdentifierPart(char: string): boolean {
    return this.isIdentifierStart(char) || this.isDigit(char) || char === ':';
  }
}

/**
 * Tokenize script text. The result always ends with a single EOF token.
 */
export function tokenize(source: string): Token[] {
  return new PdxLexer(source).tokenize();
}
