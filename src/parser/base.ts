import { PdxTokenType, type Token } from '../lexer/tokens.js';
import { ParseError, type DiagnosticLog, type ErrorContext } from '../errors/index.js';

export interface ParserContext {
  log: DiagnosticLog;
  source?: string;
  filePath?: string;
}

const INTEGER = /^-?\d+$/;

/**
 * Token cursor shared by every grammar built on the lexer.
 *
 * Structural problems are logged to the diagnostic log instead of thrown,
 * so a grammar can keep going after a malformed statement.
 */
export class PdxParserBase {
  protected tokens: Token[];
  protected pos = 0;
  protected log: DiagnosticLog;
  protected source?: string;
  protected filePath?: string;

  constructor(tokens: Token[], context: ParserContext) {
    this.tokens = tokens;
    const last = tokens[tokens.length - 1];
    if (!last || last.type !== PdxTokenType.EOF) {
      this.tokens = [
        ...tokens,
        {
          type: PdxTokenType.EOF,
          value: '',
          line: last?.line ?? 1,
          column: last ? last.column + last.value.length : 1,
          offset: last ? last.offset + last.value.length : 0,
        },
      ];
    }
    this.log = context.log;
    this.source = context.source;
    this.filePath = context.filePath;
  }

  protected peek(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  protected peekNext(): Token {
    return this.tokens[Math.min(this.pos + 1, this.tokens.length - 1)];
  }

  protected check(type: PdxTokenType): boolean {
    return this.peek().type === type;
  }

  protected checkAny(...types: PdxTokenType[]): boolean {
    return types.some((t) => this.check(t));
  }

  protected match(type: PdxTokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  protected advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) this.pos++;
    return token;
  }

  /**
   * Consume a token of the given type, or log an error and leave the cursor in place
   */
  protected expect(type: PdxTokenType, what: string): boolean {
    if (this.match(type)) return true;
    this.error(`Expected ${what}, found ${describeToken(this.peek())}`);
    return false;
  }

  protected isAtEnd(): boolean {
    return this.peek().type === PdxTokenType.EOF;
  }

  protected skipComments(): void {
    while (this.check(PdxTokenType.COMMENT)) {
      this.advance();
    }
  }

  /**
   * Skip a `{ ... }` group as one unit, nested groups included
   */
  protected skipBalancedBraces(): void {
    if (!this.match(PdxTokenType.LBRACE)) return;

    let depth = 1;
    while (!this.isAtEnd() && depth > 0) {
      const token = this.advance();
      if (token.type === PdxTokenType.LBRACE) depth++;
      else if (token.type === PdxTokenType.RBRACE) depth--;
    }
  }

  protected error(message: string, token: Token = this.peek()): void {
    this.log.error(this.diagnostic(message, token));
  }

  protected warn(message: string, token: Token = this.peek()): void {
    this.log.warning(this.diagnostic(message, token));
  }

  private diagnostic(message: string, token: Token): ParseError {
    const context: ErrorContext | undefined = this.source
      ? { source: this.source, filePath: this.filePath }
      : this.filePath
        ? { filePath: this.filePath }
        : undefined;

    return new ParseError(
      `${message} at line ${token.line}, column ${token.column}`,
      { line: token.line, column: token.column },
      context,
      token.value || undefined
    );
  }

  protected savePosition(): number {
    return this.pos;
  }

  protected restorePosition(saved: number): void {
    this.pos = saved;
  }

  // ============================================
  // Reusable list helpers for specialized grammars
  // ============================================

  /**
   * `{ a "b" 3 }` => ['a', 'b', '3']
   */
  protected parseStringList(): string[] {
    const list: string[] = [];
    if (!this.expect(PdxTokenType.LBRACE, "'{'")) return list;

    while (!this.check(PdxTokenType.RBRACE) && !this.isAtEnd()) {
      const token = this.advance();
      switch (token.type) {
        case PdxTokenType.IDENTIFIER:
        case PdxTokenType.STRING:
        case PdxTokenType.NUMBER:
          list.push(token.value);
          break;
        case PdxTokenType.COMMENT:
          break;
        default:
          this.warn(`Unexpected token in list: ${describeToken(token)}`, token);
      }
    }

    this.expect(PdxTokenType.RBRACE, "'}'");
    return list;
  }

  /**
   * `{ 1 2 3 }` => [1, 2, 3]. A three-number group lexed as a colour is accepted too.
   */
  protected parseIntegerList(): number[] {
    if (this.check(PdxTokenType.COLOR)) {
      return this.advance().value.replace(/[{}]/g, ' ').trim().split(/\s+/).map(Number);
    }

    const list: number[] = [];
    if (!this.expect(PdxTokenType.LBRACE, "'{'")) return list;

    while (!this.check(PdxTokenType.RBRACE) && !this.isAtEnd()) {
      const token = this.advance();
      if (token.type === PdxTokenType.COMMENT) continue;

      if (token.type !== PdxTokenType.NUMBER) {
        this.warn(`Expected number in integer list, got ${describeToken(token)}`, token);
      } else if (INTEGER.test(token.value)) {
        list.push(Number(token.value));
      } else {
        this.warn(`Cannot parse integer: '${token.value}'`, token);
      }
    }

    this.expect(PdxTokenType.RBRACE, "'}'");
    return list;
  }

  /**
   * `{ a = 1 b = 2 }` => Map { a => 1, b => 2 }
   */
  protected parseStringIntegerMap(): Map<string, number> {
    const map = new Map<string, number>();
    if (!this.expect(PdxTokenType.LBRACE, "'{'")) return map;

    while (!this.check(PdxTokenType.RBRACE) && !this.isAtEnd()) {
      const keyToken = this.advance();
      if (keyToken.type === PdxTokenType.COMMENT) continue;

      if (keyToken.type !== PdxTokenType.IDENTIFIER && keyToken.type !== PdxTokenType.STRING) {
        this.warn(`Expected string key, got ${describeToken(keyToken)}`, keyToken);
        continue;
      }

      if (!this.expect(PdxTokenType.EQUALS, `'=' after '${keyToken.value}'`)) continue;

      const valueToken = this.peek();
      if (valueToken.type === PdxTokenType.NUMBER && INTEGER.test(valueToken.value)) {
        map.set(keyToken.value, Number(valueToken.value));
        this.advance();
      } else if (valueToken.type !== PdxTokenType.RBRACE) {
        this.warn(`Expected integer value, got ${describeToken(valueToken)}`, valueToken);
        this.advance();
      } else {
        this.warn(`Expected integer value, got ${describeToken(valueToken)}`, valueToken);
      }
    }

    this.expect(PdxTokenType.RBRACE, "'}'");
    return map;
  }
}

export function describeToken(token: Token): string {
  if (token.type === PdxTokenType.EOF) return 'end of input';
  return `${token.type} '${token.value}'`;
}
