import { PdxTokenType, isValueToken, type Token } from '../lexer/tokens.js';
import {
  addChild,
  addChildAccumulating,
  addItem,
  createDate,
  createList,
  createObject,
  createScalar,
  parseDate,
  type ContainerNode,
  type ListNode,
  type ObjectNode,
  type PdxNode,
  type ScalarNode,
} from '../ast/index.js';
import type { StringInterner } from '../utils/string-pool.js';
import { PdxParserBase, describeToken, type ParserContext } from './base.js';

export interface TreeBuilderOptions {
  rootKey: string;
  /** Repeated keys become a list instead of replacing the earlier value */
  accumulateDuplicates: boolean;
  interner?: StringInterner;
}

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Builds a generic tree from script tokens.
 *
 * Grammar:
 *   document  := statement*
 *   statement := (IDENTIFIER | DATE) '=' value
 *   value     := '{' body '}' | scalar | COLOR
 *   body      := statement* | item*
 *
 * A body whose own level holds values and no operator is read as a list.
 */
export class TreeBuilder extends PdxParserBase {
  private options: TreeBuilderOptions;

  constructor(tokens: Token[], context: ParserContext, options: TreeBuilderOptions) {
    super(tokens, context);
    this.options = options;
  }

  build(): ObjectNode {
    const root = createObject(this.options.rootKey);

    while (!this.isAtEnd()) {
      this.skipComments();
      if (this.isAtEnd()) break;

      const node = this.parseStatement(false);
      if (node) this.insert(root, node);
    }

    return root;
  }

  // ============================================
  // Statements
  // ============================================

  private parseStatement(nested: boolean): PdxNode | null {
    const keyToken = this.peek();

    if (keyToken.type !== PdxTokenType.IDENTIFIER && keyToken.type !== PdxTokenType.DATE) {
      this.error(`Unexpected ${describeToken(keyToken)}, expected a key`, keyToken);
      if (keyToken.type === PdxTokenType.LBRACE) {
        this.skipBalancedBraces();
      } else {
        this.advance();
      }
      this.skipToNextStatement(nested);
      return null;
    }

    this.advance();

    if (!this.check(PdxTokenType.EQUALS)) {
      this.error(`Expected '=' after '${keyToken.value}', found ${describeToken(this.peek())}`);
      this.skipToNextStatement(nested);
      return null;
    }
    this.advance();
    this.skipComments();

    const key = this.intern(keyToken.value);
    const valueToken = this.peek();

    if (valueToken.type === PdxTokenType.LBRACE) {
      this.advance();
      return keyToken.type === PdxTokenType.DATE
        ? this.parseDateBlock(key, valueToken)
        : this.parseBlock(key, valueToken);
    }

    if (isValueToken(valueToken) || valueToken.type === PdxTokenType.COLOR) {
      this.advance();
      return this.valueNode(key, valueToken);
    }

    this.error(`Expected a value after '${keyToken.value} =', found ${describeToken(valueToken)}`);

    // A closing brace or the end of input belongs to the enclosing body
    if (valueToken.type !== PdxTokenType.RBRACE && valueToken.type !== PdxTokenType.EOF) {
      this.advance();
      this.skipToNextStatement(nested);
    }
    return null;
  }

  /**
   * Skip to the next token that can start a statement. Inside a body the
   * body's closing brace also stops the skip.
   */
  private skipToNextStatement(nested: boolean): void {
    while (!this.isAtEnd()) {
      const token = this.peek();
      if (token.type === PdxTokenType.IDENTIFIER || token.type === PdxTokenType.DATE) return;
      if (nested && token.type === PdxTokenType.RBRACE) return;

      if (token.type === PdxTokenType.LBRACE) {
        this.skipBalancedBraces();
      } else {
        this.advance();
      }
    }
  }

  // ============================================
  // Bodies
  // ============================================

  private parseBlock(key: string, open: Token): ObjectNode | ListNode {
    if (this.isListBody()) {
      return this.parseListBody(key, open);
    }
    const node = createObject(key);
    this.parseStatements(node, open);
    return node;
  }

  private parseDateBlock(key: string, open: Token): PdxNode {
    const node = createDate(key, parseDate(key));
    this.parseStatements(node, open);
    return node;
  }

  private parseStatements(node: ContainerNode, open: Token): void {
    while (!this.isAtEnd()) {
      this.skipComments();
      if (this.check(PdxTokenType.RBRACE) || this.isAtEnd()) break;

      const child = this.parseStatement(true);
      if (child) this.insert(node, child);
    }
    this.closeBody(node.key, open);
  }

  private parseListBody(key: string, open: Token): ListNode {
    const list = createList(key);

    while (!this.isAtEnd()) {
      this.skipComments();
      if (this.check(PdxTokenType.RBRACE) || this.isAtEnd()) break;

      const token = this.advance();
      if (token.type === PdxTokenType.LBRACE) {
        addItem(list, this.parseBlock('', token));
      } else if (isValueToken(token) || token.type === PdxTokenType.COLOR) {
        addItem(list, this.valueNode('', token));
      } else {
        this.error(`Unexpected ${describeToken(token)} in list '${key}'`, token);
      }
    }

    this.closeBody(key, open);
    return list;
  }

  private closeBody(key: string, open: Token): void {
    if (this.match(PdxTokenType.RBRACE)) return;

    const label = key ? `'${key}'` : 'block';
    this.error(
      `Expected '}' to close ${label} opened at line ${open.line}, column ${open.column}, found ${describeToken(this.peek())}`
    );
  }

  /**
   * Look ahead from just after a '{': true when the body's own level holds
   * at least one value and no operator before its closing brace.
   */
  private isListBody(): boolean {
    let depth = 0;
    let sawItem = false;

    for (let i = this.pos; i < this.tokens.length; i++) {
      const token = this.tokens[i];

      switch (token.type) {
        case PdxTokenType.LBRACE:
          if (depth === 0) sawItem = true;
          depth++;
          break;
        case PdxTokenType.RBRACE:
          if (depth === 0) return sawItem;
          depth--;
          break;
        case PdxTokenType.EOF:
          return false;
        case PdxTokenType.COMMENT:
          break;
        case PdxTokenType.EQUALS:
        case PdxTokenType.GT:
        case PdxTokenType.LT:
        case PdxTokenType.GTE:
        case PdxTokenType.LTE:
        case PdxTokenType.NOT_EQUALS:
          if (depth === 0) return false;
          break;
        default:
          if (depth === 0) sawItem = true;
      }
    }

    return false;
  }

  // ============================================
  // Values
  // ============================================

  private valueNode(key: string, token: Token): PdxNode {
    switch (token.type) {
      case PdxTokenType.STRING:
        return createScalar(key, this.intern(token.value), 'text');
      case PdxTokenType.NUMBER:
        return this.numberNode(key, token.value);
      case PdxTokenType.YES:
        return createScalar(key, true, 'boolean');
      case PdxTokenType.NO:
        return createScalar(key, false, 'boolean');
      case PdxTokenType.DATE:
        return createScalar(key, parseDate(token.value), 'date');
      case PdxTokenType.COLOR:
        return this.colorNode(key, token);
      default:
        return this.identifierNode(key, token.value);
    }
  }

  private numberNode(key: string, text: string): ScalarNode {
    if (INTEGER.test(text)) {
      const value = Number(text);
      if (Number.isSafeInteger(value)) return createScalar(key, value, 'integer');
    }
    if (FLOAT.test(text)) {
      return createScalar(key, Number(text), 'float');
    }
    // e.g. version strings like 1.2.3.4
    return createScalar(key, this.intern(text), 'text');
  }

  private identifierNode(key: string, text: string): ScalarNode {
    switch (text.toLowerCase()) {
      case 'true':
        return createScalar(key, true, 'boolean');
      case 'false':
        return createScalar(key, false, 'boolean');
      default:
        return createScalar(key, this.intern(text), 'text');
    }
  }

  // color = { 255 128 0 } => [255, 128, 0]
  private colorNode(key: string, token: Token): ListNode {
    const components = token.value.replace(/[{}]/g, ' ').trim().split(/\s+/);
    return createList(
      key,
      components.map((c) => createScalar('', Number(c), 'integer'))
    );
  }

  private insert(container: ContainerNode, node: PdxNode): void {
    if (this.options.accumulateDuplicates) {
      addChildAccumulating(container, node);
    } else {
      addChild(container, node);
    }
  }

  private intern(value: string): string {
    return this.options.interner ? this.options.interner.intern(value) : value;
  }
}
