import { createObject, type ObjectNode } from '../ast/nodes.js';
import type { Token } from '../lexer/tokens.js';
import { ScriptParser, type ScriptParseContext } from './script-parser.js';
import { TreeBuilder } from './tree-builder.js';

/**
 * Parses any script into a generic tree under a synthetic root object.
 *
 * @example
 * const parser = new GenericParser();
 * const root = parser.parse('owner = FRA');
 * getValue(root, 'owner', '') // => 'FRA'
 */
export class GenericParser extends ScriptParser<ObjectNode> {
  protected parseTokens(tokens: Token[], context: ScriptParseContext): ObjectNode {
    const builder = new TreeBuilder(tokens, context, {
      rootKey: context.config.rootKey,
      accumulateDuplicates: context.config.accumulateDuplicates,
      interner: context.interner,
    });
    return builder.build();
  }

  protected createEmpty(): ObjectNode {
    return createObject(this.config.rootKey);
  }
}
