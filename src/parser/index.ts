/**
 * Parser module exports
 *
 * The parser is organized in layers:
 * - PdxParserBase: Token cursor, diagnostics, list helpers
 * - TreeBuilder: Generic tree grammar with error recovery
 * - ScriptParser: Read/decode/include/tokenize pipeline around a grammar
 * - GenericParser: ScriptParser producing the generic tree
 */
export { PdxParserBase, describeToken, type ParserContext } from './base.js';
export { TreeBuilder, type TreeBuilderOptions } from './tree-builder.js';
export {
  ScriptParser,
  type ScriptParserOptions,
  type ScriptParseContext,
  type ParseFileOptions,
  type TryParseResult,
} from './script-parser.js';
export { GenericParser } from './generic-parser.js';
