export { PdxLexer, tokenize, PdxTokenType, isOperatorToken, isValueToken, formatToken, type Token } from './lexer/index.js';
export * from './ast/index.js';
export {
  PdxParserBase,
  TreeBuilder,
  ScriptParser,
  GenericParser,
  describeToken,
  type ParserContext,
  type TreeBuilderOptions,
  type ScriptParserOptions,
  type ScriptParseContext,
  type ParseFileOptions,
  type TryParseResult,
} from './parser/index.js';
export {
  parseScript,
  parseScriptFile,
  parseScriptFiles,
  readScriptFile,
  detectEncoding,
  decodeScriptBytes,
  isSupportedEncoding,
  IncludeProcessor,
  type ParseResult,
  type ParseScriptFileOptions,
  type ReadScriptOptions,
  type DetectedEncoding,
  type DecodedScript,
  type IncludeProcessorOptions,
} from './loader/index.js';
export {
  ScriptError,
  ParseError,
  DateFormatError,
  IncludeError,
  ScriptFileError,
  EncodingError,
  InvalidNodeOperationError,
  DiagnosticLog,
  formatErrors,
  getSourceLine,
  type SourceLocation,
  type ErrorContext,
  type IncludeFailureReason,
  type Diagnostic,
  type DiagnosticSeverity,
} from './errors/index.js';
export {
  PARSER_DEFAULTS,
  DATE_LIMITS,
  RGB_LIMITS,
  resolveParserConfig,
  type ParserConfig,
} from './config/constants.js';
export { loadParserConfig, type EnvConfigOptions, type LoadParserConfigResult } from './config/env.js';
export * from './observability/index.js';
export * from './utils/index.js';
