import type { ObjectNode } from '../ast/nodes.js';
import type { Diagnostic } from '../errors/index.js';
import type { ParsingMetrics } from '../observability/metrics.js';
import { GenericParser } from '../parser/generic-parser.js';
import type { ParseFileOptions, ScriptParserOptions } from '../parser/script-parser.js';

export { readScriptFile, type ReadScriptOptions } from './reader.js';
export {
  detectEncoding,
  decodeScriptBytes,
  isSupportedEncoding,
  type DetectedEncoding,
  type DecodedScript,
} from './encoding.js';
export { IncludeProcessor, type IncludeProcessorOptions } from './includes.js';

export interface ParseResult {
  root: ObjectNode;
  errors: string[];
  warnings: string[];
  diagnostics: readonly Diagnostic[];
  metrics: ParsingMetrics;
}

export type ParseScriptFileOptions = ScriptParserOptions & ParseFileOptions;

/**
 * Parse script text into a generic tree.
 *
 * @example
 * const { root, errors } = parseScript('owner = FRA\ncapital = 183');
 */
export function parseScript(text: string, options: ScriptParserOptions = {}): ParseResult {
  const parser = new GenericParser(options);
  const root = parser.parse(text);
  return toResult(parser, root);
}

/**
 * Read, decode and parse a script file, expanding `@include` directives.
 *
 * @throws ScriptFileError when the file is missing or unreadable
 */
export async function parseScriptFile(
  path: string,
  options: ParseScriptFileOptions = {}
): Promise<ParseResult> {
  const { resolveIncludes, ...parserOptions } = options;
  const parser = new GenericParser(parserOptions);
  const root = await parser.parseFile(path, { resolveIncludes });
  return toResult(parser, root);
}

/**
 * Parse several files concurrently, one parser per file. Results keep the
 * order of `paths`; a missing file rejects the whole batch.
 */
export async function parseScriptFiles(
  paths: readonly string[],
  options: ParseScriptFileOptions = {}
): Promise<ParseResult[]> {
  return Promise.all(paths.map((path) => parseScriptFile(path, options)));
}

function toResult(parser: GenericParser, root: ObjectNode): ParseResult {
  return {
    root,
    errors: parser.errors,
    warnings: parser.warnings,
    diagnostics: parser.diagnostics,
    metrics: parser.metrics,
  };
}
