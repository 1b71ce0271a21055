import { dirname, isAbsolute, resolve } from 'node:path';
import { PARSER_DEFAULTS } from '../config/constants.js';
import {
  IncludeError,
  ParseError,
  ScriptFileError,
  type DiagnosticLog,
  type IncludeFailureReason,
  type SourceLocation,
} from '../errors/index.js';
import { createStructuredLogger, type StructuredLogger } from '../observability/logger.js';
import type { ParsingMetrics } from '../observability/metrics.js';
import { decodeScriptBytes } from './encoding.js';
import { readBytes } from './reader.js';

export interface IncludeProcessorOptions {
  log: DiagnosticLog;
  maxDepth?: number;
  legacyEncoding?: string;
  metrics?: ParsingMetrics;
  logger?: StructuredLogger;
}

const INCLUDE_LINE = new RegExp(`^${PARSER_DEFAULTS.INCLUDE_DIRECTIVE}\\b(.*)$`, 'i');

/**
 * Expands `@include "path"` lines before tokenization.
 *
 * Each directive line becomes
 *
 *   # Included from: path
 *   ...expanded content of path...
 *   # End include: path
 *
 * Failed includes are logged and expand to an empty line.
 */
export class IncludeProcessor {
  private readonly log: DiagnosticLog;
  private readonly maxDepth: number;
  private readonly legacyEncoding: string;
  private readonly metrics?: ParsingMetrics;
  private readonly logger: StructuredLogger;

  constructor(options: IncludeProcessorOptions) {
    this.log = options.log;
    this.maxDepth = options.maxDepth ?? PARSER_DEFAULTS.MAX_INCLUDE_DEPTH;
    this.legacyEncoding = options.legacyEncoding ?? PARSER_DEFAULTS.LEGACY_ENCODING;
    this.metrics = options.metrics;
    this.logger = options.logger ?? createStructuredLogger({ silent: true });
  }

  /**
   * @param filePath path of the file `text` was read from; relative include
   *   paths resolve against its directory
   */
  async process(text: string, filePath: string): Promise<string> {
    const root = resolve(filePath);
    return this.expand(text, root, [root]);
  }

  private async expand(text: string, filePath: string, stack: string[]): Promise<string> {
    const lines = text.split('\n');
    const output: string[] = [];

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const trimmed = line.trim();
      const match = INCLUDE_LINE.exec(trimmed);

      if (!match) {
        output.push(line);
        continue;
      }

      const location: SourceLocation = { line: i + 1, column: line.indexOf('@') + 1 };
      const includePath = unquote(match[1].trim());

      if (!includePath) {
        this.log.warning(
          new ParseError(
            `Empty include path at line ${location.line}, column ${location.column}`,
            location,
            { filePath }
          )
        );
        output.push(line);
        continue;
      }

      const expanded = await this.include(includePath, filePath, stack, location);
      if (expanded === undefined) {
        output.push('');
        continue;
      }

      output.push(`# Included from: ${includePath}`, expanded, `# End include: ${includePath}`);
    }

    return output.join('\n');
  }

  private async include(
    includePath: string,
    fromFile: string,
    stack: string[],
    location: SourceLocation
  ): Promise<string | undefined> {
    const target = isAbsolute(includePath) ? includePath : resolve(dirname(fromFile), includePath);
    const logger = this.logger.child({ include: target, from: fromFile, line: location.line });
    const fail = (message: string, reason: IncludeFailureReason): undefined => {
      this.log.error(new IncludeError(message, reason, target, { location, filePath: fromFile }));
      logger.debug('include:failed', { reason });
      return undefined;
    };

    if (stack.includes(target)) {
      return fail(`Circular include detected: ${[...stack, target].join(' -> ')}`, 'cycle');
    }
    if (stack.length > this.maxDepth) {
      return fail(`Include depth limit of ${this.maxDepth} exceeded at ${target}`, 'depth');
    }

    const span = logger.span('include', { depth: stack.length });
    let content: string;
    try {
      content = decodeScriptBytes(await readBytes(target), this.legacyEncoding, target).text;
    } catch (error) {
      if (!(error instanceof ScriptFileError)) throw error;
      return error.code === 'ENOENT'
        ? fail(`Include file not found: ${includePath}`, 'not-found')
        : fail(`Cannot read include file ${includePath}: ${error.message}`, 'read');
    }

    const expanded = await this.expand(content, target, [...stack, target]);

    this.metrics?.increment('includesProcessed');
    this.metrics?.recordTiming(`include:${includePath}`, span.end());

    return expanded;
  }
}

function unquote(text: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(text);
  return (quoted ? quoted[2] : text).trim();
}
