import { resolve } from 'node:path';
import { resolveParserConfig, type ParserConfig } from '../config/constants.js';
import {
  DiagnosticLog,
  ScriptError,
  type Diagnostic,
} from '../errors/index.js';
import { tokenize } from '../lexer/lexer.js';
import type { Token } from '../lexer/tokens.js';
import { IncludeProcessor } from '../loader/includes.js';
import { readScriptFile } from '../loader/reader.js';
import { createStructuredLogger, type Span, type StructuredLogger } from '../observability/logger.js';
import { ParsingMetrics } from '../observability/metrics.js';
import type { StringInterner } from '../utils/string-pool.js';
import type { ParserContext } from './base.js';

export interface ScriptParserOptions {
  config?: ParserConfig;
  /**
   * Defaults to a logger writing `config.logFormat` output when
   * `config.logLevel` is set, and to a silent one otherwise
   */
  logger?: StructuredLogger;
  interner?: StringInterner;
}

export interface ParseFileOptions {
  /** Overrides `config.resolveIncludes` for this call */
  resolveIncludes?: boolean;
}

/** Everything a grammar needs to turn tokens into a value */
export interface ScriptParseContext extends ParserContext {
  config: Required<ParserConfig>;
  metrics: ParsingMetrics;
  logger: StructuredLogger;
  interner?: StringInterner;
}

export type TryParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; error: string };

/**
 * Shared pipeline of every script parser: read, decode, expand includes,
 * tokenize, then hand the tokens to the grammar.
 *
 * Subclasses supply the grammar through {@link parseTokens} and the value
 * for empty or failed input through {@link createEmpty}. Errors, warnings
 * and metrics describe the most recent call and are reset by every entry
 * point.
 */
export abstract class ScriptParser<T> {
  protected readonly config: Required<ParserConfig>;
  protected readonly logger: StructuredLogger;
  protected readonly interner?: StringInterner;

  private readonly log = new DiagnosticLog();
  private readonly parsingMetrics = new ParsingMetrics();

  constructor(options: ScriptParserOptions = {}) {
    this.config = resolveParserConfig(options.config);
    this.logger =
      options.logger ??
      createStructuredLogger({
        prefix: 'pdx',
        level: this.config.logLevel,
        format: this.config.logFormat,
        silent: options.config?.logLevel === undefined,
      });
    this.interner = options.interner;
  }

  protected abstract parseTokens(tokens: Token[], context: ScriptParseContext): T;

  protected abstract createEmpty(): T;

  parse(text: string): T {
    const span = this.logger.span('parse');
    this.begin();
    try {
      return this.run(text, span, this.logger);
    } finally {
      this.finish(span, this.logger);
    }
  }

  /**
   * Parse a file, expanding `@include` directives unless disabled
   *
   * @throws ScriptFileError when the file is missing or unreadable
   */
  async parseFile(path: string, options: ParseFileOptions = {}): Promise<T> {
    const filePath = resolve(path);
    const logger = this.logger.child({ file: filePath });
    const span = logger.span('parseFile');
    this.begin();

    try {
      const io = span.child('read');
      const decoded = await readScriptFile(filePath, { legacyEncoding: this.config.legacyEncoding });
      logger.info('file:read', { encoding: decoded.encoding });

      let text = decoded.text;
      if (options.resolveIncludes ?? this.config.resolveIncludes) {
        const includes = new IncludeProcessor({
          log: this.log,
          maxDepth: this.config.maxIncludeDepth,
          legacyEncoding: this.config.legacyEncoding,
          metrics: this.parsingMetrics,
          logger,
        });
        text = await includes.process(text, filePath);
      }
      this.parsingMetrics.fileIoMs = io.end();

      return this.run(text, span, logger, filePath);
    } finally {
      this.finish(span, logger);
    }
  }

  /** `error` joins every error message of the call with `; ` */
  tryParse(text: string): TryParseResult<T> {
    const value = this.parse(text);
    const errors = this.log.errors;
    return errors.length === 0 ? { ok: true, value } : { ok: false, value, error: errors.join('; ') };
  }

  /**
   * Parse several documents as one call: diagnostics and metrics cover all of them
   */
  parseMany(texts: Iterable<string>): T[] {
    const span = this.logger.span('parseMany');
    this.begin();
    try {
      const results: T[] = [];
      for (const text of texts) {
        results.push(this.run(text, span, this.logger));
      }
      span.addContext({ documents: results.length });
      return results;
    } finally {
      this.finish(span, this.logger);
    }
  }

  get errors(): string[] {
    return this.log.errors;
  }

  get warnings(): string[] {
    return this.log.warnings;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.log.diagnostics;
  }

  get hasErrors(): boolean {
    return this.log.errorCount > 0;
  }

  get hasWarnings(): boolean {
    return this.log.warningCount > 0;
  }

  get metrics(): ParsingMetrics {
    return this.parsingMetrics;
  }

  private begin(): void {
    this.log.clear();
    this.parsingMetrics.reset();
    this.parsingMetrics.heapBefore = process.memoryUsage().heapUsed;
  }

  private run(text: string, span: Span, logger: StructuredLogger, filePath?: string): T {
    const metrics = this.parsingMetrics;
    metrics.inputSizeBytes += Buffer.byteLength(text, 'utf8');

    if (text.trim() === '') {
      return this.createEmpty();
    }

    metrics.linesProcessed += text.split('\n').length;

    try {
      const lex = span.child('tokenize');
      const tokens = tokenize(text);
      lex.addContext({ tokens: tokens.length });
      metrics.tokenizationMs += lex.end();
      metrics.tokensProcessed += tokens.length;

      const build = span.child('build');
      const result = this.parseTokens(tokens, {
        log: this.log,
        source: text,
        filePath,
        config: this.config,
        metrics,
        logger,
        interner: this.interner,
      });
      metrics.parsingMs += build.end();
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error(new ScriptError(`Parse error: ${message}`, undefined, filePath ? { filePath } : undefined));
      return this.createEmpty();
    }
  }

  private finish(span: Span, logger: StructuredLogger): void {
    const metrics = this.parsingMetrics;
    metrics.heapAfter = process.memoryUsage().heapUsed;
    metrics.errorCount = this.log.errorCount;
    metrics.warningCount = this.log.warningCount;

    for (const { severity, error } of this.log.diagnostics) {
      const context = { kind: error.name, ...(error.location ?? {}) };
      if (severity === 'error') {
        logger.error(error.message, context);
      } else {
        logger.warn(error.message, context);
      }
    }

    span.addContext({
      tokens: metrics.tokensProcessed,
      errors: metrics.errorCount,
      warnings: metrics.warningCount,
    });
    span.end();
  }
}
