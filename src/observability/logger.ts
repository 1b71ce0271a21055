/**
 * Structured logging for parser runs
 *
 * A logger carries a context record that {@link StructuredLogger.child}
 * extends, so the file being parsed or the include being expanded is
 * attached once and shows up on every entry below it. Spans time one stage
 * of a run; their duration feeds the parsing metrics and, at debug level,
 * the log.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Rendering of the built-in output */
export type LogFormat = 'text' | 'json';

/** Levels from least to most severe */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: LogContext;
  spanId?: string;
  parentSpanId?: string;
  duration?: number;
}

export interface LogOutput {
  write(entry: LogEntry): void;
}

export interface Span {
  readonly id: string;
  readonly name: string;
  addContext(context: LogContext): void;
  /** Open a span nested under this one, logging through the same logger */
  child(name: string): Span;
  /**
   * Close the span and return its duration in ms. Only the first call
   * writes an entry; later calls return the same duration.
   */
  end(): number;
}

export interface StructuredLogger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger sharing this one's outputs and level, with extra context */
  child(context: LogContext): StructuredLogger;
  /** Start timing a stage; `span:<name>` is logged at debug on `end()` */
  span(name: string, context?: LogContext): Span;
}

type SpanTiming = Pick<LogEntry, 'spanId' | 'parentSpanId' | 'duration'>;

interface Sink {
  outputs: LogOutput[];
  level: LogLevel;
}

let spanCount = 0;

class TimedSpan implements Span {
  readonly id = `s${(++spanCount).toString(36)}`;
  readonly name: string;
  private readonly logger: Logger;
  private readonly parentId?: string;
  private readonly context: LogContext;
  private readonly startedAt = performance.now();
  private duration?: number;

  constructor(name: string, logger: Logger, parentId?: string, context: LogContext = {}) {
    this.name = name;
    this.logger = logger;
    this.parentId = parentId;
    this.context = { ...context };
  }

  addContext(context: LogContext): void {
    Object.assign(this.context, context);
  }

  child(name: string): Span {
    return new TimedSpan(name, this.logger, this.id);
  }

  end(): number {
    if (this.duration === undefined) {
      this.duration = performance.now() - this.startedAt;
      this.logger.emit('debug', `span:${this.name}`, this.context, {
        spanId: this.id,
        parentSpanId: this.parentId,
        duration: this.duration,
      });
    }
    return this.duration;
  }
}

class Logger implements StructuredLogger {
  private readonly sink: Sink;
  private readonly context: LogContext;

  constructor(sink: Sink, context: LogContext) {
    this.sink = sink;
    this.context = context;
  }

  get level(): LogLevel {
    return this.sink.level;
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  child(context: LogContext): StructuredLogger {
    return new Logger(this.sink, { ...this.context, ...context });
  }

  span(name: string, context?: LogContext): Span {
    return new TimedSpan(name, this, undefined, context);
  }

  emit(level: LogLevel, message: string, context: LogContext = {}, timing: SpanTiming = {}): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.sink.level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
      ...timing,
    };

    for (const output of this.sink.outputs) {
      try {
        output.write(entry);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[pdx] log output failed: ${reason}`);
      }
    }
  }
}

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

/**
 * One-line rendering, e.g. `[pdx] WARN  Expected '=' line=2 column=9 (0.4ms)`
 */
export function formatLogEntry(entry: LogEntry, prefix = 'pdx'): string {
  const parts = [`[${prefix}]`, entry.level.toUpperCase().padEnd(5), entry.message];

  const fields = Object.entries(entry.context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'number' || typeof value === 'boolean' ? value : JSON.stringify(value)}`);
  if (fields.length > 0) parts.push(fields.join(' '));

  if (entry.duration !== undefined) parts.push(`(${entry.duration.toFixed(1)}ms)`);

  return parts.join(' ');
}

export class ConsoleOutput implements LogOutput {
  private readonly prefix: string;

  constructor(prefix = 'pdx') {
    this.prefix = prefix;
  }

  write(entry: LogEntry): void {
    console[CONSOLE_METHOD[entry.level]](formatLogEntry(entry, this.prefix));
  }
}

/** One JSON object per entry, context fields flattened to the top level */
export class JsonLinesOutput implements LogOutput {
  private readonly writeLine: (line: string) => void;

  constructor(writeLine?: (line: string) => void) {
    this.writeLine = writeLine ?? ((line: string) => process.stderr.write(`${line}\n`));
  }

  write(entry: LogEntry): void {
    const { context, ...fields } = entry;
    this.writeLine(JSON.stringify({ ...context, ...fields }));
  }
}

/** Keeps entries in memory, for tests and for callers that collect logs */
export class BufferOutput implements LogOutput {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export interface CreateLoggerOptions {
  /** Console prefix */
  prefix?: string;
  /** Minimum level written, default info */
  level?: LogLevel;
  /** Built-in output: console text (default) or JSON lines on stderr */
  format?: LogFormat;
  /** Leave out the built-in output */
  silent?: boolean;
  /** Outputs written in addition to the built-in one */
  outputs?: LogOutput[];
  context?: LogContext;
}

export function createStructuredLogger(options: CreateLoggerOptions = {}): StructuredLogger {
  const outputs: LogOutput[] = [];

  if (!options.silent) {
    outputs.push(options.format === 'json' ? new JsonLinesOutput() : new ConsoleOutput(options.prefix));
  }
  outputs.push(...(options.outputs ?? []));

  return new Logger({ outputs, level: options.level ?? 'info' }, options.context ?? {});
}
