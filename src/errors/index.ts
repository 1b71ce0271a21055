export interface SourceLocation {
  line: number;
  column: number;
  /** End column (optional, for ranges) */
  endColumn?: number;
}

export interface ErrorContext {
  /** The source text being parsed */
  source?: string;
  /** File path if available */
  filePath?: string;
}

/**
 * Base class for script errors, with optional source location info
 */
export class ScriptError extends Error {
  readonly location?: SourceLocation;
  readonly context?: ErrorContext;

  constructor(message: string, location?: SourceLocation, context?: ErrorContext) {
    super(message);
    this.name = 'ScriptError';
    this.location = location;
    this.context = context;
  }

  /**
   * Format the error with source context for display
   */
  format(): string {
    const lines: string[] = [];
    const fileInfo = this.context?.filePath ? `${this.context.filePath}:` : '';

    lines.push(`${this.name}: ${this.message}`);

    if (!this.location) {
      if (this.context?.filePath) lines.push(`  --> ${this.context.filePath}`);
      return lines.join('\n');
    }

    lines.push(`  --> ${fileInfo}${this.location.line}:${this.location.column}`);

    if (this.context?.source) {
      const errorLine = getSourceLine(this.context.source, this.location.line);

      if (errorLine !== undefined) {
        const lineNum = this.location.line.toString();
        const padding = ' '.repeat(lineNum.length);

        lines.push(`${padding} |`);
        lines.push(`${lineNum} | ${errorLine}`);

        const underlineStart = this.location.column - 1;
        const underlineLength = this.location.endColumn
          ? this.location.endColumn - this.location.column
          : 1;
        const underline = ' '.repeat(underlineStart) + '^'.repeat(Math.max(1, underlineLength));
        lines.push(`${padding} | ${underline}`);
      }
    }

    return lines.join('\n');
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Structural error found while building the tree. Logged, never thrown out of `parse`.
 */
export class ParseError extends ScriptError {
  /** The token value that caused the error */
  readonly tokenValue?: string;

  constructor(
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    tokenValue?: string
  ) {
    super(message, location, context);
    this.name = 'ParseError';
    this.tokenValue = tokenValue;
  }

  format(): string {
    const base = super.format();
    if (this.tokenValue) {
      return `${base}\n  found: '${this.tokenValue}'`;
    }
    return base;
  }
}

/**
 * A date literal that does not split into YEAR.MONTH.DAY
 */
export class DateFormatError extends ScriptError {
  readonly text: string;

  constructor(text: string) {
    super(`Invalid date format: ${text}`);
    this.name = 'DateFormatError';
    this.text = text;
  }
}

export type IncludeFailureReason = 'cycle' | 'depth' | 'not-found' | 'read';

/**
 * An @include directive that could not be expanded
 */
export class IncludeError extends ScriptError {
  readonly reason: IncludeFailureReason;
  /** Resolved path of the include target */
  readonly path: string;

  constructor(
    message: string,
    reason: IncludeFailureReason,
    path: string,
    options?: { location?: SourceLocation; filePath?: string }
  ) {
    super(message, options?.location, options?.filePath ? { filePath: options.filePath } : undefined);
    this.name = 'IncludeError';
    this.reason = reason;
    this.path = path;
  }
}

/**
 * The input file of a parseFile call is missing or unreadable
 */
export class ScriptFileError extends ScriptError {
  /** Node error code, e.g. ENOENT */
  readonly code: string;
  readonly path: string;

  constructor(message: string, path: string, code: string) {
    super(message, undefined, { filePath: path });
    this.name = 'ScriptFileError';
    this.code = code;
    this.path = path;
  }
}

/**
 * Bytes could not be decoded with the detected or configured encoding
 */
export class EncodingError extends ScriptError {
  readonly encoding: string;

  constructor(message: string, encoding: string, filePath?: string) {
    super(message, undefined, filePath ? { filePath } : undefined);
    this.name = 'EncodingError';
    this.encoding = encoding;
  }
}

/**
 * Misuse of the tree API, e.g. adding a child to a scalar
 */
export class InvalidNodeOperationError extends ScriptError {
  readonly operation: string;
  readonly nodeType: string;

  constructor(operation: string, nodeType: string) {
    super(`Cannot ${operation} to node of type ${nodeType}`);
    this.name = 'InvalidNodeOperationError';
    this.operation = operation;
    this.nodeType = nodeType;
  }
}

/**
 * Format multiple errors for display
 */
export function formatErrors(errors: ScriptError[]): string {
  return errors.map((e) => e.format()).join('\n\n');
}

/**
 * Get the source line at a given line number
 */
export function getSourceLine(source: string, lineNumber: number): string | undefined {
  const lines = source.split('\n');
  return lines[lineNumber - 1]?.replace(/\r$/, '');
}

export { DiagnosticLog, type Diagnostic, type DiagnosticSeverity } from './log.js';
