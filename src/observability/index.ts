/**
 * Observability Module - Parse monitoring
 *
 * - Structured logging with context and timing spans
 * - Per-call parsing metrics
 */

export type {
  LogLevel,
  LogFormat,
  LogContext,
  LogEntry,
  Span,
  LogOutput,
  StructuredLogger,
  CreateLoggerOptions,
} from './logger.js';
export {
  LOG_LEVELS,
  LOG_FORMATS,
  ConsoleOutput,
  JsonLinesOutput,
  BufferOutput,
  createStructuredLogger,
  formatLogEntry,
} from './logger.js';

export { ParsingMetrics } from './metrics.js';
