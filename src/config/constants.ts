/**
 * Centralized Configuration Constants
 *
 * Default values used by the lexer, the tree builder and the loader.
 * Everything here can be overridden per parser through {@link ParserConfig}
 * or, opt-in, from the environment via `loadParserConfig`.
 */

import type { LogFormat, LogLevel } from '../observability/logger.js';

// ============================================
// Parser Configuration
// ============================================

/**
 * Default parser configuration
 */
export const PARSER_DEFAULTS = {
  /** Key of the synthetic root object */
  ROOT_KEY: 'root',
  /** Maximum number of nested @include files being expanded at once */
  MAX_INCLUDE_DEPTH: 10,
  /** Code page used when a file is neither BOM-marked nor valid UTF-8 */
  LEGACY_ENCODING: 'windows-1252',
  /** Preprocessor directive splicing another file in place */
  INCLUDE_DIRECTIVE: '@include',
  /** Whether parseFile expands @include directives */
  RESOLVE_INCLUDES: true,
  /** Whether repeated keys become lists instead of overwriting */
  ACCUMULATE_DUPLICATES: false,
  /** Minimum level for the default logger */
  LOG_LEVEL: 'warn',
  /** Rendering of the default logger's output */
  LOG_FORMAT: 'text',
} as const;

// ============================================
// Grammar Limits
// ============================================

/**
 * Accepted ranges for `YEAR.MONTH.DAY` literals.
 * Days are not checked against the month: `1444.2.30` is a valid date.
 */
export const DATE_LIMITS = {
  MIN_YEAR: 1,
  MAX_YEAR: 9999,
  MIN_MONTH: 1,
  MAX_MONTH: 12,
  MIN_DAY: 1,
  MAX_DAY: 31,
} as const;

/**
 * Accepted range for each component of a `{ r g b }` literal
 */
export const RGB_LIMITS = {
  MIN: 0,
  MAX: 255,
  COMPONENTS: 3,
} as const;

// ============================================
// Type Definitions for Configuration
// ============================================

export type ParserConfig = {
  rootKey?: string;
  maxIncludeDepth?: number;
  legacyEncoding?: string;
  resolveIncludes?: boolean;
  accumulateDuplicates?: boolean;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
};

/**
 * Fill the unset fields of a partial configuration with the defaults
 */
export function resolveParserConfig(config: ParserConfig = {}): Required<ParserConfig> {
  return {
    rootKey: config.rootKey ?? PARSER_DEFAULTS.ROOT_KEY,
    maxIncludeDepth: config.maxIncludeDepth ?? PARSER_DEFAULTS.MAX_INCLUDE_DEPTH,
    legacyEncoding: config.legacyEncoding ?? PARSER_DEFAULTS.LEGACY_ENCODING,
    resolveIncludes: config.resolveIncludes ?? PARSER_DEFAULTS.RESOLVE_INCLUDES,
    accumulateDuplicates: config.accumulateDuplicates ?? PARSER_DEFAULTS.ACCUMULATE_DUPLICATES,
    logLevel: config.logLevel ?? PARSER_DEFAULTS.LOG_LEVEL,
    logFormat: config.logFormat ?? PARSER_DEFAULTS.LOG_FORMAT,
  };
}
