/**
 * Parser configuration from the environment, with dotenv support
 *
 * Recognized variables:
 * - PDX_MAX_INCLUDE_DEPTH      positive integer
 * - PDX_LEGACY_ENCODING        WHATWG encoding label, e.g. windows-1252
 * - PDX_RESOLVE_INCLUDES       yes/no/true/false/1/0
 * - PDX_ACCUMULATE_DUPLICATES  yes/no/true/false/1/0
 * - PDX_LOG_LEVEL              debug | info | warn | error
 * - PDX_LOG_FORMAT             text | json
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { isSupportedEncoding } from '../loader/encoding.js';
import { LOG_FORMATS, LOG_LEVELS } from '../observability/logger.js';
import type { ParserConfig } from './constants.js';

export interface EnvConfigOptions {
  /** Path to .env file (default: .env and .env.local in baseDir) */
  envFile?: string;
  /** Additional .env files to load (loaded in order, later files override) */
  envFiles?: string[];
  /** Base directory for resolving relative paths */
  baseDir?: string;
  /** Variables to read instead of process.env (files are still loaded into process.env) */
  env?: Record<string, string | undefined>;
}

export interface LoadParserConfigResult {
  config: ParserConfig;
  /** Paths of loaded .env files */
  files: string[];
  /** Variables that were present but could not be used */
  warnings: string[];
}

/**
 * Load .env files, then build a parser configuration from PDX_* variables.
 * Unset variables are left out of the result so the defaults apply.
 */
export function loadParserConfig(options: EnvConfigOptions = {}): LoadParserConfigResult {
  const files = loadEnvFiles(options);
  const env = options.env ?? process.env;
  const warnings: string[] = [];
  const config: ParserConfig = {};

  const depth = env.PDX_MAX_INCLUDE_DEPTH;
  if (depth !== undefined) {
    const parsed = Number(depth);
    if (Number.isInteger(parsed) && parsed > 0) {
      config.maxIncludeDepth = parsed;
    } else {
      warnings.push(`PDX_MAX_INCLUDE_DEPTH must be a positive integer, got '${depth}'`);
    }
  }

  const encoding = env.PDX_LEGACY_ENCODING;
  if (encoding !== undefined) {
    if (isSupportedEncoding(encoding)) {
      config.legacyEncoding = encoding;
    } else {
      warnings.push(`PDX_LEGACY_ENCODING is not a supported encoding: '${encoding}'`);
    }
  }

  const resolveIncludes = readFlag(env, 'PDX_RESOLVE_INCLUDES', warnings);
  if (resolveIncludes !== undefined) config.resolveIncludes = resolveIncludes;

  const accumulate = readFlag(env, 'PDX_ACCUMULATE_DUPLICATES', warnings);
  if (accumulate !== undefined) config.accumulateDuplicates = accumulate;

  const level = env.PDX_LOG_LEVEL;
  if (level !== undefined) {
    const normalized = level.toLowerCase();
    const match = LOG_LEVELS.find((l) => l === normalized);
    if (match) {
      config.logLevel = match;
    } else {
      warnings.push(`PDX_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${level}'`);
    }
  }

  const format = env.PDX_LOG_FORMAT;
  if (format !== undefined) {
    const normalized = format.toLowerCase();
    const match = LOG_FORMATS.find((f) => f === normalized);
    if (match) {
      config.logFormat = match;
    } else {
      warnings.push(`PDX_LOG_FORMAT must be one of ${LOG_FORMATS.join(', ')}, got '${format}'`);
    }
  }

  return { config, files, warnings };
}

function loadEnvFiles(options: EnvConfigOptions): string[] {
  const baseDir = options.baseDir ?? process.cwd();
  const envFilePaths: string[] = [];

  if (options.envFiles) {
    envFilePaths.push(...options.envFiles.map((f) => resolve(baseDir, f)));
  } else if (options.envFile) {
    envFilePaths.push(resolve(baseDir, options.envFile));
  } else {
    for (const file of ['.env', '.env.local']) {
      envFilePaths.push(resolve(baseDir, file));
    }
  }

  const loaded: string[] = [];
  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;
    const result = dotenvConfig({ path: envPath, override: true });
    if (!result.error) {
      loaded.push(envPath);
    }
  }
  return loaded;
}

function readFlag(
  env: Record<string, string | undefined>,
  name: string,
  warnings: string[]
): boolean | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;

  switch (raw.trim().toLowerCase()) {
    case 'yes':
    case 'true':
    case '1':
      return true;
    case 'no':
    case 'false':
    case '0':
      return false;
    default:
      warnings.push(`${name} must be a yes/no flag, got '${raw}'`);
      return undefined;
  }
}
