import { readFile } from 'node:fs/promises';
import { PARSER_DEFAULTS } from '../config/constants.js';
import { ScriptFileError } from '../errors/index.js';
import { decodeScriptBytes, type DecodedScript } from './encoding.js';

export interface ReadScriptOptions {
  /** Code page for files that are neither BOM-marked nor valid UTF-8 */
  legacyEncoding?: string;
}

/**
 * Read a script file and decode it with the detected encoding
 *
 * @throws ScriptFileError when the file is missing or unreadable
 * @throws EncodingError when the legacy encoding label is not supported
 */
export async function readScriptFile(
  path: string,
  options: ReadScriptOptions = {}
): Promise<DecodedScript> {
  const bytes = await readBytes(path);
  return decodeScriptBytes(bytes, options.legacyEncoding ?? PARSER_DEFAULTS.LEGACY_ENCODING, path);
}

/**
 * @throws ScriptFileError carrying the Node error code
 */
export async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    const code = errorCode(error);
    const message =
      code === 'ENOENT'
        ? `File not found: ${path}`
        : `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`;
    throw new ScriptFileError(message, path, code);
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'EUNKNOWN';
}
