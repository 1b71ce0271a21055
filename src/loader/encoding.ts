import { PARSER_DEFAULTS } from '../config/constants.js';
import { EncodingError } from '../errors/index.js';

export interface DetectedEncoding {
  /** WHATWG encoding label */
  encoding: string;
  /** Length of the byte order mark, 0 when there is none */
  bomLength: number;
}

export interface DecodedScript {
  text: string;
  encoding: string;
}

/**
 * Pick the encoding of a script file.
 *
 * Byte order marks win; unmarked bytes are UTF-8 when they decode strictly
 * as UTF-8 and the legacy code page otherwise.
 */
export function detectEncoding(
  bytes: Uint8Array,
  legacyEncoding: string = PARSER_DEFAULTS.LEGACY_ENCODING
): DetectedEncoding {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { encoding: 'utf-8', bomLength: 3 };
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { encoding: 'utf-16le', bomLength: 2 };
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { encoding: 'utf-16be', bomLength: 2 };
  }

  return { encoding: isStrictUtf8(bytes) ? 'utf-8' : legacyEncoding, bomLength: 0 };
}

/**
 * Decode file bytes to text, without the byte order mark
 *
 * @throws EncodingError when the legacy encoding label is not supported
 */
export function decodeScriptBytes(
  bytes: Uint8Array,
  legacyEncoding: string = PARSER_DEFAULTS.LEGACY_ENCODING,
  filePath?: string
): DecodedScript {
  const { encoding, bomLength } = detectEncoding(bytes, legacyEncoding);
  const decoder = createDecoder(encoding, filePath);

  return { text: decoder.decode(bytes.subarray(bomLength)), encoding };
}

export function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

function createDecoder(encoding: string, filePath?: string) {
  if (!isSupportedEncoding(encoding)) {
    throw new EncodingError(`Unsupported encoding: ${encoding}`, encoding, filePath);
  }
  return new TextDecoder(encoding, { ignoreBOM: true });
}

function isStrictUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return true;
  } catch {
    return false;
  }
}
