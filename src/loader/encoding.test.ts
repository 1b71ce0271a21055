import { describe, it, expect } from 'vitest';
import { decodeScriptBytes, detectEncoding, isSupportedEncoding } from './encoding.js';
import { EncodingError } from '../errors/index.js';

const bytes = (...values: number[]) => new Uint8Array(values);

describe('detectEncoding', () => {
  it('recognises byte order marks', () => {
    expect(detectEncoding(bytes(0xef, 0xbb, 0xbf, 0x61))).toEqual({ encoding: 'utf-8', bomLength: 3 });
    expect(detectEncoding(bytes(0xff, 0xfe, 0x61, 0x00))).toEqual({ encoding: 'utf-16le', bomLength: 2 });
    expect(detectEncoding(bytes(0xfe, 0xff, 0x00, 0x61))).toEqual({ encoding: 'utf-16be', bomLength: 2 });
  });

  it('treats valid unmarked bytes as UTF-8', () => {
    expect(detectEncoding(bytes(0x61, 0xc3, 0xa9))).toEqual({ encoding: 'utf-8', bomLength: 0 });
    expect(detectEncoding(bytes())).toEqual({ encoding: 'utf-8', bomLength: 0 });
  });

  it('falls back to the legacy code page', () => {
    const latin = bytes(0x63, 0x61, 0x66, 0xe9);

    expect(detectEncoding(latin).encoding).toBe('windows-1252');
    expect(detectEncoding(latin, 'iso-8859-2').encoding).toBe('iso-8859-2');
  });
});

describe('decodeScriptBytes', () => {
  it('strips a UTF-8 byte order mark', () => {
    expect(decodeScriptBytes(bytes(0xef, 0xbb, 0xbf, 0xc3, 0xa9))).toEqual({ text: 'é', encoding: 'utf-8' });
  });

  it('decodes UTF-16 in both byte orders', () => {
    expect(decodeScriptBytes(bytes(0xff, 0xfe, 0x61, 0x00, 0x3d, 0x00)).text).toBe('a=');
    expect(decodeScriptBytes(bytes(0xfe, 0xff, 0x00, 0x61, 0x00, 0x3d)).text).toBe('a=');
  });

  it('decodes legacy text', () => {
    expect(decodeScriptBytes(bytes(0x63, 0x61, 0x66, 0xe9))).toEqual({ text: 'café', encoding: 'windows-1252' });
  });

  it('rejects an unsupported legacy encoding', () => {
    expect(() => decodeScriptBytes(bytes(0xe9), 'no-such-encoding', 'bad.txt')).toThrow(EncodingError);
    expect(() => decodeScriptBytes(bytes(0xe9), 'no-such-encoding')).toThrow(
      'Unsupported encoding: no-such-encoding'
    );
  });

  it('does not need the legacy encoding for UTF-8 input', () => {
    expect(decodeScriptBytes(bytes(0x61), 'no-such-encoding').text).toBe('a');
  });
});

describe('isSupportedEncoding', () => {
  it('checks encoding labels', () => {
    expect(isSupportedEncoding('windows-1252')).toBe(true);
    expect(isSupportedEncoding('utf-16be')).toBe(true);
    expect(isSupportedEncoding('klingon')).toBe(false);
  });
});
