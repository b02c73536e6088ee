/**
 * Hex utilities
 *
 * Buffer.from(text, 'hex') stops silently at the first bad character, so
 * decoding validates the whole string first.
 */

import { HexDecodeError } from './errors.js';

const HEX_DIGIT = /^[0-9a-fA-F]$/;

/**
 * Decode a hex string into bytes
 *
 * @param text - Hex digits, either case, no prefix or separators
 * @throws HexDecodeError on odd length or a non-hex character
 *
 * @example
 * decodeHex('00ff') // <Buffer 00 ff>
 * decodeHex('0g')   // throws: Invalid character 'g' at position 1
 */
export function decodeHex(text: string): Buffer {
  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (!HEX_DIGIT.test(char)) {
      throw new HexDecodeError(`Invalid character '${char}' at position ${i}`);
    }
  }

  if (text.length % 2 !== 0) {
    throw new HexDecodeError('Odd number of digits');
  }

  return Buffer.from(text, 'hex');
}

/**
 * Encode bytes as lowercase hex
 */
export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}
