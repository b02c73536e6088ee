import { describe, it, expect } from 'vitest';
import { decodeHex, encodeHex } from './hex.js';
import { HexDecodeError } from './errors.js';

describe('hex', () => {
  describe('decodeHex', () => {
    it('should decode lowercase and uppercase digits', () => {
      expect([...decodeHex('00ff')]).toEqual([0x00, 0xff]);
      expect([...decodeHex('DeadBEEF')]).toEqual([0xde, 0xad, 0xbe, 0xef]);
    });

    it('should decode an empty string to an empty buffer', () => {
      expect(decodeHex('')).toHaveLength(0);
    });

    it('should reject an odd number of digits', () => {
      expect(() => decodeHex('abc')).toThrow('Hex decode error: Odd number of digits');
    });

    it('should report the first invalid character and its position', () => {
      expect(() => decodeHex('00zz')).toThrow("Hex decode error: Invalid character 'z' at position 2");
    });

    it('should reject whitespace inside the string', () => {
      expect(() => decodeHex('00 11')).toThrow(HexDecodeError);
    });

    it('should reject a 0x prefix', () => {
      expect(() => decodeHex('0x00')).toThrow("Invalid character 'x' at position 1");
    });
  });

  describe('encodeHex', () => {
    it('should encode as lowercase hex', () => {
      expect(encodeHex(Uint8Array.from([0xab, 0x01, 0xff]))).toBe('ab01ff');
    });

    it('should respect the view offset of a subarray', () => {
      const bytes = Uint8Array.from([0x01, 0x02, 0x03, 0x04]);
      expect(encodeHex(bytes.subarray(1, 3))).toBe('0203');
    });

    it('should encode an empty buffer as an empty string', () => {
      expect(encodeHex(new Uint8Array(0))).toBe('');
    });
  });
});
