import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { XorProcessor } from './xor.js';
import { HexDecodeError, InvalidConfigurationError } from '../../../utils/errors.js';

function keyBytesOf(processor: XorProcessor): Buffer {
  const key: unknown = Reflect.get(processor, 'key');
  if (!Buffer.isBuffer(key)) {
    throw new Error('expected XorProcessor to hold its key in a Buffer');
  }
  return key;
}

describe('XorProcessor', () => {
  describe('constructor', () => {
    it('should reject an empty key', () => {
      expect(() => new XorProcessor('')).toThrow(InvalidConfigurationError);
      expect(() => new XorProcessor('')).toThrow('Invalid configuration: xor_key cannot be empty');
    });

    it('should reject a key that is not hex', () => {
      expect(() => new XorProcessor('zz')).toThrow(HexDecodeError);
    });

    it('should reject a key with an odd number of digits', () => {
      expect(() => new XorProcessor('abc')).toThrow('Hex decode error: Odd number of digits');
    });

    it('should accept a pad byte without using it', () => {
      const withPad = new XorProcessor('ab', 0x7f);
      const withoutPad = new XorProcessor('ab');
      const input = Uint8Array.from([1, 2, 3]);

      expect([...withPad.process(input)]).toEqual([...withoutPad.process(input)]);
    });
  });

  describe('process', () => {
    it('should XOR bytes against the key', () => {
      const processor = new XorProcessor('abcd1234');
      const output = processor.process(Uint8Array.from([0x00, 0x11, 0x22, 0x33]));

      expect([...output]).toEqual([0xab, 0xdc, 0x30, 0x07]);
    });

    it('should repeat the key cyclically over longer input', () => {
      const processor = new XorProcessor('0ff0');
      const output = processor.process(Uint8Array.from([0x00, 0x00, 0x00, 0x00, 0x00]));

      expect([...output]).toEqual([0x0f, 0xf0, 0x0f, 0xf0, 0x0f]);
    });

    it('should restore the input when applied twice', () => {
      const processor = new XorProcessor('a1b2c3');
      const input = Uint8Array.from([0xde, 0xad, 0xbe, 0xef, 0x00, 0x42, 0x99]);

      const twice = processor.process(processor.process(input));

      expect([...twice]).toEqual([...input]);
    });

    it('should return an empty buffer for empty input', () => {
      expect(new XorProcessor('ff').process(new Uint8Array(0))).toHaveLength(0);
    });

    it('should not modify the input buffer', () => {
      const input = Uint8Array.from([1, 2, 3]);
      new XorProcessor('ff').process(input);

      expect([...input]).toEqual([1, 2, 3]);
    });
  });

  describe('dispose', () => {
    it('should overwrite the key with zeros', () => {
      const processor = new XorProcessor('abcd1234');
      const key = keyBytesOf(processor);

      processor.dispose();

      expect([...key]).toEqual([0, 0, 0, 0]);
      expect(processor.isDisposed).toBe(true);
    });

    it('should refuse to process after dispose', () => {
      const processor = new XorProcessor('ff');
      processor.dispose();

      expect(() => processor.process(Uint8Array.from([1]))).toThrow(InvalidConfigurationError);
    });

    it('should be safe to call twice', () => {
      const processor = new XorProcessor('ff');
      processor.dispose();

      expect(() => processor.dispose()).not.toThrow();
    });
  });
});
