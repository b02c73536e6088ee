/**
 * Base64 Processor
 *
 * Encodes bytes to standard-alphabet Base64 text, or decodes such text back
 * to bytes. Node's decoder is lenient (it skips unknown characters and
 * ignores bad padding), so decode validates the text strictly first.
 */

import type { ByteProcessor, Base64Mode } from '../../types.js';
import { ModuleError } from '../../../utils/errors.js';

const PADDED_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const UNPADDED_PATTERN = /^[A-Za-z0-9+/]*$/;

function stripPadding(text: string): string {
  return text.replace(/=+$/, '');
}

export class Base64Processor implements ByteProcessor {
  readonly name = 'base64' as const;

  readonly mode: Base64Mode;

  /**
   * @param encode - true to encode bytes to text, false to decode text to bytes
   * @param padding - true for `=` padding to a multiple of four characters
   */
  constructor(encode: boolean, readonly padding: boolean) {
    this.mode = encode ? 'encode' : 'decode';
  }

  process(input: Uint8Array): Buffer {
    return this.mode === 'encode' ? this.encode(input) : this.decode(input);
  }

  dispose(): void {}

  private encode(input: Uint8Array): Buffer {
    const text = Buffer.from(input).toString('base64');
    return Buffer.from(this.padding ? text : stripPadding(text), 'latin1');
  }

  private decode(input: Uint8Array): Buffer {
    // latin1 maps each byte to one char, so non-ASCII bytes fail the pattern
    const text = Buffer.from(input).toString('latin1');

    if (this.padding) {
      if (!PADDED_PATTERN.test(text)) {
        throw new ModuleError(this.name, 'Invalid padded Base64 input');
      }
    } else {
      if (!UNPADDED_PATTERN.test(text)) {
        throw new ModuleError(this.name, 'Invalid unpadded Base64 input');
      }
      if (text.length % 4 === 1) {
        throw new ModuleError(this.name, `Invalid input length ${text.length}`);
      }
    }

    const decoded = Buffer.from(text, 'base64');

    // Non-zero trailing bits decode, but do not round-trip
    const canonical = decoded.toString('base64');
    if ((this.padding ? canonical : stripPadding(canonical)) !== text) {
      throw new ModuleError(this.name, 'Invalid last symbol: non-zero trailing bits');
    }

    return decoded;
  }
}
