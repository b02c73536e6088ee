/**
 * XOR Processor
 *
 * XORs every input byte with a repeating key. Applying the same key twice
 * restores the input.
 *
 * The key is secret material: it lives in a buffer owned by this processor
 * and is overwritten with zeros by dispose(). Callers own the processor's
 * lifetime and must dispose it on every exit path (the registry does this).
 */

import type { Logger } from 'pino';
import type { ByteProcessor } from '../../types.js';
import { decodeHex } from '../../../utils/hex.js';
import { InvalidConfigurationError } from '../../../utils/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

export class XorProcessor implements ByteProcessor {
  readonly name = 'xor' as const;

  private readonly key: Buffer;
  private disposed = false;

  /**
   * @param hexKey - Key as hex digits; must decode to at least one byte
   * @param padByte - Accepted from configuration but not applied: the key
   *   is always repeated cyclically
   * @throws HexDecodeError if hexKey is not valid hex
   * @throws InvalidConfigurationError if the key is empty
   */
  constructor(hexKey: string, padByte?: number, logger: Logger = createChildLogger({ service: 'processor:xor' })) {
    const key = decodeHex(hexKey);
    if (key.length === 0) {
      throw new InvalidConfigurationError('xor_key cannot be empty');
    }
    this.key = key;

    logger.debug({ keyLength: key.length, padByte, keyMode: 'cycle' }, 'XOR processor ready');
  }

  process(input: Uint8Array): Buffer {
    if (this.disposed) {
      throw new InvalidConfigurationError('xor processor used after its key was disposed');
    }

    const key = this.key;
    const output = Buffer.allocUnsafe(input.length);
    for (let i = 0; i < input.length; i++) {
      output[i] = input[i] ^ key[i % key.length];
    }
    return output;
  }

  dispose(): void {
    if (this.disposed) return;
    this.key.fill(0);
    this.disposed = true;
  }

  /** True once the key has been zeroed */
  get isDisposed(): boolean {
    return this.disposed;
  }
}
