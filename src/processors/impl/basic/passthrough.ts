/**
 * Passthrough Processor
 *
 * Copies its input unchanged. Always first in the chain.
 */

import type { ByteProcessor } from '../../types.js';

export const passthroughProcessor: ByteProcessor = {
  name: 'passthrough',

  process(input: Uint8Array): Buffer {
    return Buffer.from(input);
  },

  dispose(): void {},
};
