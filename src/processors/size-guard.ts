/**
 * Size Guard
 *
 * Bounds decoded input and chain output to the configured maximum.
 * Applied by the caller of the registry, before and after the chain.
 */

import { InvalidConfigurationError, MaxSizeExceededError } from '../utils/errors.js';

/** Bytes per configured kilobyte */
export const KB = 1024;

/**
 * Convert max_stream_size_kb into a byte limit
 * @throws InvalidConfigurationError if the result is not a safe integer
 */
export function maxStreamSizeBytes(maxStreamSizeKb: number): number {
  const bytes = maxStreamSizeKb * KB;
  if (!Number.isSafeInteger(bytes)) {
    throw new InvalidConfigurationError('max_stream_size_kb too large');
  }
  return bytes;
}

/**
 * Throw if the buffer is longer than the limit
 * @throws MaxSizeExceededError carrying the limit and the actual size
 */
export function assertWithinLimit(data: Uint8Array, limit: number): void {
  if (data.length > limit) {
    throw new MaxSizeExceededError(limit, data.length);
  }
}
