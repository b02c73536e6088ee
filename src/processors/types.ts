/**
 * Processor Types
 *
 * Core type definitions for the byte-processing module chain.
 * Processors are small synchronous transforms that the registry composes
 * into a fixed, ordered chain.
 */

/**
 * Identifiers of the built-in processors, in chain order
 */
export const PROCESSOR_NAMES = ['passthrough', 'xor', 'base64'] as const;

export type ProcessorName = (typeof PROCESSOR_NAMES)[number];

/**
 * ByteProcessor - one step of the chain
 *
 * process() must depend only on its input and the parameters fixed at
 * construction. It throws a typed AppError subclass for input that is
 * malformed for the module, never for "nothing to do".
 */
export interface ByteProcessor {
  /** Stable identifier used for ordering and logging */
  readonly name: ProcessorName;

  /** Transform one buffer into a new buffer; the input is not modified */
  process(input: Uint8Array): Buffer;

  /** Release module-owned sensitive state. Safe to call more than once. */
  dispose(): void;
}

/**
 * XOR module settings as resolved from configuration
 */
export interface XorSettings {
  enabled: boolean;
  /** Hex-encoded key; required when enabled */
  key?: string;
  /** Parsed pad byte; carried but not applied by the transform */
  pad?: number;
}

export type Base64Mode = 'encode' | 'decode';

/**
 * Base64 module settings as resolved from configuration
 */
export interface Base64Settings {
  enabled: boolean;
  mode: Base64Mode;
  padding: boolean;
}

/**
 * The part of the resolved configuration the registry reads
 */
export interface ChainConfig {
  xor: XorSettings;
  base64: Base64Settings;
}
