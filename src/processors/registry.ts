/**
 * Module Registry
 *
 * Builds the ordered chain of enabled processors from configuration and
 * folds a buffer through it. The chain is an array filled in a fixed
 * sequence (passthrough, xor, base64), so execution order is the same for
 * the same configuration on every run.
 */

import type { Logger } from 'pino';
import type { ByteProcessor, ChainConfig, ProcessorName } from './types.js';
import { passthroughProcessor } from './impl/basic/passthrough.js';
import { XorProcessor } from './impl/cipher/xor.js';
import { Base64Processor } from './impl/codec/base64.js';
import { InvalidConfigurationError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

/**
 * ModuleRegistry - Owns the processors of one invocation
 */
export class ModuleRegistry {
  private readonly modules: readonly ByteProcessor[];
  private readonly logger: Logger;

  /**
   * @param config - Resolved chain configuration
   * @param logger - Defaults to a child of the process logger
   * @throws InvalidConfigurationError or HexDecodeError if a module cannot be built;
   *   modules built before the failure are disposed
   */
  constructor(config: ChainConfig, logger: Logger = createChildLogger({ service: 'module-registry' })) {
    this.logger = logger;
    this.modules = ModuleRegistry.build(config, logger);

    logger.debug({ chain: this.names() }, 'Module chain built');
  }

  private static build(config: ChainConfig, logger: Logger): ByteProcessor[] {
    const modules: ByteProcessor[] = [passthroughProcessor];

    try {
      if (config.xor.enabled) {
        if (config.xor.key === undefined) {
          throw new InvalidConfigurationError('xor_key must be set if xor_enabled');
        }
        modules.push(
          new XorProcessor(config.xor.key, config.xor.pad, logger.child({ service: 'processor:xor' }))
        );
      }

      if (config.base64.enabled) {
        modules.push(new Base64Processor(config.base64.mode === 'encode', config.base64.padding));
      }
    } catch (error) {
      for (const module of modules) {
        module.dispose();
      }
      throw error;
    }

    return modules;
  }

  /**
   * Names of the chain's processors, in execution order
   */
  names(): ProcessorName[] {
    return this.modules.map((m) => m.name);
  }

  /**
   * Number of processors in the chain
   */
  get size(): number {
    return this.modules.length;
  }

  /**
   * Run data through every processor in order
   * @param data - Decoded input bytes
   * @returns Output of the last processor
   * @throws The first processor error; later processors do not run
   */
  processAll(data: Uint8Array): Buffer {
    let current: Buffer = Buffer.from(data);

    for (let i = 0; i < this.modules.length; i++) {
      const module = this.modules[i];
      this.logger.info(
        { module: module.name, position: i + 1, of: this.modules.length, inputBytes: current.length },
        `Running module: ${module.name}`
      );
      current = module.process(current);
    }

    return current;
  }

  /**
   * Dispose every processor, zeroing any key material
   */
  dispose(): void {
    for (const module of this.modules) {
      module.dispose();
    }
    this.logger.debug('Module chain disposed');
  }
}
