/**
 * Pipeline Service
 *
 * One invocation: receive a hex message, decode it, run it through the
 * module chain under the size limit, and send the hex-encoded result.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/index.js';
import type { InputSource, OutputSink } from '../transports/types.js';
import { ModuleRegistry, assertWithinLimit, type ChainConfig } from '../processors/index.js';
import { decodeHex, encodeHex } from '../utils/hex.js';
import { getErrorMessage } from '../utils/errors.js';
import { StepTimer } from '../utils/timer.js';

export type RegistryFactory = (chain: ChainConfig, logger: Logger) => ModuleRegistry;

export interface RunPipelineOptions {
  config: AppConfig;
  source: InputSource;
  sink: OutputSink;
  logger: Logger;
  registryFactory?: RegistryFactory;
}

export interface PipelineResult {
  inputBytes: number;
  outputBytes: number;
  /** Hex text handed to the sink */
  output: string;
}

const defaultRegistryFactory: RegistryFactory = (chain, logger) =>
  new ModuleRegistry(chain, logger.child({ service: 'module-registry' }));

/**
 * Decode, process and re-encode one message
 * @param rawHex - Hex text; surrounding whitespace is ignored
 * @throws HexDecodeError, MaxSizeExceededError, ModuleError
 */
export function processMessage(
  rawHex: string,
  registry: ModuleRegistry,
  maxStreamSize: number
): { input: Buffer; output: Buffer; hex: string } {
  const input = decodeHex(rawHex.trim());
  assertWithinLimit(input, maxStreamSize);

  const output = registry.processAll(input);
  assertWithinLimit(output, maxStreamSize);

  return { input, output, hex: encodeHex(output) };
}

/**
 * Run one message from source to sink. Nothing is sent if any step fails;
 * the chain is disposed and both transports closed on every path.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<PipelineResult> {
  const { config, source, sink, logger } = options;
  const registryFactory = options.registryFactory ?? defaultRegistryFactory;
  const timer = new StepTimer(logger);

  try {
    timer.startStep('receive');
    const rawHex = await source.receive();
    logger.info({ source: source.label, chars: rawHex.length }, 'Message received');

    timer.startStep('process');
    const registry = registryFactory(config.chain, logger);
    let result: ReturnType<typeof processMessage>;
    try {
      result = processMessage(rawHex, registry, config.maxStreamSize);
    } finally {
      registry.dispose();
    }

    timer.startStep('send');
    await sink.send(result.hex);
    timer.endStep();

    logger.info(
      { sink: sink.label, inputBytes: result.input.length, outputBytes: result.output.length },
      'Message sent'
    );
    timer.logSummary();

    return {
      inputBytes: result.input.length,
      outputBytes: result.output.length,
      output: result.hex,
    };
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, 'Pipeline failed');
    throw error;
  } finally {
    await closeAll(logger, source, sink);
  }
}

/**
 * Close every transport; a close failure is logged, never masks the run's outcome
 */
async function closeAll(logger: Logger, ...transports: Array<InputSource | OutputSink>): Promise<void> {
  for (const transport of transports) {
    try {
      await transport.close();
    } catch (error) {
      logger.warn({ transport: transport.label, error: getErrorMessage(error) }, 'Failed to close transport');
    }
  }
}
