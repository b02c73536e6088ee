/**
 * Command-line runner: arguments -> configuration -> logger -> transports -> pipeline
 */

import { randomUUID } from 'crypto';
import type { Readable, Writable } from 'stream';
import chalk from 'chalk';
import { parseArgs, usage } from './args.js';
import { loadConfig, parseEnv } from '../config/index.js';
import { createTransports, type TransportDeps } from '../transports/index.js';
import { runPipeline } from '../services/pipeline.service.js';
import { initLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface RunOptions {
  stdin?: Readable;
  stdout?: Writable;
  stderr?: Writable;
  env?: NodeJS.ProcessEnv;
  createQueueClient?: TransportDeps['createQueueClient'];
}

/**
 * Run one invocation
 * @param argv - Arguments after the node and script entries
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  try {
    const args = parseArgs(argv);
    if (args.help) {
      stdout.write(usage());
      return 0;
    }

    const env = parseEnv(options.env);
    const config = await loadConfig({ configPath: args.configPath, overrides: args.overrides, env });

    const logger = initLogger({ ...config.logging, instanceId: randomUUID() });
    logger.info(
      {
        configPath: config.source.path,
        configLoaded: config.source.loaded,
        schemaVersion: config.schemaVersion,
        maxStreamSize: config.maxStreamSize,
        input: config.input.type,
        output: config.output.type,
      },
      'byteproc starting'
    );

    const { source, sink } = createTransports(config, logger, {
      stdin: options.stdin,
      stdout,
      createQueueClient: options.createQueueClient,
    });

    await runPipeline({ config, source, sink, logger });
    return 0;
  } catch (error) {
    stderr.write(`${chalk.red('Error:')} ${getErrorMessage(error)}\n`);
    return 1;
  }
}
