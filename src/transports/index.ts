/**
 * Transport factory
 *
 * Builds the input source and output sink named by the configuration.
 */

import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import type { AppConfig } from '../config/index.js';
import type { InputSource, OutputSink } from './types.js';
import { StdinSource, StdoutSink } from './stdio.js';
import { QueueSink, QueueSource } from './queue.js';
import { createRedisQueueClient, type QueueClient, type QueueClientSettings } from '../queues/redis.js';

export type { InputSource, OutputSink } from './types.js';
export { StdinSource, StdoutSink } from './stdio.js';
export { QueueSource, QueueSink } from './queue.js';

export interface Transports {
  source: InputSource;
  sink: OutputSink;
}

/**
 * Overridable collaborators; defaults are the real process streams and Redis
 */
export interface TransportDeps {
  stdin?: Readable;
  stdout?: Writable;
  createQueueClient?: (settings: QueueClientSettings, logger: Logger) => QueueClient;
}

export function createTransports(config: AppConfig, logger: Logger, deps: TransportDeps = {}): Transports {
  const createQueueClient = deps.createQueueClient ?? createRedisQueueClient;
  const { queue } = config;

  const source: InputSource =
    config.input.type === 'queue_pull'
      ? new QueueSource(
          createQueueClient(
            {
              url: config.input.url,
              reconnectIntervalMs: queue.reconnectIntervalMs,
              maxReconnectAttempts: queue.maxReconnectAttempts,
            },
            logger.child({ service: 'queue-input' })
          ),
          config.input.name,
          queue.receiveTimeoutMs
        )
      : new StdinSource(deps.stdin);

  const sink: OutputSink =
    config.output.type === 'queue_push'
      ? new QueueSink(
          createQueueClient(
            {
              url: config.output.url,
              reconnectIntervalMs: queue.reconnectIntervalMs,
              maxReconnectAttempts: queue.maxReconnectAttempts,
              commandTimeoutMs: queue.sendTimeoutMs,
            },
            logger.child({ service: 'queue-output' })
          ),
          config.output.name
        )
      : new StdoutSink(deps.stdout);

  return { source, sink };
}
