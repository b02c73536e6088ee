/**
 * Queue transports
 *
 * Read or write one message on a named list through a QueueClient.
 */

import type { InputSource, OutputSink } from './types.js';
import type { QueueClient } from '../queues/redis.js';
import { TransportError } from '../utils/errors.js';

export class QueueSource implements InputSource {
  readonly label: string;

  constructor(
    private readonly client: QueueClient,
    private readonly list: string,
    private readonly receiveTimeoutMs: number
  ) {
    this.label = `queue:${list}`;
  }

  async receive(): Promise<string> {
    const message = await this.client.pop(this.list, this.receiveTimeoutMs);
    if (message === null) {
      throw new TransportError(`no message on ${this.list} within ${this.receiveTimeoutMs} ms`);
    }
    return message.trim();
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

export class QueueSink implements OutputSink {
  readonly label: string;

  constructor(
    private readonly client: QueueClient,
    private readonly list: string
  ) {
    this.label = `queue:${list}`;
  }

  send(hex: string): Promise<void> {
    return this.client.push(this.list, hex);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
