/**
 * Standard stream transports
 */

import type { Readable, Writable } from 'stream';
import type { InputSource, OutputSink } from './types.js';
import { IoError, getErrorMessage } from '../utils/errors.js';

/**
 * Reads the whole of a readable stream (stdin by default) as UTF-8
 */
export class StdinSource implements InputSource {
  readonly label = 'stdin';

  constructor(private readonly stream: Readable = process.stdin) {}

  async receive(): Promise<string> {
    const chunks: Buffer[] = [];

    try {
      for await (const chunk of this.stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
      }
    } catch (error) {
      throw new IoError(`failed to read ${this.label}: ${getErrorMessage(error)}`);
    }

    return Buffer.concat(chunks).toString('utf8').trim();
  }

  async close(): Promise<void> {}
}

/**
 * Writes the message and a newline to a writable stream (stdout by default)
 */
export class StdoutSink implements OutputSink {
  readonly label = 'stdout';

  constructor(private readonly stream: Writable = process.stdout) {}

  send(hex: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(`${hex}\n`, (error) => {
        if (error) {
          reject(new IoError(`failed to write ${this.label}: ${error.message}`));
          return;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {}
}
