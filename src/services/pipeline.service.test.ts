/**
 * Pipeline Service Tests
 */

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { processMessage, runPipeline } from './pipeline.service.js';
import { ModuleRegistry } from '../processors/registry.js';
import type { AppConfig } from '../config/index.js';
import type { ChainConfig } from '../processors/types.js';
import type { InputSource, OutputSink } from '../transports/types.js';
import { HexDecodeError, MaxSizeExceededError, ModuleError, TransportError } from '../utils/errors.js';

const logger = pino.default({ enabled: false });

function createConfig(chain: Partial<ChainConfig> = {}, maxStreamSize = 65536): AppConfig {
  return {
    schemaVersion: '1.0',
    maxStreamSize,
    input: { type: 'stdin' },
    output: { type: 'stdout' },
    queue: { reconnectIntervalMs: 1000, maxReconnectAttempts: 5, sendTimeoutMs: 5000, receiveTimeoutMs: 5000 },
    logging: { enabled: false, level: 'info', file: 'byteproc.log', append: true, pretty: false },
    chain: {
      xor: { enabled: false },
      base64: { enabled: false, mode: 'encode', padding: true },
      ...chain,
    },
    source: { path: '/tmp/byteproc.json', loaded: false },
  };
}

class MemorySource implements InputSource {
  readonly label = 'memory';
  closed = false;

  constructor(private readonly message: string | Error) {}

  async receive(): Promise<string> {
    if (this.message instanceof Error) {
      throw this.message;
    }
    return this.message;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class MemorySink implements OutputSink {
  readonly label = 'memory';
  readonly sent: string[] = [];
  closed = false;

  async send(hex: string): Promise<void> {
    this.sent.push(hex);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('processMessage', () => {
  it('should pass bytes through an empty chain', () => {
    const registry = new ModuleRegistry(createConfig().chain, logger);

    expect(processMessage('  00ff\n', registry, 16).hex).toBe('00ff');
  });

  it('should accept an empty message', () => {
    const registry = new ModuleRegistry(createConfig().chain, logger);

    const result = processMessage('', registry, 16);
    expect(result.hex).toBe('');
    expect(result.output.length).toBe(0);
  });

  it('should reject bad hex before running the chain', () => {
    const registry = new ModuleRegistry(createConfig().chain, logger);
    const spy = vi.spyOn(registry, 'processAll');

    expect(() => processMessage('0g', registry, 16)).toThrow(
      new HexDecodeError("Invalid character 'g' at position 1")
    );
    expect(spy).not.toHaveBeenCalled();
  });

  it('should reject oversize input before running the chain', () => {
    const registry = new ModuleRegistry(createConfig().chain, logger);
    const spy = vi.spyOn(registry, 'processAll');

    expect(() => processMessage('0011223344', registry, 4)).toThrow('Stream too large: max 4 bytes, got 5');
    expect(spy).not.toHaveBeenCalled();
  });

  it('should accept input exactly at the limit', () => {
    const registry = new ModuleRegistry(createConfig().chain, logger);

    expect(processMessage('00112233', registry, 4).hex).toBe('00112233');
  });

  it('should reject output that grows past the limit', () => {
    const registry = new ModuleRegistry(
      createConfig({ base64: { enabled: true, mode: 'encode', padding: true } }).chain,
      logger
    );

    // 4 bytes encode to "AAAAAA==", 8 bytes
    expect(() => processMessage('00000000', registry, 4)).toThrow(new MaxSizeExceededError(4, 8));
  });
});

describe('runPipeline', () => {
  it('should send the processed message and close both transports', async () => {
    const source = new MemorySource('00112233\n');
    const sink = new MemorySink();

    const result = await runPipeline({
      config: createConfig({ xor: { enabled: true, key: 'abcd1234' } }),
      source,
      sink,
      logger,
    });

    expect(sink.sent).toEqual(['abdc3007']);
    expect(result).toEqual({ inputBytes: 4, outputBytes: 4, output: 'abdc3007' });
    expect(source.closed).toBe(true);
    expect(sink.closed).toBe(true);
  });

  it('should hex-encode the base64 text', async () => {
    const sink = new MemorySink();

    await runPipeline({
      config: createConfig({ base64: { enabled: true, mode: 'encode', padding: true } }),
      source: new MemorySource('68656c6c6f'),
      sink,
      logger,
    });

    // "hello" -> "aGVsbG8="
    expect(sink.sent).toEqual(['614756736247383d']);
  });

  it('should send nothing when a module fails', async () => {
    const source = new MemorySource('40404040');
    const sink = new MemorySink();

    await expect(
      runPipeline({
        config: createConfig({ base64: { enabled: true, mode: 'decode', padding: true } }),
        source,
        sink,
        logger,
      })
    ).rejects.toThrow(ModuleError);

    expect(sink.sent).toEqual([]);
    expect(source.closed).toBe(true);
    expect(sink.closed).toBe(true);
  });

  it('should send nothing when the output exceeds the limit', async () => {
    const sink = new MemorySink();

    await expect(
      runPipeline({
        config: createConfig({ base64: { enabled: true, mode: 'encode', padding: false } }, 4),
        source: new MemorySource('0000000000'),
        sink,
        logger,
      })
    ).rejects.toThrow('Stream too large: max 4 bytes, got 7');

    expect(sink.sent).toEqual([]);
  });

  it('should dispose the registry on success and on failure', async () => {
    const disposed: boolean[] = [];
    const registryFactory = (chain: ChainConfig) => {
      const registry = new ModuleRegistry(chain, logger);
      vi.spyOn(registry, 'dispose').mockImplementation(() => {
        disposed.push(true);
      });
      return registry;
    };

    await runPipeline({ config: createConfig(), source: new MemorySource('00'), sink: new MemorySink(), logger, registryFactory });
    await expect(
      runPipeline({ config: createConfig(), source: new MemorySource('zz'), sink: new MemorySink(), logger, registryFactory })
    ).rejects.toThrow(HexDecodeError);

    expect(disposed).toEqual([true, true]);
  });

  it('should propagate a receive failure and still close the sink', async () => {
    const sink = new MemorySink();
    const registryFactory = vi.fn();

    await expect(
      runPipeline({
        config: createConfig(),
        source: new MemorySource(new TransportError('no message on byteproc:input within 5000 ms')),
        sink,
        logger,
        registryFactory,
      })
    ).rejects.toThrow('Transport error: no message on byteproc:input within 5000 ms');

    expect(registryFactory).not.toHaveBeenCalled();
    expect(sink.closed).toBe(true);
  });

  it('should keep the run outcome when closing a transport fails', async () => {
    const sink = new MemorySink();
    vi.spyOn(sink, 'close').mockRejectedValue(new Error('socket gone'));

    const result = await runPipeline({ config: createConfig(), source: new MemorySource('ff'), sink, logger });

    expect(result.output).toBe('ff');
  });
});
