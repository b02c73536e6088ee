import { Redis, type RedisOptions } from 'ioredis';
import type { Logger } from 'pino';
import { TransportError, getErrorMessage } from '../utils/errors.js';

export interface QueueClientSettings {
  url: string;
  reconnectIntervalMs: number;
  maxReconnectAttempts: number;
  /** Per-command timeout; <= 0 or absent disables it */
  commandTimeoutMs?: number;
}

/**
 * List operations the queue transports need
 */
export interface QueueClient {
  /**
   * Remove and return the oldest message of a list, waiting for one to arrive
   * @param timeoutMs - <= 0 waits indefinitely
   * @returns The message, or null on timeout
   */
  pop(list: string, timeoutMs: number): Promise<string | null>;

  /** Append a message to a list */
  push(list: string, message: string): Promise<void>;

  close(): Promise<void>;
}

/**
 * Connection options: fixed reconnect interval, bounded attempts
 */
export function buildRedisOptions(settings: QueueClientSettings, logger: Logger): RedisOptions {
  return {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    commandTimeout:
      settings.commandTimeoutMs !== undefined && settings.commandTimeoutMs > 0 ? settings.commandTimeoutMs : undefined,
    retryStrategy: (times: number) => {
      if (times > settings.maxReconnectAttempts) {
        logger.error({ attempts: times - 1 }, 'Redis connection failed, giving up');
        return null;
      }
      return settings.reconnectIntervalMs;
    },
  };
}

/**
 * QueueClient over Redis lists: LPUSH to enqueue, BRPOP to dequeue (FIFO)
 */
export class RedisQueueClient implements QueueClient {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger
  ) {}

  async pop(list: string, timeoutMs: number): Promise<string | null> {
    const timeoutSeconds = timeoutMs > 0 ? timeoutMs / 1000 : 0;

    try {
      const result = await this.redis.brpop(list, timeoutSeconds);
      return result ? result[1] : null;
    } catch (error) {
      throw new TransportError(
        `BRPOP ${list} failed: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async push(list: string, message: string): Promise<void> {
    try {
      await this.redis.lpush(list, message);
    } catch (error) {
      throw new TransportError(
        `LPUSH ${list} failed: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      // Connection already gone; drop it without waiting for replies
      this.logger.warn({ error: getErrorMessage(error) }, 'Redis QUIT failed, disconnecting');
      this.redis.disconnect();
    }
  }
}

/**
 * Open a Redis connection and wrap it as a QueueClient
 */
export function createRedisQueueClient(settings: QueueClientSettings, logger: Logger): QueueClient {
  const redis = new Redis(settings.url, buildRedisOptions(settings, logger));

  redis.on('connect', () => {
    logger.info('Redis connection established');
  });

  redis.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Redis connection error');
  });

  redis.on('close', () => {
    logger.debug('Redis connection closed');
  });

  return new RedisQueueClient(redis, logger);
}
