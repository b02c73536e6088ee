import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

/** Log levels accepted in configuration ('off' disables output) */
export const LOG_LEVELS = ['off', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerSettings {
  enabled: boolean;
  level: LogLevel;
  file: string;
  append: boolean;
  /** Human-readable output through pino-pretty instead of JSON lines */
  pretty: boolean;
  /** Correlates every line written by one invocation */
  instanceId: string;
}

let logger: Logger | null = null;

function toPinoLevel(level: LogLevel): LevelWithSilent {
  return level === 'off' ? 'silent' : level;
}

/**
 * Build a logger writing to the configured log file
 */
export function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    enabled: settings.enabled,
    level: toPinoLevel(settings.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'byteproc',
      instanceId: settings.instanceId,
    },
  };

  if (!settings.enabled) {
    return pino.default(options);
  }

  if (settings.pretty) {
    return pino.default({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: settings.file,
          append: settings.append,
          mkdir: true,
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino.default(
    options,
    pino.destination({
      dest: settings.file,
      append: settings.append,
      mkdir: true,
      sync: true,
    })
  );
}

/**
 * Install the process logger. Call once, after configuration is resolved.
 */
export function initLogger(settings: LoggerSettings): Logger {
  logger = createLogger(settings);
  return logger;
}

/**
 * Get the process logger; silent until initLogger() has run
 */
export function getLogger(): Logger {
  if (logger) {
    return logger;
  }

  logger = pino.default({ enabled: false });
  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return getLogger().child(context);
}
