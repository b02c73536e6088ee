import { readFile } from 'fs/promises';
import path from 'path';
import { getEnv, parseEnv, type Env } from './env.js';
import { configSchema, type CliOverrides, type RawConfig } from '../types/config.types.js';
import type { ChainConfig } from '../processors/types.js';
import { maxStreamSizeBytes } from '../processors/size-guard.js';
import type { LogLevel } from '../utils/logger.js';
import { InvalidConfigurationError, IoError, getErrorMessage } from '../utils/errors.js';

export { getEnv, parseEnv, type Env };

/** Config file looked up in the working directory when no path is given */
export const DEFAULT_CONFIG_FILE = 'byteproc.json';

export type InputConfig =
  | { type: 'stdin' }
  | { type: 'queue_pull'; url: string; name: string };

export type OutputConfig =
  | { type: 'stdout' }
  | { type: 'queue_push'; url: string; name: string };

/**
 * Application configuration resolved from defaults, file and command line
 */
export interface AppConfig {
  schemaVersion: string;
  /** Byte limit for decoded input and chain output */
  maxStreamSize: number;
  input: InputConfig;
  output: OutputConfig;
  queue: {
    reconnectIntervalMs: number;
    maxReconnectAttempts: number;
    sendTimeoutMs: number;
    receiveTimeoutMs: number;
  };
  logging: {
    enabled: boolean;
    level: LogLevel;
    file: string;
    append: boolean;
    pretty: boolean;
  };
  chain: ChainConfig;
  source: {
    /** Config file path that was looked up */
    path: string;
    /** Whether that file existed and was merged */
    loaded: boolean;
  };
}

export interface LoadConfigOptions {
  /** Value of --config, if given */
  configPath?: string;
  /** Typed command-line overrides */
  overrides?: CliOverrides;
  env?: Env;
}

/**
 * Resolve the config file path: explicit flag, then BYTEPROC_CONFIG, then byteproc.json
 */
export function resolveConfigPath(configPath: string | undefined, env: Env): string {
  return path.resolve(configPath ?? env.BYTEPROC_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Read the JSON config file. A missing file yields null.
 * @throws IoError if the file cannot be read or is not a JSON object
 */
export async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new IoError(`cannot read config file ${filePath}: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new IoError(`cannot parse config file ${filePath}: ${getErrorMessage(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new IoError(`config file ${filePath} must contain a JSON object`);
  }

  // null means "not set", as if the key were absent
  return Object.fromEntries(Object.entries(parsed).filter(([, value]) => value !== null));
}

/**
 * Parse pad byte text as one hex byte; anything else is treated as unset
 */
export function parsePadByte(text: string): number | undefined {
  return /^[0-9a-fA-F]{1,2}$/.test(text) ? parseInt(text, 16) : undefined;
}

/**
 * Merge file values and overrides over the built-in defaults and validate
 * @throws InvalidConfigurationError listing every invalid option
 */
export function mergeConfig(fileValues: Record<string, unknown> | null, overrides: CliOverrides = {}): RawConfig {
  const result = configSchema.safeParse({ ...fileValues, ...overrides });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new InvalidConfigurationError(problems.join('; '), result.error.format());
  }

  return result.data;
}

/**
 * Build application config from merged options
 * @throws InvalidConfigurationError when an enabled feature lacks its required option
 */
export function buildConfig(raw: RawConfig, env: Env, source: AppConfig['source']): AppConfig {
  let input: InputConfig;
  if (raw.input_type === 'queue_pull') {
    if (!raw.input_queue_url) {
      throw new InvalidConfigurationError('input_queue_url must be set for queue_pull');
    }
    input = { type: 'queue_pull', url: raw.input_queue_url, name: raw.input_queue_name };
  } else {
    input = { type: 'stdin' };
  }

  let output: OutputConfig;
  if (raw.output_type === 'queue_push') {
    if (!raw.output_queue_url) {
      throw new InvalidConfigurationError('output_queue_url must be set for queue_push');
    }
    output = { type: 'queue_push', url: raw.output_queue_url, name: raw.output_queue_name };
  } else {
    output = { type: 'stdout' };
  }

  if (raw.xor_enabled && raw.xor_key === undefined) {
    throw new InvalidConfigurationError('xor_key must be set if xor_enabled');
  }

  return {
    schemaVersion: raw.schema_version,
    maxStreamSize: maxStreamSizeBytes(raw.max_stream_size_kb),
    input,
    output,
    queue: {
      reconnectIntervalMs: raw.queue_reconnect_interval_ms,
      maxReconnectAttempts: raw.queue_max_reconnect_attempts,
      sendTimeoutMs: raw.queue_send_timeout_ms,
      receiveTimeoutMs: raw.queue_receive_timeout_ms,
    },
    logging: {
      enabled: raw.log_enabled,
      level: raw.log_level,
      file: raw.log_file,
      append: raw.log_append,
      pretty: env.NODE_ENV === 'development',
    },
    chain: {
      xor: {
        enabled: raw.xor_enabled,
        key: raw.xor_key,
        pad: parsePadByte(raw.xor_pad),
      },
      base64: {
        enabled: raw.base64_enabled,
        mode: raw.base64_mode,
        padding: raw.base64_padding,
      },
    },
    source,
  };
}

/**
 * Resolve configuration: defaults < config file < command line
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? getEnv();
  const filePath = resolveConfigPath(options.configPath, env);
  const fileValues = await readConfigFile(filePath);
  const raw = mergeConfig(fileValues, options.overrides);

  return buildConfig(raw, env, { path: filePath, loaded: fileValues !== null });
}
