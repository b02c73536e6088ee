import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';

/**
 * Input transport kinds
 */
export const InputType = {
  /** Read hex text from standard input */
  STDIN: 'stdin',
  /** Pop one message from a Redis list */
  QUEUE_PULL: 'queue_pull',
} as const;

export type InputType = (typeof InputType)[keyof typeof InputType];

/**
 * Output transport kinds
 */
export const OutputType = {
  /** Write hex text to standard output */
  STDOUT: 'stdout',
  /** Push the message onto a Redis list */
  QUEUE_PUSH: 'queue_push',
} as const;

export type OutputType = (typeof OutputType)[keyof typeof OutputType];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Unknown level names fall back to info instead of failing
 */
function toLogLevel(value: string): LogLevel {
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : 'info';
}

/**
 * Configuration schema (snake_case, as written in byteproc.json)
 *
 * Every option has a built-in default except the queue URLs and the XOR key,
 * which are checked against the options that need them after merging.
 */
export const configSchema = z.object({
  schema_version: z.string().default('1.0'),
  max_stream_size_kb: z.number().int().positive().default(64),

  // Transports
  input_type: z.enum([InputType.STDIN, InputType.QUEUE_PULL]).default(InputType.STDIN),
  input_queue_url: z.string().url().optional(),
  input_queue_name: z.string().min(1).default('byteproc:input'),
  output_type: z.enum([OutputType.STDOUT, OutputType.QUEUE_PUSH]).default(OutputType.STDOUT),
  output_queue_url: z.string().url().optional(),
  output_queue_name: z.string().min(1).default('byteproc:output'),

  // Queue client
  queue_reconnect_interval_ms: z.number().int().nonnegative().default(1000),
  queue_max_reconnect_attempts: z.number().int().nonnegative().default(5),
  queue_send_timeout_ms: z.number().int().default(5000),
  queue_receive_timeout_ms: z.number().int().default(5000),

  // Logging
  log_enabled: z.boolean().default(true),
  log_level: z.string().default('info').transform(toLogLevel),
  log_file: z.string().min(1).default('byteproc.log'),
  log_append: z.boolean().default(true),

  // XOR module
  xor_enabled: z.boolean().default(false),
  xor_key: z.string().optional(),
  xor_pad: z.string().default('00'),

  // Base64 module
  base64_enabled: z.boolean().default(false),
  base64_mode: z.enum(['encode', 'decode']).default('encode'),
  base64_padding: z.boolean().default(true),
});

export type ConfigFileInput = z.input<typeof configSchema>;
export type RawConfig = z.output<typeof configSchema>;
export type ConfigKey = keyof typeof configSchema.shape;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(configSchema.shape, key);
}

// Command-line values arrive as strings, or as `true` for a bare flag
const cliString = z.string();
const cliInt = z.string().regex(/^-?\d+$/, 'Expected an integer').transform(Number);
const cliBoolean = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

/**
 * Command-line overrides: same keys as the file, coerced from argv strings.
 * Range and enum checks happen when the merged result is parsed with configSchema.
 */
export const cliOverridesSchema = z
  .object({
    schema_version: cliString,
    max_stream_size_kb: cliInt,
    input_type: cliString,
    input_queue_url: cliString,
    input_queue_name: cliString,
    output_type: cliString,
    output_queue_url: cliString,
    output_queue_name: cliString,
    queue_reconnect_interval_ms: cliInt,
    queue_max_reconnect_attempts: cliInt,
    queue_send_timeout_ms: cliInt,
    queue_receive_timeout_ms: cliInt,
    log_enabled: cliBoolean,
    log_level: cliString,
    log_file: cliString,
    log_append: cliBoolean,
    xor_enabled: cliBoolean,
    xor_key: cliString,
    xor_pad: cliString,
    base64_enabled: cliBoolean,
    base64_mode: cliString,
    base64_padding: cliBoolean,
  } satisfies Record<ConfigKey, z.ZodTypeAny>)
  .partial()
  .strict();

export type CliOverrides = z.output<typeof cliOverridesSchema>;
