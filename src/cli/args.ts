/**
 * Command-line argument parsing
 *
 * Every configuration option is accepted as a kebab-case flag:
 *   --max-stream-size-kb 8 --xor-enabled true --xor-key abcd1234
 * A flag with no value (or followed by another flag) is read as `true`.
 */

import { cliOverridesSchema, isConfigKey, type CliOverrides } from '../types/config.types.js';
import { InvalidConfigurationError } from '../utils/errors.js';

export interface ParsedArgs {
  help: boolean;
  /** Value of --config */
  configPath?: string;
  overrides: CliOverrides;
}

/**
 * Split argv into flag/value pairs
 */
function tokenize(args: string[]): Map<string, string | boolean> {
  const result = new Map<string, string | boolean>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      throw new InvalidConfigurationError(`unexpected argument '${arg}'`);
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      result.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    // Check if next arg exists and is not a flag
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      result.set(body, next);
      i++;
    } else {
      result.set(body, true);
    }
  }

  return result;
}

/**
 * Parse command-line arguments (without the node and script entries)
 * @throws InvalidConfigurationError for unknown flags or malformed values
 */
export function parseArgs(args: string[]): ParsedArgs {
  const flags = tokenize(args);
  const parsed: ParsedArgs = { help: false, overrides: {} };
  const values: Record<string, string | boolean> = {};

  for (const [flag, value] of flags) {
    if (flag === 'help') {
      parsed.help = true;
      continue;
    }

    if (flag === 'config') {
      if (typeof value !== 'string') {
        throw new InvalidConfigurationError('--config requires a path');
      }
      parsed.configPath = value;
      continue;
    }

    const key = flag.replace(/-/g, '_');
    if (!isConfigKey(key)) {
      throw new InvalidConfigurationError(`unknown option --${flag}`);
    }
    values[key] = value;
  }

  const result = cliOverridesSchema.safeParse(values);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `--${issue.path.join('.').replace(/_/g, '-')}: ${issue.message}`
    );
    throw new InvalidConfigurationError(problems.join('; '), result.error.format());
  }

  parsed.overrides = result.data;
  return parsed;
}

/**
 * Usage text for --help
 */
export function usage(): string {
  return `
byteproc - run one hex-encoded message through a chain of byte processors

Usage:
  byteproc [--config <path>] [options]

Input is read as hex text (stdin or a Redis list), decoded, passed through
passthrough -> xor -> base64 (each when enabled), and written back as hex.

Options:
  --config <path>                      Config file (default: $BYTEPROC_CONFIG, then ./byteproc.json)
  --max-stream-size-kb <n>             Limit for decoded input and output (default: 64)

  --input-type <stdin|queue_pull>      Where the message comes from (default: stdin)
  --input-queue-url <url>              Redis URL for queue_pull
  --input-queue-name <name>            Redis list to pop from (default: byteproc:input)
  --output-type <stdout|queue_push>    Where the result goes (default: stdout)
  --output-queue-url <url>             Redis URL for queue_push
  --output-queue-name <name>           Redis list to push to (default: byteproc:output)
  --queue-reconnect-interval-ms <n>    Delay between reconnect attempts (default: 1000)
  --queue-max-reconnect-attempts <n>   Attempts before giving up (default: 5)
  --queue-send-timeout-ms <n>          Push timeout, <= 0 disables (default: 5000)
  --queue-receive-timeout-ms <n>       Pop timeout, <= 0 waits forever (default: 5000)

  --log-enabled [true|false]           Write a log file (default: true)
  --log-level <level>                  off|error|warn|info|debug|trace (default: info)
  --log-file <path>                    Log file (default: byteproc.log)
  --log-append [true|false]            Append instead of truncating (default: true)

  --xor-enabled [true|false]           Enable the XOR processor (default: false)
  --xor-key <hex>                      XOR key, required when enabled
  --xor-pad <hex byte>                 Accepted, not applied (default: 00)

  --base64-enabled [true|false]        Enable the Base64 processor (default: false)
  --base64-mode <encode|decode>        Direction (default: encode)
  --base64-padding [true|false]        Use = padding (default: true)

  --help                               Show this message

Examples:
  echo 00112233 | byteproc --xor-enabled --xor-key abcd1234
  echo 68656c6c6f | byteproc --base64-enabled --base64-padding false
`;
}
