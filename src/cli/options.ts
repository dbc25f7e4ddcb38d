// src/cli/options.ts

import { parseArgs } from 'node:util';
import { DEFAULT_HOST, DEFAULT_IDLE_TIMEOUT_MS, DEFAULT_PORT } from '../constants/constants.js';
import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import { ConfigError } from '../errors.js';
import type { LogLevel, OutOfRangePolicy } from '../types/emulator-types.js';

export interface CliOptions {
  model: string | null;
  /** Port given on the command line; null lets the definition decide */
  port: number | null;
  host: string;
  supported: boolean;
  definitions: string | null;
  outOfRange: OutOfRangePolicy;
  idleTimeout: number;
  logLevel: LogLevel;
  help: boolean;
}

export const USAGE = `Usage: avemu --model <manufacturer/model> [options]

Emulates the control protocol of an A/V device over TCP.

Options:
  --model <key>              device model (e.g. mcintosh/mx160 or mcintosh_mx160)
  --port <n>                 port to listen on (default: device's default or ${DEFAULT_PORT})
  --host <addr>              listener host (default: ${DEFAULT_HOST})
  --supported                list supported models
  --definitions <dir>        directory of definition files (default: bundled)
  --out-of-range <policy>    reject | clamp out-of-range integer writes (default: reject)
  --idle-timeout <seconds>   close idle connections, 0 disables (default: ${DEFAULT_IDLE_TIMEOUT_MS / 1000})
  -d, --debug                verbose logging
  -q, --quiet                warnings and errors only
  -h, --help                 show this help
`;

function parseInteger(flag: string, text: string, min: number, max: number): number {
  if (!/^\d+$/.test(text)) throw new ConfigError(`${flag} must be an integer, got '${text}'`);
  const value = Number(text);
  if (value < min || value > max) {
    throw new ConfigError(`${flag} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

const FLAGS = {
  model: { type: 'string' },
  port: { type: 'string' },
  host: { type: 'string' },
  supported: { type: 'boolean' },
  definitions: { type: 'string' },
  'out-of-range': { type: 'string' },
  'idle-timeout': { type: 'string' },
  debug: { type: 'boolean', short: 'd' },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false }).values;
  } catch (error: unknown) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * @throws ConfigError for unknown flags and malformed values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const outOfRange = values['out-of-range'] ?? 'reject';
  if (outOfRange !== 'reject' && outOfRange !== 'clamp') {
    throw new ConfigError(`--out-of-range must be reject or clamp, got '${outOfRange}'`);
  }

  const idleTimeout =
    values['idle-timeout'] === undefined
      ? DEFAULT_IDLE_TIMEOUT_MS
      : parseInteger('--idle-timeout', values['idle-timeout'], 0, 86_400) * 1000;

  let logLevel: LogLevel = 'info';
  if (values.quiet) logLevel = 'warn';
  else if (values.debug) logLevel = 'debug';

  return {
    model: values.model ?? null,
    port: values.port === undefined ? null : parseInteger('--port', values.port, 0, 65535),
    host: values.host ?? DEFAULT_HOST,
    supported: values.supported ?? false,
    definitions: values.definitions ?? null,
    outOfRange,
    idleTimeout,
    logLevel,
    help: values.help ?? false,
  };
}

/** Explicit port, else the device's default port, else the global default */
export function resolvePort(explicit: number | null, definition: ProtocolDefinition): number {
  return explicit ?? definition.defaultPort ?? DEFAULT_PORT;
}
