// src/cli/main.ts

import { DEFAULT_HOST } from '../constants/constants.js';
import { ProtocolLibrary } from '../definition/protocol-library.js';
import type { ProtocolDefinition } from '../definition/protocol-definition.js';
import { EmulatorError } from '../errors.js';
import rootLogger from '../logger.js';
import { EmulatorServer } from '../server/emulator-server.js';
import { formatDataIntoColumns, hostIp4Addresses, underscoreModelKey } from '../utils/utils.js';
import { parseCliArgs, resolvePort, USAGE } from './options.js';
import type { CliOptions } from './options.js';

const logger = rootLogger.createLogger('cli');

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO: CliIO = {
  out: text => process.stdout.write(`${text}\n`),
  err: text => process.stderr.write(`${text}\n`),
};

async function listSupported(library: ProtocolLibrary, io: CliIO): Promise<void> {
  const keys = await library.listProtocols();
  const display = new Set<string>();
  for (const key of keys) {
    display.add(key);
    display.add(underscoreModelKey(key));
  }
  io.out('\nModels supported by avemu:\n');
  io.out(formatDataIntoColumns([...display].sort(), process.stdout.columns ?? 80));
  io.out('\nUse either format: mcintosh/mx160 or mcintosh_mx160\n');
}

async function loadDefinition(
  library: ProtocolLibrary,
  options: CliOptions,
  io: CliIO
): Promise<ProtocolDefinition | null> {
  if (!options.model) {
    io.err('Error: --model is required unless using --supported\n');
    io.err(USAGE);
    return null;
  }
  try {
    return await library.load(options.model);
  } catch (error: unknown) {
    if (!(error instanceof EmulatorError)) throw error;
    logger.error(`Failed to load protocol '${options.model}'`, error.message);
    io.err(`\nError: Could not load model '${options.model}'`);
    io.err('Use --supported to list available models\n');
    return null;
  }
}

/** Resolves once SIGINT or SIGTERM arrives. */
function waitForShutdown(): Promise<string> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * Runs the emulator until it is interrupted.
 * @returns the process exit code
 */
export async function main(argv: string[], io: CliIO = consoleIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    if (!(error instanceof EmulatorError)) throw error;
    io.err(`Error: ${error.message}\n`);
    io.err(USAGE);
    return 1;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  rootLogger.setLevel(options.logLevel);
  const library = new ProtocolLibrary(options.definitions ?? undefined);

  if (options.supported) {
    await listSupported(library, io);
    return 0;
  }

  const definition = await loadDefinition(library, options, io);
  if (!definition) return 1;

  logger.info(
    `Loaded protocol: manufacturer=${definition.device.manufacturer}, model=${definition.device.model}`
  );

  const port = resolvePort(options.port, definition);
  const server = new EmulatorServer(definition, {
    outOfRange: options.outOfRange,
    idleTimeout: options.idleTimeout,
  });

  try {
    await server.listen(port, options.host);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to bind ${options.host}:${port}`, message);
    io.err(`\nError: Could not listen on ${options.host}:${port}: ${message}\n`);
    return 1;
  }

  if (options.host === DEFAULT_HOST) {
    const addresses = hostIp4Addresses();
    if (addresses.length > 0) logger.info(`Also reachable on ${addresses.join(', ')}`);
  }

  const signal = await waitForShutdown();
  logger.info(`Received ${signal}, shutting down`);
  await server.close();
  return 0;
}
