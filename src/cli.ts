import { parseArgs } from 'util';
import type { BleTransport } from './ble-transport.js';
import { BridgeServer } from './bridge-server.js';
import { type CommandRegistry, createDefaultRegistry } from './command-registry.js';
import type { BridgeConfig } from './config.js';
import { DeviceSession } from './device-session.js';
import { CommandDispatcher } from './dispatcher.js';
import { buildEnvelope } from './envelope.js';
import { MockTransport } from './mock-transport.js';
import { runOneShot } from './session-loop.js';
import { getPackageMetadata } from './utils.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CommonOptions {
  address: string;
  mock: boolean;
}

export type CliInvocation =
  | { mode: 'help' }
  | { mode: 'version' }
  | ({ mode: 'server'; host: string; port: number } & CommonOptions)
  | ({ mode: 'command'; name: string; params: string[] } & CommonOptions);

const OPTIONS = {
  server: { type: 'boolean', short: 's' },
  port: { type: 'string', short: 'p' },
  address: { type: 'string', short: 'a' },
  host: { type: 'string' },
  mock: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' }
} as const;

const COMMAND_FLAGS = new Set(['-c', '--command']);

// Flags that end the token list following -c; everything else belongs to the command
function isOwnFlag(token: string): boolean {
  const name = token.split('=')[0];
  return Object.entries(OPTIONS).some(([long, option]) =>
    name === `--${long}` || ('short' in option && name === `-${option.short}`)
  );
}

/**
 * Pull `-c NAME [PARAMS...]` out of argv. Parameters run until the next flag
 * this CLI knows, so a value such as `-1` stays with the command.
 */
function extractCommand(argv: readonly string[]): { rest: string[]; command: string[] | null } {
  const index = argv.findIndex(token => COMMAND_FLAGS.has(token));
  if (index === -1) {
    return { rest: [...argv], command: null };
  }
  let end = index + 1;
  while (end < argv.length && !isOwnFlag(argv[end])) {
    end++;
  }
  return {
    rest: [...argv.slice(0, index), ...argv.slice(end)],
    command: argv.slice(index + 1, end)
  };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new UsageError(`Invalid port: ${value}`);
  }
  return port;
}

function parseFlags(args: string[]) {
  try {
    return parseArgs({ args, options: OPTIONS, allowPositionals: false, strict: true }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCli(argv: readonly string[], config: BridgeConfig): CliInvocation {
  const { rest, command } = extractCommand(argv);
  const values = parseFlags(rest);

  if (values.help) return { mode: 'help' };
  if (values.version) return { mode: 'version' };

  if (values.server && command) {
    throw new UsageError('Use either --server or --command, not both');
  }
  if (!values.server && !command) {
    throw new UsageError('No mode specified. Use --server or -c with -a to specify an address.');
  }
  if (command && command.length === 0) {
    throw new UsageError('--command needs a command name');
  }

  const address = values.address ?? config.address;
  if (!address) {
    throw new UsageError('Missing required option --address (or PIXEL_BRIDGE_ADDRESS)');
  }
  const mock = values.mock ?? false;

  if (command) {
    const [name, ...params] = command;
    return { mode: 'command', address, mock, name, params };
  }
  return {
    mode: 'server',
    address,
    mock,
    host: values.host ?? config.host,
    port: values.port !== undefined ? parsePort(values.port) : config.port
  };
}

export function usage(registry: CommandRegistry = createDefaultRegistry()): string {
  return [
    'Usage: pixel-ble-bridge -a ADDRESS (--server [-p PORT] [--host HOST] | -c COMMAND [PARAMS...])',
    '',
    'Options:',
    '  -a, --address ADDRESS   BLE address of the display (required)',
    '  -s, --server            Run as WebSocket server',
    '  -p, --port PORT         Port for the server (default 4444)',
    '      --host HOST         Interface to listen on (default localhost)',
    '  -c, --command NAME ...  Execute a single command with parameters',
    '      --mock              Use a simulated display instead of Bluetooth',
    '  -h, --help              Show this help',
    '  -v, --version           Show the version',
    '',
    'Parameters are positional or key=value, e.g. -c set_pixel 3 4 ff0000',
    '',
    'Commands:',
    ...registry.describe().map(line => `  ${line}`)
  ].join('\n');
}

export interface CliDependencies {
  config: BridgeConfig;
  createTransport?: (mock: boolean, config: BridgeConfig) => Promise<BleTransport>;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  /** Resolves when the server should shut down; defaults to SIGINT/SIGTERM. */
  waitForShutdown?: () => Promise<void>;
}

async function defaultTransport(mock: boolean, config: BridgeConfig): Promise<BleTransport> {
  if (mock) {
    return new MockTransport({ latencyMs: 20 });
  }
  // noble opens the HCI adapter on import, so only load it when it is needed
  const { NobleTransport } = await import('./noble-transport.js');
  return new NobleTransport({ connectTimeoutMs: config.connectTimeoutMs, scanTimeoutMs: config.connectTimeoutMs });
}

function waitForSignal(): Promise<void> {
  return new Promise(resolve => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

/**
 * Run the CLI and resolve to the process exit code. Server mode resolves only
 * after shutdown.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const {
    config,
    createTransport = defaultTransport,
    print = console.log,
    printError = console.error,
    waitForShutdown = waitForSignal
  } = deps;

  let invocation: CliInvocation;
  try {
    invocation = parseCli(argv, config);
  } catch (error) {
    if (error instanceof UsageError) {
      printError(`[ERROR] ${error.message}`);
      printError(usage());
      return 2;
    }
    throw error;
  }

  switch (invocation.mode) {
    case 'help':
      print(usage());
      return 0;
    case 'version':
      print(getPackageMetadata().version);
      return 0;
    case 'command': {
      const transport = await createTransport(invocation.mock, config);
      const device = new DeviceSession(invocation.address, transport, {
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs
      });
      return runOneShot({
        device,
        dispatcher: new CommandDispatcher(createDefaultRegistry()),
        envelope: buildEnvelope(invocation.name, invocation.params),
        print
      });
    }
    case 'server': {
      const transport = await createTransport(invocation.mock, config);
      const server = new BridgeServer({
        address: invocation.address,
        transport,
        host: invocation.host,
        port: invocation.port,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        maxRecoveries: config.maxRecoveries
      });
      await server.start();
      await waitForShutdown();
      print('Shutting down...');
      await server.stop();
      return 0;
    }
  }
}
