import { describe, it, expect, vi } from 'vitest';
import { parseCli, runCli, UsageError } from '../../src/cli.js';
import { loadConfig } from '../../src/config.js';
import { MockTransport } from '../../src/mock-transport.js';

const config = loadConfig({});

describe('parseCli', () => {
  it('parses server mode with defaults', () => {
    expect(parseCli(['-s', '-a', 'AA:BB:CC:DD:EE:FF'], config)).toEqual({
      mode: 'server',
      address: 'AA:BB:CC:DD:EE:FF',
      mock: false,
      host: 'localhost',
      port: 4444
    });
  });

  it('parses server options', () => {
    expect(parseCli(['--server', '--port', '5000', '--host', '0.0.0.0', '--address', 'X', '--mock'], config)).toEqual({
      mode: 'server',
      address: 'X',
      mock: true,
      host: '0.0.0.0',
      port: 5000
    });
  });

  it('parses a one-shot command with its parameters', () => {
    expect(parseCli(['-a', 'X', '-c', 'set_pixel', '3', 'y=4', 'ff0000'], config)).toEqual({
      mode: 'command',
      address: 'X',
      mock: false,
      name: 'set_pixel',
      params: ['3', 'y=4', 'ff0000']
    });
  });

  it('ends the command parameters at the next known flag', () => {
    expect(parseCli(['-c', 'set_brightness', '-1', '-a', 'X'], config)).toMatchObject({
      mode: 'command',
      address: 'X',
      name: 'set_brightness',
      params: ['-1']
    });
  });

  it('takes the address from configuration', () => {
    const withAddress = loadConfig({ PIXEL_BRIDGE_ADDRESS: 'AA:BB' });
    expect(parseCli(['-s'], withAddress)).toMatchObject({ mode: 'server', address: 'AA:BB' });
  });

  it('rejects both modes at once', () => {
    expect(() => parseCli(['-s', '-a', 'X', '-c', 'clear'], config))
      .toThrow('Use either --server or --command, not both');
  });

  it('rejects a missing mode', () => {
    expect(() => parseCli(['-a', 'X'], config))
      .toThrow('No mode specified. Use --server or -c with -a to specify an address.');
  });

  it('rejects -c without a name', () => {
    expect(() => parseCli(['-a', 'X', '-c'], config)).toThrow('--command needs a command name');
  });

  it('rejects a missing address', () => {
    expect(() => parseCli(['-s'], config))
      .toThrow('Missing required option --address (or PIXEL_BRIDGE_ADDRESS)');
  });

  it('rejects a bad port and unknown flags', () => {
    expect(() => parseCli(['-s', '-a', 'X', '-p', 'abc'], config)).toThrow('Invalid port: abc');
    expect(() => parseCli(['-s', '-a', 'X', '--bogus'], config)).toThrow(UsageError);
  });

  it('recognizes help and version', () => {
    expect(parseCli(['-h'], config)).toEqual({ mode: 'help' });
    expect(parseCli(['--version'], config)).toEqual({ mode: 'version' });
  });
});

describe('runCli', () => {
  it('exits with 2 on usage errors without touching Bluetooth', async () => {
    const createTransport = vi.fn(async () => new MockTransport());
    const errors: string[] = [];

    const code = await runCli(['-a', 'X'], { config, createTransport, printError: line => errors.push(line) });

    expect(code).toBe(2);
    expect(errors[0]).toBe('[ERROR] No mode specified. Use --server or -c with -a to specify an address.');
    expect(errors[1]).toMatch(/^Usage: pixel-ble-bridge/);
    expect(createTransport).not.toHaveBeenCalled();
  });

  it('runs a one-shot command', async () => {
    const transport = new MockTransport();
    const lines: string[] = [];

    const code = await runCli(['-a', 'X', '-c', 'clear'], {
      config,
      createTransport: async () => transport,
      print: line => lines.push(line)
    });

    expect(code).toBe(0);
    expect(lines).toEqual(["[INFO] Command 'clear' executed successfully."]);
    expect(transport.writes).toHaveLength(1);
  });

  it('returns 1 when the one-shot command fails', async () => {
    const lines: string[] = [];

    const code = await runCli(['-a', 'X', '-c', 'send_text', 'hi'], {
      config,
      createTransport: async () => new MockTransport(),
      print: line => lines.push(line)
    });

    expect(code).toBe(1);
    expect(lines).toEqual(['[ERROR] send_text: not supported by this bridge (text rendering needs a bitmap font)']);
  });

  it('runs the server until shutdown is requested', async () => {
    const transport = new MockTransport();
    const lines: string[] = [];

    const code = await runCli(['-s', '-a', 'X', '-p', '0', '--host', '127.0.0.1'], {
      config,
      createTransport: async () => transport,
      print: line => lines.push(line),
      waitForShutdown: async () => {}
    });

    expect(code).toBe(0);
    expect(lines).toEqual(['Shutting down...']);
    expect(transport.connectAttempts).toBe(0);
  });

  it('prints the package version', async () => {
    const lines: string[] = [];

    await expect(runCli(['-v'], { config, print: line => lines.push(line) })).resolves.toBe(0);
    expect(lines).toEqual(['0.1.0']);
  });
});
