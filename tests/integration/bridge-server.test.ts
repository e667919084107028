import { describe, it, expect, afterEach, vi } from 'vitest';
import { BridgeServer } from '../../src/bridge-server.js';
import { DISPLAY_WRITE_CHARACTERISTIC } from '../../src/constants.js';
import { MockTransport } from '../../src/mock-transport.js';
import { DeviceState } from '../../src/state-machine.js';
import { TestClient } from '../helpers/ws-client.js';

const ADDRESS = 'AA:BB:CC:DD:EE:FF';

describe.sequential('BridgeServer', () => {
  let server: BridgeServer | null = null;
  const clients: TestClient[] = [];

  async function startServer(transport: MockTransport, maxRetries = 2): Promise<number> {
    server = new BridgeServer({
      address: ADDRESS,
      transport,
      host: '127.0.0.1',
      port: 0,
      maxRetries,
      retryDelayMs: 0
    });
    return server.start();
  }

  async function connect(port: number): Promise<TestClient> {
    const client = await TestClient.connect(port);
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    await server?.stop();
    server = null;
    clients.length = 0;
  });

  it('writes a command to the display and answers success', async () => {
    const transport = new MockTransport();
    const client = await connect(await startServer(transport));

    const response = await client.request({ command: 'set_brightness', params: ['80'] });

    expect(response).toEqual({ status: 'success', command: 'set_brightness' });
    expect(transport.writes).toHaveLength(1);
    expect(transport.writes[0].characteristicUuid).toBe(DISPLAY_WRITE_CHARACTERISTIC);
    expect(Array.from(transport.writes[0].data)).toEqual([0x05, 0x00, 0x04, 0x80, 80]);
  });

  it('answers errors without writing and keeps the connection open', async () => {
    const transport = new MockTransport();
    const client = await connect(await startServer(transport));

    expect(await client.request({ command: 'bogus' })).toEqual({ status: 'error', message: 'Unknown command' });
    expect(await client.request({ command: 'set_screen', params: ['12'] })).toEqual({
      status: 'error',
      message: "set_screen: invalid value for 'screen': must be between 1 and 9"
    });
    expect(await client.request({ command: 'clear' })).toEqual({ status: 'success', command: 'clear' });
    expect(transport.writes).toHaveLength(1);
  });

  it('shares one BLE link between concurrent clients', async () => {
    const transport = new MockTransport();
    const port = await startServer(transport);
    const first = await connect(port);
    const second = await connect(port);

    const responses = await Promise.all([
      first.request({ command: 'set_pixel', params: ['1', '1', 'ff0000'] }),
      second.request({ command: 'set_pixel', params: ['2', '2', '00ff00'] })
    ]);

    expect(responses).toEqual([
      { status: 'success', command: 'set_pixel' },
      { status: 'success', command: 'set_pixel' }
    ]);
    expect(transport.connectAttempts).toBe(1);
    expect(transport.writes).toHaveLength(2);
    expect(server?.getStatus().device?.leases).toBe(2);

    await first.close();
    await vi.waitFor(() => expect(server?.getStatus().device?.leases).toBe(1));
    expect(transport.openLinks).toBe(1);

    await second.close();
    await vi.waitFor(() => expect(server?.getStatus().device?.state).toBe(DeviceState.DISCONNECTED));
    expect(transport.openLinks).toBe(0);
  });

  it('replays a command after the link drops', async () => {
    const transport = new MockTransport();
    const client = await connect(await startServer(transport));
    expect(await client.request({ command: 'clear' })).toEqual({ status: 'success', command: 'clear' });

    transport.dropAll();
    const response = await client.request({ command: 'set_power', params: ['off'] });

    expect(response).toEqual({ status: 'success', command: 'set_power' });
    expect(transport.connectAttempts).toBe(2);
    expect(transport.writes).toHaveLength(2);
  });

  it('closes with 4002 when the display is unreachable', async () => {
    const transport = new MockTransport().setUnreachable(true);
    const client = await connect(await startServer(transport));

    expect(await client.next()).toEqual({ status: 'error', message: 'Device unavailable' });
    expect(await client.closed).toEqual({ code: 4002, reason: 'Device unavailable' });
    expect(transport.connectAttempts).toBe(2);
  });

  it('closes clients with 4010 on shutdown', async () => {
    const transport = new MockTransport();
    const client = await connect(await startServer(transport));
    await client.request({ command: 'clear' });

    await server?.stop();
    server = null;

    expect(await client.closed).toEqual({ code: 4010, reason: 'Server shutting down' });
    expect(transport.openLinks).toBe(0);
  });
});
