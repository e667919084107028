import { describe, it, expect, vi } from 'vitest';
import type { BleLink } from '../../src/ble-transport.js';
import { createDefaultRegistry } from '../../src/command-registry.js';
import type { DeviceHandle, WriteOutcome } from '../../src/device-session.js';
import { CommandDispatcher } from '../../src/dispatcher.js';
import { buildEnvelope } from '../../src/envelope.js';

const link: BleLink = {
  address: 'AA:BB:CC:DD:EE:FF',
  deviceName: 'LED-TEST',
  isConnected: () => true,
  onDisconnect: () => () => {}
};
const handle: DeviceHandle = { id: 1, link };

function createWriter(outcome: WriteOutcome = 'ok') {
  return { write: vi.fn(async (_handle: DeviceHandle, _payload: Uint8Array): Promise<WriteOutcome> => outcome) };
}

describe('CommandDispatcher', () => {
  const dispatcher = new CommandDispatcher(createDefaultRegistry());

  it('answers unknown commands without writing', async () => {
    const writer = createWriter();
    const outcome = await dispatcher.dispatch(buildEnvelope('bogus', []), writer, handle);

    expect(outcome).toEqual({ kind: 'result', result: { status: 'error', message: 'Unknown command' } });
    expect(writer.write).not.toHaveBeenCalled();
  });

  it('treats a missing name as unknown', async () => {
    const writer = createWriter();
    const outcome = await dispatcher.dispatch(buildEnvelope(undefined, ['1']), writer, handle);

    expect(outcome).toEqual({ kind: 'result', result: { status: 'error', message: 'Unknown command' } });
    expect(writer.write).not.toHaveBeenCalled();
  });

  it('returns argument errors without writing', async () => {
    const writer = createWriter();
    const outcome = await dispatcher.dispatch(buildEnvelope('set_brightness', ['200']), writer, handle);

    expect(outcome).toEqual({
      kind: 'result',
      result: { status: 'error', message: "set_brightness: invalid value for 'value': must be between 0 and 100" }
    });
    expect(writer.write).not.toHaveBeenCalled();
  });

  it('rejects commands the bridge cannot encode without writing', async () => {
    const writer = createWriter();
    const outcome = await dispatcher.dispatch(buildEnvelope('send_animation', ['intro.gif']), writer, handle);

    expect(outcome).toEqual({
      kind: 'result',
      result: { status: 'error', message: 'send_animation: not supported by this bridge (animation upload needs an image codec)' }
    });
    expect(writer.write).not.toHaveBeenCalled();
  });

  it('writes exactly one frame on success', async () => {
    const writer = createWriter();
    const outcome = await dispatcher.dispatch(buildEnvelope('clear', []), writer, handle);

    expect(outcome).toEqual({ kind: 'result', result: { status: 'success', command: 'clear' } });
    expect(writer.write).toHaveBeenCalledTimes(1);
    expect(writer.write.mock.calls[0][0]).toBe(handle);
    expect(Array.from(writer.write.mock.calls[0][1])).toEqual([0x04, 0x00, 0x03, 0x80]);
  });

  it('passes transport loss up instead of answering', async () => {
    const writer = createWriter('transport-lost');
    const outcome = await dispatcher.dispatch(buildEnvelope('set_power', ['off']), writer, handle);

    expect(outcome).toEqual({ kind: 'transport-lost' });
  });
});
