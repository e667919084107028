import { describe, it, expect } from 'vitest';
import { MessageChannel } from '../../src/message-channel.js';
import { FakeSocket } from '../helpers/fake-socket.js';

describe('MessageChannel', () => {
  it('queues messages that arrive before receive()', async () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    socket.emit('message', 'first');
    socket.emit('message', Buffer.from('second'));

    await expect(channel.receive()).resolves.toBe('first');
    await expect(channel.receive()).resolves.toBe('second');
  });

  it('resolves a pending receive() on the next message', async () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    const pending = channel.receive();
    socket.emit('message', 'hello');

    await expect(pending).resolves.toBe('hello');
  });

  it('joins fragmented buffers', async () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    socket.emit('message', [Buffer.from('{"command":'), Buffer.from('"clear"}')]);

    await expect(channel.receive()).resolves.toBe('{"command":"clear"}');
  });

  it('decodes binary frames', async () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    socket.emit('message', new TextEncoder().encode('{"command":"clear"}').buffer);
    socket.emit('message', Buffer.from('{"command":"set_power"}'));

    await expect(channel.receive()).resolves.toBe('{"command":"clear"}');
    await expect(channel.receive()).resolves.toBe('{"command":"set_power"}');
  });

  it('resolves null once the peer closes', async () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    const pending = channel.receive();
    socket.hangUp();

    await expect(pending).resolves.toBeNull();
    await expect(channel.receive()).resolves.toBeNull();
    expect(channel.isClosed).toBe(true);
  });

  it('removes its listeners on dispose', () => {
    const socket = new FakeSocket();
    const channel = new MessageChannel(socket);

    channel.dispose();

    expect(socket.listenerCount('message')).toBe(0);
    expect(socket.listenerCount('close')).toBe(0);
    expect(socket.listenerCount('error')).toBe(0);
  });
});
