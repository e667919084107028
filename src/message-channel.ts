import type { RawData } from 'ws';

/**
 * The slice of a `ws` WebSocket the session loop uses.
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData | string) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'message', listener: (data: RawData | string) => void): unknown;
  off(event: 'close', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

function decode(data: RawData | string): string {
  if (typeof data === 'string') return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/**
 * Turns socket events into a pull-style `receive()`: one message at a time, in
 * arrival order. Resolves to null once the peer has closed.
 */
export class MessageChannel {
  private queue: string[] = [];
  private waiting: ((message: string | null) => void) | null = null;
  private closed = false;

  private readonly onMessage = (data: RawData | string) => {
    if (this.closed) return;
    const message = decode(data);
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(message);
    } else {
      this.queue.push(message);
    }
  };

  private readonly onClose = () => {
    this.dispose();
  };

  private readonly onError = () => {
    this.dispose();
  };

  constructor(private readonly socket: ClientSocket) {
    socket.on('message', this.onMessage);
    socket.on('close', this.onClose);
    socket.on('error', this.onError);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  receive(): Promise<string | null> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  dispose(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.socket.off('message', this.onMessage);
    this.socket.off('close', this.onClose);
    this.socket.off('error', this.onError);
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }
}
