import WebSocket from 'ws';

export interface CloseInfo {
  code: number;
  reason: string;
}

/**
 * Loopback WebSocket client that buffers responses so tests can await them
 * one by one.
 */
export class TestClient {
  readonly closed: Promise<CloseInfo>;
  private readonly inbox: unknown[] = [];
  private waiter: ((message: unknown) => void) | null = null;

  private constructor(private readonly ws: WebSocket) {
    ws.on('message', data => {
      const message: unknown = JSON.parse(data.toString());
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = null;
        resolve(message);
      } else {
        this.inbox.push(message);
      }
    });
    this.closed = new Promise(resolve => {
      ws.on('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  static connect(port: number): Promise<TestClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    // Listeners go on before the socket opens so an early close is not missed
    const client = new TestClient(ws);
    return new Promise((resolve, reject) => {
      ws.once('open', () => resolve(client));
      ws.once('error', reject);
    });
  }

  send(request: unknown): void {
    this.ws.send(JSON.stringify(request));
  }

  next(timeoutMs = 5000): Promise<unknown> {
    if (this.inbox.length > 0) {
      return Promise.resolve(this.inbox.shift());
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error('No response within timeout')), timeoutMs);
      this.waiter = message => {
        clearTimeout(timer);
        resolve(message);
      };
    });
  }

  async request(request: unknown): Promise<unknown> {
    this.send(request);
    return this.next();
  }

  async close(): Promise<CloseInfo> {
    this.ws.close();
    return this.closed;
  }
}
