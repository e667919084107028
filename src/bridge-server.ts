import { WebSocketServer } from 'ws';
import type { BleTransport } from './ble-transport.js';
import { type CommandRegistry, createDefaultRegistry } from './command-registry.js';
import {
  CLOSE_CODE_MESSAGES,
  DEFAULT_MAX_RECOVERIES,
  DEFAULT_WS_HOST,
  DEFAULT_WS_PORT,
  WEBSOCKET_CLOSE_CODES
} from './constants.js';
import { DeviceSession, type DeviceSessionOptions, type DeviceSessionStatus } from './device-session.js';
import { CommandDispatcher } from './dispatcher.js';
import { Logger } from './logger.js';
import type { ClientSocket } from './message-channel.js';
import { ClientSession } from './session-loop.js';

export interface BridgeServerOptions extends DeviceSessionOptions {
  address: string;
  transport: BleTransport;
  registry?: CommandRegistry;
  host?: string;
  /** 0 picks a free port; start() resolves with the one in use. */
  port?: number;
  maxRecoveries?: number;
}

export interface BridgeStatus {
  listening: boolean;
  clients: number;
  device: DeviceSessionStatus | null;
}

/**
 * BridgeServer - WebSocket server in front of one display
 *
 * Every connection gets its own ClientSession; all of them lease the same
 * DeviceSession, created when the first client arrives.
 */
export class BridgeServer {
  private readonly logger = new Logger('Bridge');
  private readonly dispatcher: CommandDispatcher;
  private wss: WebSocketServer | null = null;
  private device: DeviceSession | null = null;
  private readonly running = new Set<Promise<void>>();
  private nextClientId = 1;

  constructor(private readonly options: BridgeServerOptions) {
    this.dispatcher = new CommandDispatcher(options.registry ?? createDefaultRegistry());
  }

  async start(): Promise<number> {
    const host = this.options.host ?? DEFAULT_WS_HOST;
    const wss = new WebSocketServer({ host, port: this.options.port ?? DEFAULT_WS_PORT });
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      wss.once('listening', () => resolve());
      wss.once('error', reject);
    });
    wss.on('error', error => this.logger.error('Server error:', error.message));
    wss.on('connection', socket => this.track(socket));

    const address = wss.address();
    const port = typeof address === 'object' && address !== null ? address.port : this.options.port ?? DEFAULT_WS_PORT;
    this.logger.info(`WebSocket server started on ws://${host}:${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    this.logger.info('Stopping...');

    for (const client of wss.clients) {
      client.close(WEBSOCKET_CLOSE_CODES.SERVER_SHUTDOWN, CLOSE_CODE_MESSAGES[WEBSOCKET_CLOSE_CODES.SERVER_SHUTDOWN]);
    }
    await Promise.allSettled(this.running);
    await this.device?.release();

    await new Promise<void>((resolve, reject) => {
      wss.close(error => (error ? reject(error) : resolve()));
    });
  }

  getStatus(): BridgeStatus {
    return {
      listening: this.wss !== null,
      clients: this.running.size,
      device: this.device?.getStatus() ?? null
    };
  }

  private getDevice(): DeviceSession {
    if (!this.device) {
      const { address, transport, maxRetries, retryDelayMs, characteristicUuid, sleep } = this.options;
      this.device = new DeviceSession(address, transport, { maxRetries, retryDelayMs, characteristicUuid, sleep });
    }
    return this.device;
  }

  private track(socket: ClientSocket): void {
    const id = String(this.nextClientId++);
    this.logger.info(`Client ${id} connected`);
    const session = new ClientSession(id, socket, this.getDevice(), this.dispatcher, {
      maxRecoveries: this.options.maxRecoveries ?? DEFAULT_MAX_RECOVERIES
    });

    const run: Promise<void> = session.run()
      .then(end => this.logger.info(`Client ${id} finished: ${end}`))
      .catch((error: unknown) => this.logger.error(`Client ${id} failed:`, error))
      .finally(() => this.running.delete(run));
    this.running.add(run);
  }
}
