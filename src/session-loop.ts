import { WebSocket } from 'ws';
import { translateBluetoothError } from './bluetooth-errors.js';
import {
  CLOSE_CODE_MESSAGES,
  DEFAULT_MAX_RECOVERIES,
  WEBSOCKET_CLOSE_CODES,
  type WebSocketCloseCode
} from './constants.js';
import type { DeviceHandle, DeviceSession } from './device-session.js';
import { type CommandDispatcher, type DispatchOutcome, UNKNOWN_COMMAND } from './dispatcher.js';
import { type CommandEnvelope, type CommandResult, errorResult, parseEnvelope } from './envelope.js';
import { Logger } from './logger.js';
import { type ClientSocket, MessageChannel } from './message-channel.js';

export type SessionEnd = 'peer-closed' | 'device-unavailable' | 'transport-lost';

export interface ClientSessionOptions {
  /** Consecutive reconnect-and-replay cycles allowed before giving up. */
  maxRecoveries?: number;
}

/**
 * Serve one WebSocket client: receive, parse, dispatch, respond, strictly in
 * order. A dropped BLE link is reconnected and the in-flight message replayed,
 * at most `maxRecoveries` times in a row.
 */
export class ClientSession {
  private readonly logger: Logger;
  private readonly maxRecoveries: number;

  constructor(
    public readonly id: string,
    private readonly socket: ClientSocket,
    private readonly device: DeviceSession,
    private readonly dispatcher: CommandDispatcher,
    options: ClientSessionOptions = {}
  ) {
    this.logger = new Logger(`Session:${id}`);
    this.maxRecoveries = options.maxRecoveries ?? DEFAULT_MAX_RECOVERIES;
  }

  async run(): Promise<SessionEnd> {
    // Listen before connecting so nothing sent during the BLE connect is lost
    const channel = new MessageChannel(this.socket);

    let handle = await this.device.open();
    if (!handle) {
      this.terminate(WEBSOCKET_CLOSE_CODES.DEVICE_UNAVAILABLE);
      channel.dispose();
      return 'device-unavailable';
    }

    try {
      for (;;) {
        const message = await channel.receive();
        if (message === null) {
          this.logger.info('Websocket connection closed');
          return 'peer-closed';
        }

        let outcome = await this.process(message, handle);
        let recoveries = 0;
        while (outcome.kind === 'transport-lost') {
          recoveries++;
          if (recoveries > this.maxRecoveries) {
            this.logger.error(`BLE connection lost ${recoveries} times in a row, giving up`);
            this.terminate(WEBSOCKET_CLOSE_CODES.BLE_DISCONNECTED);
            return 'transport-lost';
          }

          this.logger.warn(`BLE connection lost, attempting to reconnect (${recoveries}/${this.maxRecoveries})...`);
          const next: DeviceHandle | null = await this.device.reconnect(handle);
          if (!next) {
            this.terminate(WEBSOCKET_CLOSE_CODES.BLE_DISCONNECTED);
            return 'transport-lost';
          }
          handle = next;
          outcome = await this.process(message, handle);
        }

        this.respond(outcome.result);
      }
    } finally {
      channel.dispose();
      await this.device.close();
    }
  }

  private async process(message: string, handle: DeviceHandle): Promise<DispatchOutcome> {
    try {
      const parsed = parseEnvelope(message);
      if (!parsed.ok) {
        return { kind: 'result', result: errorResult(parsed.error) };
      }
      return await this.dispatcher.dispatch(parsed.envelope, this.device, handle);
    } catch (error) {
      const description = translateBluetoothError(error);
      this.logger.error(`Command failed: ${description}`);
      return { kind: 'result', result: errorResult(description) };
    }
  }

  private respond(result: CommandResult): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify(result));
    }
  }

  /** Send one final error response, then close with an application close code. */
  private terminate(code: WebSocketCloseCode): void {
    const message = CLOSE_CODE_MESSAGES[code];
    this.respond(errorResult(message));
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(code, message);
    }
  }
}

export interface OneShotOptions {
  device: DeviceSession;
  dispatcher: CommandDispatcher;
  envelope: CommandEnvelope;
  print?: (line: string) => void;
}

/**
 * Run a single command and release the device. No replay on transport loss:
 * nothing else is queued behind it. Resolves to a process exit code.
 */
export async function runOneShot({ device, dispatcher, envelope, print = console.log }: OneShotOptions): Promise<number> {
  const handle = await device.acquire();
  if (!handle) {
    print('[ERROR] Could not connect to the device');
    return 1;
  }

  try {
    const outcome = await dispatcher.dispatch(envelope, device, handle);
    if (outcome.kind === 'transport-lost') {
      print('[ERROR] BLE connection lost');
      return 1;
    }
    const { result } = outcome;
    if (result.status === 'success') {
      print(`[INFO] Command '${envelope.name}' executed successfully.`);
      return 0;
    }
    if (result.message === UNKNOWN_COMMAND) {
      print(`[ERROR] Unknown command: ${envelope.name ?? ''}`);
    } else {
      print(`[ERROR] ${result.message ?? 'Command failed'}`);
    }
    return 1;
  } catch (error) {
    print(`[ERROR] ${translateBluetoothError(error)}`);
    return 1;
  } finally {
    await device.release(handle);
  }
}
