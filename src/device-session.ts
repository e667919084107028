import { EventEmitter } from 'events';
import type { BleLink, BleTransport } from './ble-transport.js';
import { TransportLostError } from './ble-transport.js';
import { translateBluetoothError } from './bluetooth-errors.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DISPLAY_WRITE_CHARACTERISTIC
} from './constants.js';
import { Logger } from './logger.js';
import { DeviceState, StateMachine } from './state-machine.js';
import { normalizeUuid, sleep } from './utils.js';

export type WriteOutcome = 'ok' | 'transport-lost';

/**
 * One live connection to the display. A handle goes stale as soon as the link
 * drops or the session is released; writes through a stale handle report
 * `transport-lost` without touching the transport.
 */
export interface DeviceHandle {
  readonly id: number;
  readonly link: BleLink;
}

export interface DeviceSessionOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  characteristicUuid?: string;
  /** Delay used between connect attempts; tests pass a fake. */
  sleep?: (ms: number) => Promise<void>;
}

export interface DeviceSessionStatus {
  address: string;
  state: DeviceState;
  deviceName: string | null;
  leases: number;
  connectedAt: string | null;
}

/**
 * DeviceSession - owns the BLE link to a single display
 *
 * - Bounded connect-with-retry, concurrent acquires share one attempt
 * - At most one live handle at a time
 * - Writes are serialized, so clients sharing the link never interleave frames
 * - Clients lease the link with open()/close(); the last close() releases it
 *
 * Events:
 * - 'connected': (handle: DeviceHandle)
 * - 'lost': (handle: DeviceHandle, reason: string)
 * - 'unavailable': (attempts: number)
 * - 'released': ()
 */
export class DeviceSession extends EventEmitter {
  private readonly logger = new Logger('DeviceSession');
  private readonly machine = new StateMachine('DeviceState');
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly characteristicUuid: string;
  private readonly sleep: (ms: number) => Promise<void>;

  private handle: DeviceHandle | null = null;
  private unsubscribeLink: (() => void) | null = null;
  private pendingAcquire: Promise<DeviceHandle | null> | null = null;
  private writeChain: Promise<unknown> = Promise.resolve();
  private discarded = new WeakSet<DeviceHandle>();
  private nextHandleId = 1;
  /** Bumped by release(); a connect started under an older value is abandoned. */
  private releaseEpoch = 0;
  private leases = 0;
  private connectedAt: Date | null = null;

  constructor(
    public readonly address: string,
    private readonly transport: BleTransport,
    options: DeviceSessionOptions = {}
  ) {
    super();
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.characteristicUuid = options.characteristicUuid ?? DISPLAY_WRITE_CHARACTERISTIC;
    this.sleep = options.sleep ?? sleep;
  }

  get state(): DeviceState {
    return this.machine.getState();
  }

  get currentHandle(): DeviceHandle | null {
    return this.handle;
  }

  /**
   * Connect to the display, retrying up to `maxRetries` times with
   * `retryDelayMs` between attempts. Resolves to null once the budget is
   * spent; connect failures never reject.
   */
  acquire(): Promise<DeviceHandle | null> {
    if (this.handle && this.isLive(this.handle)) {
      return Promise.resolve(this.handle);
    }
    if (!this.pendingAcquire) {
      this.pendingAcquire = this.connectWithRetry().finally(() => {
        this.pendingAcquire = null;
      });
    }
    return this.pendingAcquire;
  }

  /**
   * Drop a handle that reported `transport-lost` and connect again. When
   * another client already replaced it, the live handle is returned as is.
   */
  async reconnect(stale: DeviceHandle): Promise<DeviceHandle | null> {
    if (this.handle && this.handle !== stale && this.isLive(this.handle)) {
      return this.handle;
    }
    if (this.pendingAcquire) {
      return this.pendingAcquire;
    }
    if (this.handle === stale) {
      this.markLost(stale, 'reconnect requested');
    }
    await this.discard(stale);
    return this.acquire();
  }

  write(handle: DeviceHandle, payload: Uint8Array): Promise<WriteOutcome> {
    const result = this.writeChain.then(() => this.performWrite(handle, payload));
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  /**
   * Disconnect unconditionally. Idempotent; disconnect errors are logged and
   * the session counts as released regardless. A connect still in flight
   * resolves to null and its link is closed.
   */
  async release(handle: DeviceHandle | null = this.handle): Promise<void> {
    if (this.pendingAcquire) {
      this.releaseEpoch++;
    }
    if (!this.handle || handle === this.handle) {
      this.detach();
      if (this.state === DeviceState.CONNECTED || this.state === DeviceState.LOST) {
        this.machine.transition(DeviceState.DISCONNECTED, 'released');
        this.emit('released');
      }
    }
    if (handle) {
      await this.discard(handle);
    }
  }

  /** Take a lease on the shared link, connecting if nobody holds it yet. */
  async open(): Promise<DeviceHandle | null> {
    this.leases++;
    const handle = await this.acquire();
    if (!handle) {
      this.leases--;
    }
    return handle;
  }

  /** Give a lease back; the last one out releases the link. */
  async close(): Promise<void> {
    if (this.leases === 0) {
      return;
    }
    this.leases--;
    if (this.leases === 0) {
      await this.release();
    }
  }

  getStatus(): DeviceSessionStatus {
    return {
      address: this.address,
      state: this.state,
      deviceName: this.handle?.link.deviceName ?? null,
      leases: this.leases,
      connectedAt: this.connectedAt?.toISOString() ?? null
    };
  }

  private async connectWithRetry(): Promise<DeviceHandle | null> {
    this.machine.transition(DeviceState.CONNECTING, this.address);
    const epoch = this.releaseEpoch;

    let retries = 0;
    while (retries < this.maxRetries) {
      let failure: string;
      try {
        const link = await this.transport.connect(this.address);
        if (epoch !== this.releaseEpoch) {
          return this.abandon(link);
        }
        if (link.isConnected()) {
          return this.attach(link);
        }
        failure = 'link reported not connected';
        await this.transport.disconnect(link).catch((error: unknown) => {
          this.logger.debug(`Disconnect of half-open link failed: ${translateBluetoothError(error)}`);
        });
      } catch (error) {
        failure = translateBluetoothError(error);
      }

      retries++;
      this.logger.error(`Connection failed (${retries}/${this.maxRetries}): ${failure}`);
      if (retries < this.maxRetries) {
        await this.sleep(this.retryDelayMs);
      }
      if (epoch !== this.releaseEpoch) {
        return this.abandon(null);
      }
    }

    this.logger.error(`Could not connect to the device after ${this.maxRetries} attempts`);
    this.machine.transition(DeviceState.DISCONNECTED, 'retry budget spent');
    this.emit('unavailable', this.maxRetries);
    return null;
  }

  private async abandon(link: BleLink | null): Promise<null> {
    this.logger.info('Released while connecting, dropping the new connection');
    this.machine.transition(DeviceState.DISCONNECTED, 'released while connecting');
    if (link) {
      await this.transport.disconnect(link).catch((error: unknown) => {
        this.logger.warn(`Disconnect of abandoned link failed: ${translateBluetoothError(error)}`);
      });
    }
    this.emit('released');
    return null;
  }

  private attach(link: BleLink): DeviceHandle {
    const handle: DeviceHandle = { id: this.nextHandleId++, link };
    this.handle = handle;
    this.connectedAt = new Date();
    this.unsubscribeLink = link.onDisconnect(() => this.markLost(handle, 'device disconnected'));
    this.machine.transition(DeviceState.CONNECTED, link.deviceName);
    this.logger.info(`Connected to the device ${link.deviceName}`);
    this.emit('connected', handle);
    return handle;
  }

  private detach(): void {
    this.unsubscribeLink?.();
    this.unsubscribeLink = null;
    this.handle = null;
    this.connectedAt = null;
  }

  private markLost(handle: DeviceHandle, reason: string): void {
    if (handle !== this.handle) {
      return;
    }
    this.detach();
    this.machine.transition(DeviceState.LOST, reason);
    this.logger.warn(`BLE connection lost: ${reason}`);
    this.emit('lost', handle, reason);
  }

  private isLive(handle: DeviceHandle): boolean {
    if (handle !== this.handle || this.state !== DeviceState.CONNECTED) {
      return false;
    }
    if (!handle.link.isConnected()) {
      this.markLost(handle, 'link no longer connected');
      return false;
    }
    return true;
  }

  private async performWrite(handle: DeviceHandle, payload: Uint8Array): Promise<WriteOutcome> {
    if (!this.isLive(handle)) {
      return 'transport-lost';
    }
    try {
      await this.transport.write(handle.link, this.characteristicUuid, payload);
      this.logger.frame(`TX ${normalizeUuid(this.characteristicUuid).substring(4, 8)}`, payload);
      return 'ok';
    } catch (error) {
      if (error instanceof TransportLostError) {
        this.markLost(handle, error.message);
        return 'transport-lost';
      }
      throw error;
    }
  }

  private async discard(handle: DeviceHandle): Promise<void> {
    if (this.discarded.has(handle)) {
      return;
    }
    this.discarded.add(handle);
    try {
      await this.transport.disconnect(handle.link);
      this.logger.debug(`Disconnected link ${handle.id}`);
    } catch (error) {
      this.logger.warn(`Disconnect failed, treating link ${handle.id} as released: ${translateBluetoothError(error)}`);
    }
  }
}
