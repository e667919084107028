// Mock BLE transport for running the bridge without hardware
import type { BleLink, BleTransport } from './ble-transport.js';
import { TransportLostError } from './ble-transport.js';
import { BleConnectError } from './constants.js';
import { Logger } from './logger.js';
import { sleep } from './utils.js';

export interface MockWrite {
  address: string;
  characteristicUuid: string;
  data: Uint8Array;
}

export interface MockTransportOptions {
  /** Simulated latency of connect and write calls. */
  latencyMs?: number;
}

class MockLink implements BleLink {
  readonly deviceName: string;
  connected = true;
  private listeners = new Set<() => void>();

  constructor(readonly address: string) {
    this.deviceName = `LED-MOCK-${address.replace(/[^0-9a-zA-Z]/g, '').slice(-4).toUpperCase()}`;
  }

  isConnected(): boolean {
    return this.connected;
  }

  onDisconnect(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  drop(): void {
    if (!this.connected) return;
    this.connected = false;
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

export class MockTransport implements BleTransport {
  readonly writes: MockWrite[] = [];
  connectAttempts = 0;
  disconnects = 0;

  private readonly logger = new Logger('MockTransport');
  private readonly latencyMs: number;
  private readonly links = new Set<MockLink>();
  private pendingConnectFailures = 0;
  private pendingWriteFailures = 0;
  private pendingDisconnectFailures = 0;
  private unreachable = false;

  constructor(options: MockTransportOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
  }

  /** The next `count` connect attempts fail. */
  failNextConnects(count: number): this {
    this.pendingConnectFailures = count;
    return this;
  }

  /** The next `count` writes fail and drop the link they were issued on. */
  failNextWrites(count: number): this {
    this.pendingWriteFailures = count;
    return this;
  }

  failNextDisconnects(count: number): this {
    this.pendingDisconnectFailures = count;
    return this;
  }

  /** Every connect fails until set back to false. */
  setUnreachable(unreachable: boolean): this {
    this.unreachable = unreachable;
    return this;
  }

  /** Simulate the display dropping every open link (power loss, out of range). */
  dropAll(): void {
    for (const link of this.links) {
      link.drop();
    }
  }

  get openLinks(): number {
    return [...this.links].filter(link => link.connected).length;
  }

  async connect(address: string): Promise<BleLink> {
    this.connectAttempts++;
    this.logger.debug(`Simulating connection to ${address} (attempt ${this.connectAttempts})`);
    await this.delay();

    if (this.unreachable || this.pendingConnectFailures > 0) {
      if (this.pendingConnectFailures > 0) this.pendingConnectFailures--;
      throw new BleConnectError('DEVICE_NOT_FOUND', `Device ${address} not found`);
    }

    const link = new MockLink(address);
    this.links.add(link);
    this.logger.debug(`Connected to ${link.deviceName}`);
    return link;
  }

  async write(link: BleLink, characteristicUuid: string, data: Uint8Array): Promise<void> {
    const mockLink = this.ownLink(link);
    await this.delay();

    if (!mockLink.connected) {
      throw new TransportLostError(`Device ${mockLink.deviceName} is not connected`);
    }
    if (this.pendingWriteFailures > 0) {
      this.pendingWriteFailures--;
      mockLink.drop();
      throw new TransportLostError(`Write to ${mockLink.deviceName} failed: link dropped`);
    }

    this.logger.frame(`Write ${characteristicUuid}`, data);
    this.writes.push({ address: mockLink.address, characteristicUuid, data: Uint8Array.from(data) });
  }

  async disconnect(link: BleLink): Promise<void> {
    const mockLink = this.ownLink(link);
    this.disconnects++;
    mockLink.connected = false;
    this.links.delete(mockLink);

    if (this.pendingDisconnectFailures > 0) {
      this.pendingDisconnectFailures--;
      throw new Error('Disconnect timeout');
    }
  }

  private ownLink(link: BleLink): MockLink {
    if (!(link instanceof MockLink)) {
      throw new TypeError('Link was not opened by MockTransport');
    }
    return link;
  }

  private async delay(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
  }
}
