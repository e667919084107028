import noble from '@stoprocent/noble';
import type { BleLink, BleTransport } from './ble-transport.js';
import { TransportLostError } from './ble-transport.js';
import { BleConnectError, DEFAULT_CONNECT_TIMEOUT_MS } from './constants.js';
import { Logger } from './logger.js';
import { normalizeAddress, normalizeUuid, withTimeout } from './utils.js';

/**
 * Noble BLE Transport
 *
 * Handles all BLE device communication for a display addressed by MAC
 * (Linux, Windows) or peripheral UUID (macOS).
 * No retry policy here, that lives in DeviceSession.
 */

// The parts of noble's peripheral and characteristic objects we rely on
interface NobleCharacteristic {
  uuid: string;
  properties: string[];
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
}

interface NoblePeripheral {
  id: string;
  address: string;
  state: string;
  advertisement: { localName?: string };
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverAllServicesAndCharacteristicsAsync(): Promise<{ characteristics: NobleCharacteristic[] }>;
  once(event: 'disconnect', listener: () => void): unknown;
  removeListener(event: 'disconnect', listener: () => void): unknown;
}

export interface NobleTransportOptions {
  scanTimeoutMs?: number;
  connectTimeoutMs?: number;
  disconnectTimeoutMs?: number;
}

function uuidMatches(candidate: string, target: string): boolean {
  const c = normalizeUuid(candidate);
  const t = normalizeUuid(target);
  if (c === t) return true;
  // Standard-base UUIDs may be reported in their 16-bit short form
  const short = (uuid: string) => uuid.length === 32 && uuid.endsWith('00001000800000805f9b34fb') ? uuid.substring(4, 8) : uuid;
  return short(c) === short(t);
}

class NobleLink implements BleLink {
  readonly deviceName: string;
  private connected = true;
  private listeners = new Set<() => void>();
  private readonly handleDisconnect = () => {
    this.connected = false;
    for (const listener of [...this.listeners]) {
      listener();
    }
  };

  constructor(
    readonly address: string,
    readonly peripheral: NoblePeripheral,
    readonly characteristics: NobleCharacteristic[]
  ) {
    this.deviceName = peripheral.advertisement.localName || peripheral.id;
    peripheral.once('disconnect', this.handleDisconnect);
  }

  isConnected(): boolean {
    return this.connected && this.peripheral.state === 'connected';
  }

  onDisconnect(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  findCharacteristic(uuid: string): NobleCharacteristic | undefined {
    return this.characteristics.find(c => uuidMatches(c.uuid, uuid));
  }

  dispose(): void {
    this.connected = false;
    this.peripheral.removeListener('disconnect', this.handleDisconnect);
    this.listeners.clear();
  }
}

export class NobleTransport implements BleTransport {
  private readonly logger = new Logger('Noble');
  private readonly scanTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly disconnectTimeoutMs: number;

  constructor(options: NobleTransportOptions = {}) {
    this.scanTimeoutMs = options.scanTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.disconnectTimeoutMs = options.disconnectTimeoutMs ?? 5000;
  }

  async connect(address: string): Promise<BleLink> {
    await this.waitForPoweredOn();

    const peripheral = await this.findPeripheral(address);
    const deviceName = peripheral.advertisement.localName || peripheral.id;

    try {
      this.logger.info(`Connecting to ${deviceName}...`);
      await withTimeout(peripheral.connectAsync(), this.connectTimeoutMs, 'Device connection timeout');

      const { characteristics } = await withTimeout(
        peripheral.discoverAllServicesAndCharacteristicsAsync(),
        this.connectTimeoutMs,
        'Characteristic discovery timeout'
      );
      this.logger.debug(`Discovered characteristics: [${characteristics.map(c => c.uuid).join(', ')}]`);

      const link = new NobleLink(address, peripheral, characteristics);
      this.logger.info(`Connected successfully to ${deviceName}`);
      return link;
    } catch (error) {
      // A half-open connection leaves the adapter busy for the next attempt
      if (peripheral.state === 'connected' || peripheral.state === 'connecting') {
        await withTimeout(peripheral.disconnectAsync(), this.disconnectTimeoutMs).catch((cleanupError: unknown) => {
          this.logger.warn(`Cleanup after connection error failed: ${cleanupError}`);
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BleConnectError('GATT_CONNECTION_FAILED', message);
    }
  }

  async write(link: BleLink, characteristicUuid: string, data: Uint8Array): Promise<void> {
    if (!(link instanceof NobleLink)) {
      throw new TypeError('Link was not opened by NobleTransport');
    }
    if (!link.isConnected()) {
      throw new TransportLostError(`Device ${link.deviceName} is not connected`);
    }

    const characteristic = link.findCharacteristic(characteristicUuid);
    if (!characteristic) {
      throw new BleConnectError('CHARACTERISTIC_NOT_FOUND', `Characteristic ${characteristicUuid} not found on ${link.deviceName}`);
    }

    const withoutResponse = !characteristic.properties.includes('write')
      && characteristic.properties.includes('writeWithoutResponse');
    try {
      await characteristic.writeAsync(Buffer.from(data), withoutResponse);
    } catch (error) {
      throw new TransportLostError(`Write to ${link.deviceName} failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
  }

  async disconnect(link: BleLink): Promise<void> {
    if (!(link instanceof NobleLink)) {
      throw new TypeError('Link was not opened by NobleTransport');
    }
    const { peripheral } = link;
    link.dispose();
    if (peripheral.state === 'disconnected') {
      return;
    }
    const start = Date.now();
    await withTimeout(peripheral.disconnectAsync(), this.disconnectTimeoutMs, 'Disconnect timeout');
    this.logger.debug(`Disconnect completed in ${Date.now() - start}ms`);
  }

  private async waitForPoweredOn(): Promise<void> {
    if (noble.state === 'poweredOn') {
      return;
    }
    this.logger.info(`State: ${noble.state}, waiting for power on...`);

    let resolvePoweredOn: () => void = () => {};
    const poweredOn = new Promise<void>((resolve) => {
      resolvePoweredOn = resolve;
    });
    const onStateChange = (state: string) => {
      if (state === 'poweredOn') resolvePoweredOn();
    };
    noble.on('stateChange', onStateChange);

    try {
      await withTimeout(poweredOn, this.connectTimeoutMs, 'Bluetooth adapter timeout - check if Bluetooth is enabled');
    } catch (error) {
      throw new BleConnectError('ADAPTER_UNAVAILABLE', error instanceof Error ? error.message : String(error));
    } finally {
      noble.removeListener('stateChange', onStateChange);
    }
  }

  private async findPeripheral(address: string): Promise<NoblePeripheral> {
    const wanted = normalizeAddress(address);
    let resolveFound: (peripheral: NoblePeripheral) => void = () => {};
    const found = new Promise<NoblePeripheral>((resolve) => {
      resolveFound = resolve;
    });
    const onDiscover = (peripheral: NoblePeripheral) => {
      const name = peripheral.advertisement.localName || 'Unknown';
      this.logger.debug(`Discovered device: ${name} [${peripheral.id}]`);
      if (normalizeAddress(peripheral.address) === wanted || normalizeAddress(peripheral.id) === wanted) {
        resolveFound(peripheral);
      }
    };
    noble.on('discover', onDiscover);

    this.logger.info(`Scanning for device ${address}...`);
    try {
      await noble.startScanningAsync([], true);
      return await withTimeout(found, this.scanTimeoutMs, `Device ${address} not found`);
    } catch (error) {
      throw new BleConnectError('DEVICE_NOT_FOUND', error instanceof Error ? error.message : String(error));
    } finally {
      noble.removeListener('discover', onDiscover);
      await noble.stopScanningAsync().catch((error: unknown) => {
        this.logger.debug(`Stop scanning failed: ${error}`);
      });
    }
  }
}
