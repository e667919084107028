/**
 * Minimal BLE surface the bridge needs. The noble-backed transport talks to
 * real hardware; the mock transport stands in for it in tests and `--mock` runs.
 */
export interface BleLink {
  /** Address the link was opened for. */
  readonly address: string;
  /** Name the peripheral advertised, or its id. */
  readonly deviceName: string;
  isConnected(): boolean;
  /** Register a listener for an unexpected drop of the link. Returns an unsubscribe function. */
  onDisconnect(listener: () => void): () => void;
}

export interface BleTransport {
  connect(address: string): Promise<BleLink>;
  write(link: BleLink, characteristicUuid: string, data: Uint8Array): Promise<void>;
  disconnect(link: BleLink): Promise<void>;
}

/**
 * Raised when the link drops underneath a write. Distinct from a failed
 * connect, which the device session retries on its own.
 */
export class TransportLostError extends Error {
  constructor(message = 'BLE transport lost', options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportLostError';
  }
}
