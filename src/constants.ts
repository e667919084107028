/**
 * GATT characteristic every display command is written to.
 */
export const DISPLAY_WRITE_CHARACTERISTIC = '0000fa02-0000-1000-8000-00805f9b34fb';

export const DEFAULT_WS_HOST = 'localhost';
export const DEFAULT_WS_PORT = 4444;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 5000;
export const DEFAULT_MAX_RECOVERIES = 3;
export const DEFAULT_CONNECT_TIMEOUT_MS = 15000;

/**
 * WebSocket Close Codes for BLE Connection Failures
 * 
 * Uses 4000-4999 range as specified by RFC 6455 for application-specific close codes.
 * Codes 1000-2999 are reserved by WebSocket specification.
 */
export const WEBSOCKET_CLOSE_CODES = {
  DEVICE_UNAVAILABLE: 4002,
  BLE_DISCONNECTED: 4005,
  SERVER_SHUTDOWN: 4010
} as const;

export type WebSocketCloseCode = typeof WEBSOCKET_CLOSE_CODES[keyof typeof WEBSOCKET_CLOSE_CODES];

export const CLOSE_CODE_MESSAGES: Record<WebSocketCloseCode, string> = {
  [WEBSOCKET_CLOSE_CODES.DEVICE_UNAVAILABLE]: 'Device unavailable',
  [WEBSOCKET_CLOSE_CODES.BLE_DISCONNECTED]: 'BLE connection lost',
  [WEBSOCKET_CLOSE_CODES.SERVER_SHUTDOWN]: 'Server shutting down'
};

export type BleConnectErrorCode = 'ADAPTER_UNAVAILABLE' | 'DEVICE_NOT_FOUND' | 'GATT_CONNECTION_FAILED' | 'CHARACTERISTIC_NOT_FOUND';

/**
 * BLE Connection Error class for typed error handling
 */
export class BleConnectError extends Error {
  constructor(
    public readonly code: BleConnectErrorCode, 
    message: string
  ) {
    super(message);
    this.name = 'BleConnectError';
  }
}
