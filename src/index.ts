export { BridgeServer, type BridgeServerOptions, type BridgeStatus } from './bridge-server.js';
export { DeviceSession, type DeviceHandle, type DeviceSessionOptions, type DeviceSessionStatus, type WriteOutcome } from './device-session.js';
export { DeviceState, StateMachine } from './state-machine.js';
export { CommandDispatcher, UNKNOWN_COMMAND, type DispatchOutcome } from './dispatcher.js';
export { CommandRegistry, createDefaultRegistry } from './command-registry.js';
export { PIXEL_COMMANDS, frame } from './pixel-commands.js';
export { CommandArgumentError, defineCommand, intParam, boolParam, colorParam, dateParam, type PixelCommand } from './command-params.js';
export { parseEnvelope, splitParams, buildEnvelope, type CommandEnvelope, type CommandResult } from './envelope.js';
export { ClientSession, runOneShot, type SessionEnd } from './session-loop.js';
export { TransportLostError, type BleLink, type BleTransport } from './ble-transport.js';
export { MockTransport, type MockWrite } from './mock-transport.js';
// NobleTransport is not re-exported: importing noble opens the Bluetooth adapter.
// Load it from 'pixel-ble-bridge/noble' when real hardware is wanted.
export type { NobleTransportOptions } from './noble-transport.js';
export { BleConnectError, WEBSOCKET_CLOSE_CODES, DISPLAY_WRITE_CHARACTERISTIC } from './constants.js';
export { translateBluetoothError } from './bluetooth-errors.js';
export { loadConfig, loadEnvFile, ConfigError, type BridgeConfig } from './config.js';
export { runCli, parseCli, UsageError } from './cli.js';
export { Logger } from './logger.js';
export { formatHex, normalizeLogLevel, normalizeUuid, type LogLevel } from './utils.js';
