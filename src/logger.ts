import { formatHex, type LogLevel, normalizeLogLevel } from './utils.js';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;
  private readonly includeTimestamp: boolean;

  constructor(prefix: string, level?: LogLevel) {
    this.prefix = prefix;
    this.level = level ?? normalizeLogLevel(process.env.PIXEL_BRIDGE_LOG_LEVEL);
    this.includeTimestamp = process.env.PIXEL_BRIDGE_LOG_TIMESTAMPS === 'true';
  }

  private formatMessage(...args: unknown[]): unknown[] {
    if (this.includeTimestamp) {
      const timestamp = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
      return [`[${timestamp}] [${this.prefix}]`, ...args];
    }
    return [`[${this.prefix}]`, ...args];
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(this.level);
  }

  /**
   * Log a frame as spaced hex at debug level, e.g. `[DeviceSession] TX fa02: 05 00 04 80 50`.
   * The hex string is only built when debug output is enabled.
   */
  frame(label: string, data: Uint8Array): void {
    if (this.shouldLog('debug')) {
      console.log(...this.formatMessage(`${label}: ${formatHex(data)}`));
    }
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(...this.formatMessage(...args));
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...this.formatMessage(...args));
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(...args));
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(...args));
    }
  }
}
