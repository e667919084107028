import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function formatHex(data: Uint8Array | Buffer): string {
  const bytes = data instanceof Buffer ? data : Buffer.from(data);
  return bytes.toString('hex').toUpperCase().match(/.{2}/g)?.join(' ') || '';
}

export function normalizeLogLevel(level: string | undefined): LogLevel {
  const normalized = (level || 'info').toLowerCase();
  
  switch (normalized) {
    case 'debug':
    case 'verbose':
    case 'trace':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      console.warn(`[Config] Unknown log level '${level}', defaulting to info`);
      return 'info';
  }
}

export interface PackageMetadata {
  name: string;
  version: string;
  description: string;
}

let packageRoot: string | null = null;

/**
 * Directory holding package.json. Sources run from src/ under Vitest and from
 * dist/src/ once built, so walk up instead of assuming a depth.
 */
export function resolvePackagePath(...segments: string[]): string {
  if (!packageRoot) {
    let dir = dirname(fileURLToPath(import.meta.url));
    while (!existsSync(join(dir, 'package.json')) && dirname(dir) !== dir) {
      dir = dirname(dir);
    }
    packageRoot = dir;
  }
  return join(packageRoot, ...segments);
}

let cachedMetadata: PackageMetadata | null = null;

export function getPackageMetadata(): PackageMetadata {
  if (!cachedMetadata) {
    const pkg: Partial<PackageMetadata> = JSON.parse(readFileSync(resolvePackagePath('package.json'), 'utf-8'));
    cachedMetadata = {
      name: pkg.name ?? 'pixel-ble-bridge',
      version: pkg.version ?? '0.0.0',
      description: pkg.description ?? ''
    };
  }
  return cachedMetadata;
}

/**
 * Normalize a BLE address or peripheral id for comparison.
 * Noble reports `aa:bb:cc:dd:ee:ff` on Linux and a bare UUID on macOS.
 */
export function normalizeAddress(address: string): string {
  return address.toLowerCase().replace(/[^0-9a-f]/g, '');
}

// Noble reports characteristic UUIDs without dashes, in lowercase
export function normalizeUuid(uuid: string): string {
  return uuid.toLowerCase().replace(/-/g, '');
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer. The timer is cleared either way so it
 * never keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>, 
  timeoutMs: number, 
  errorMessage = 'Operation timeout'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
