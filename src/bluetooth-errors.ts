import { readFileSync } from 'fs';
import { resolvePackagePath } from './utils.js';

// Bluetooth HCI error code translations (Bluetooth Core Specification, Vol 1 Part F)
// plus the Linux errno values bluez surfaces for the same failures.
let hciErrorCodes: Record<string, string> | null = null;

function loadHciErrorCodes(): Record<string, string> {
  if (!hciErrorCodes) {
    const table: Record<string, string> = JSON.parse(readFileSync(resolvePackagePath('data', 'hci-error-codes.json'), 'utf-8'));
    hciErrorCodes = table;
    return table;
  }
  return hciErrorCodes;
}

function lookupHciCode(code: number): string | undefined {
  return loadHciErrorCodes()[String(code)];
}

function describeCode(code: number): string {
  return lookupHciCode(code) ?? `Unknown Bluetooth error code: ${code}`;
}

export function translateBluetoothError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  
  if (typeof error === 'number') {
    return describeCode(error);
  }
  
  if (error instanceof Error && error.message) {
    return error.message;
  }
  
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return describeCode(error.code);
  }
  
  // Try to extract an error code from the string representation
  const errorStr = error === null || error === undefined ? '' : String(error);
  const codeMatch = errorStr.match(/\b(\d+)\b/);
  if (codeMatch) {
    const known = lookupHciCode(parseInt(codeMatch[1], 10));
    if (known) {
      return known;
    }
  }
  
  return errorStr || 'Unknown error';
}
